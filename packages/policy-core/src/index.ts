export { decision, withSplits } from './tokens.js';
export type { Decision, FormatToken, Token } from './tokens.js';
export { End, endBoundary, notExpiredBy, renderEnd } from './end.js';
export type { EndAnchor, EndBoundary, EndKind } from './end.js';
export { PolicyError, isPolicyError } from './errors.js';
export type { PolicyErrorCode } from './errors.js';
export {
  NoPolicy,
  after,
  andThen,
  andThenAll,
  applyPolicy,
  before,
  clause,
  clauses,
  exists,
  filter,
  isEmpty,
  nonEmpty,
  on,
  orElse,
  orElseAll,
  proxy,
  resolveSplits,
  unexpired,
  unexpiredOrUndefined,
} from './policy.js';
export type {
  AndThenPolicy,
  Clause,
  ClauseOptions,
  ClausePolicy,
  ClausePredicate,
  EmptyPolicy,
  NonEmptyPolicy,
  OrElsePolicy,
  Policy,
  ProxyFactory,
  ProxyPolicy,
  SplitOverride,
} from './policy.js';
export { renderPolicy } from './render.js';
