import { End, notExpiredBy, type EndAnchor, type EndBoundary } from './end.js';
import { withSplits, type Decision, type FormatToken } from './tokens.js';

/**
 * Try-apply override: the replacement splits for a decision it recognises,
 * `undefined` for one outside its domain. An empty list is a defined result.
 */
export type SplitOverride<S> = (decision: Decision<S>) => readonly S[] | undefined;

export interface EmptyPolicy {
  readonly kind: 'empty';
  readonly noDequeue: false;
}

export interface ClausePolicy<S> {
  readonly kind: 'clause';
  readonly label: string;
  readonly end: EndBoundary;
  readonly noDequeue: boolean;
  readonly override: SplitOverride<S>;
}

export type ProxyFactory<S> = (inner: NonEmptyPolicy<S>) => SplitOverride<S>;

/** A clause whose override is derived from `inner` and re-derived whenever `inner` narrows. */
export interface ProxyPolicy<S> {
  readonly kind: 'proxy';
  readonly label: string;
  readonly end: EndBoundary;
  readonly inner: NonEmptyPolicy<S>;
  readonly factory: ProxyFactory<S>;
  readonly noDequeue: boolean;
  readonly override: SplitOverride<S>;
}

export interface AndThenPolicy<S> {
  readonly kind: 'andThen';
  readonly first: NonEmptyPolicy<S>;
  readonly second: NonEmptyPolicy<S>;
  readonly noDequeue: boolean;
  readonly override: SplitOverride<S>;
}

export interface OrElsePolicy<S> {
  readonly kind: 'orElse';
  readonly first: NonEmptyPolicy<S>;
  readonly second: NonEmptyPolicy<S>;
  readonly noDequeue: boolean;
  readonly override: SplitOverride<S>;
}

export type Clause<S> = ClausePolicy<S> | ProxyPolicy<S>;
export type NonEmptyPolicy<S> = Clause<S> | AndThenPolicy<S> | OrElsePolicy<S>;
export type Policy<S> = EmptyPolicy | NonEmptyPolicy<S>;

export type ClausePredicate<S> = (clause: Clause<S>) => boolean;

export interface ClauseOptions {
  readonly noDequeue?: boolean;
}

// The only empty policy. Emptiness is identity with this value; nothing else
// may build a `kind: 'empty'` object.
export const NoPolicy: EmptyPolicy = Object.freeze({ kind: 'empty', noDequeue: false });

export function isEmpty<S>(policy: Policy<S>): policy is EmptyPolicy {
  return policy === NoPolicy;
}

export function nonEmpty<S>(policy: Policy<S>): policy is NonEmptyPolicy<S> {
  return policy !== NoPolicy;
}

export function clause<S>(
  label: string,
  end: EndBoundary,
  override: SplitOverride<S>,
  options: ClauseOptions = {},
): ClausePolicy<S> {
  const built: ClausePolicy<S> = {
    kind: 'clause',
    label,
    end,
    noDequeue: options.noDequeue ?? false,
    override,
  };
  return Object.freeze(built);
}

export function after<S>(
  label: string,
  anchor: EndAnchor,
  override: SplitOverride<S>,
  options?: ClauseOptions,
): ClausePolicy<S> {
  return clause(label, End.after(anchor), override, options);
}

export function before<S>(
  label: string,
  anchor: EndAnchor,
  override: SplitOverride<S>,
  options?: ClauseOptions,
): ClausePolicy<S> {
  return clause(label, End.before(anchor), override, options);
}

export function on<S>(
  label: string,
  anchor: EndAnchor,
  override: SplitOverride<S>,
  options?: ClauseOptions,
): ClausePolicy<S> {
  return clause(label, End.on(anchor), override, options);
}

export function proxy<S>(
  label: string,
  inner: Policy<S>,
  end: EndBoundary,
  factory: ProxyFactory<S>,
): Policy<S> {
  if (isEmpty(inner)) {
    return NoPolicy;
  }
  const built: ProxyPolicy<S> = {
    kind: 'proxy',
    label,
    end,
    inner,
    factory,
    noDequeue: inner.noDequeue,
    override: factory(inner),
  };
  return Object.freeze(built);
}

function pipeline<S>(first: NonEmptyPolicy<S>, second: NonEmptyPolicy<S>): SplitOverride<S> {
  return (input) => {
    const narrowed = first.override(input);
    const staged = narrowed === undefined ? input : withSplits(input, narrowed);
    return second.override(staged) ?? staged.splits;
  };
}

function firstMatch<S>(first: NonEmptyPolicy<S>, second: NonEmptyPolicy<S>): SplitOverride<S> {
  return (input) => first.override(input) ?? second.override(input);
}

/** `left & right`: `left` narrows the splits first, `right` narrows the result. */
export function andThen<S>(left: Policy<S>, right?: Policy<S>): Policy<S> {
  if (right === undefined || isEmpty(right)) {
    return left;
  }
  if (isEmpty(left)) {
    return right;
  }
  const built: AndThenPolicy<S> = {
    kind: 'andThen',
    first: left,
    second: right,
    noDequeue: left.noDequeue || right.noDequeue,
    override: pipeline(left, right),
  };
  return Object.freeze(built);
}

/** `left | right`: `left` wins wherever it is defined. */
export function orElse<S>(left: Policy<S>, right?: Policy<S>): Policy<S> {
  if (right === undefined || isEmpty(right)) {
    return left;
  }
  if (isEmpty(left)) {
    return right;
  }
  const built: OrElsePolicy<S> = {
    kind: 'orElse',
    first: left,
    second: right,
    noDequeue: left.noDequeue || right.noDequeue,
    override: firstMatch(left, right),
  };
  return Object.freeze(built);
}

export function andThenAll<S>(...policies: readonly Policy<S>[]): Policy<S> {
  return policies.reduce<Policy<S>>((acc, policy) => andThen(acc, policy), NoPolicy);
}

export function orElseAll<S>(...policies: readonly Policy<S>[]): Policy<S> {
  return policies.reduce<Policy<S>>((acc, policy) => orElse(acc, policy), NoPolicy);
}

function recombine<S>(
  node: AndThenPolicy<S> | OrElsePolicy<S>,
  first: Policy<S>,
  second: Policy<S>,
): Policy<S> {
  if (first === node.first && second === node.second) {
    return node;
  }
  return node.kind === 'andThen' ? andThen(first, second) : orElse(first, second);
}

function rewrap<S>(node: ProxyPolicy<S>, inner: Policy<S>): Policy<S> {
  if (inner === node.inner) {
    return node;
  }
  return proxy(node.label, inner, node.end, node.factory);
}

/** Drops every rule whose range ends before `ft`. */
export function unexpired<S>(policy: Policy<S>, ft: FormatToken): Policy<S> {
  switch (policy.kind) {
    case 'empty':
      return policy;
    case 'clause':
      return notExpiredBy(policy.end, ft) ? policy : NoPolicy;
    case 'proxy':
      return notExpiredBy(policy.end, ft) ? rewrap(policy, unexpired(policy.inner, ft)) : NoPolicy;
    case 'andThen':
    case 'orElse':
      return recombine(policy, unexpired(policy.first, ft), unexpired(policy.second, ft));
  }
}

export function unexpiredOrUndefined<S>(policy: Policy<S>, ft: FormatToken): NonEmptyPolicy<S> | undefined {
  const narrowed = unexpired(policy, ft);
  return nonEmpty(narrowed) ? narrowed : undefined;
}

export function filter<S>(policy: Policy<S>, pred: ClausePredicate<S>): Policy<S> {
  switch (policy.kind) {
    case 'empty':
      return policy;
    case 'clause':
      return pred(policy) ? policy : NoPolicy;
    case 'proxy':
      return pred(policy) ? rewrap(policy, filter(policy.inner, pred)) : NoPolicy;
    case 'andThen':
    case 'orElse':
      return recombine(policy, filter(policy.first, pred), filter(policy.second, pred));
  }
}

export function exists<S>(policy: Policy<S>, pred: ClausePredicate<S>): boolean {
  switch (policy.kind) {
    case 'empty':
      return false;
    case 'clause':
      return pred(policy);
    case 'proxy':
      return pred(policy) || exists(policy.inner, pred);
    case 'andThen':
    case 'orElse':
      return exists(policy.first, pred) || exists(policy.second, pred);
  }
}

/** Clauses in composition order; proxies are listed but not entered. */
export function clauses<S>(policy: Policy<S>): Clause<S>[] {
  switch (policy.kind) {
    case 'empty':
      return [];
    case 'clause':
    case 'proxy':
      return [policy];
    case 'andThen':
    case 'orElse':
      return [...clauses(policy.first), ...clauses(policy.second)];
  }
}

export function applyPolicy<S>(policy: Policy<S>, input: Decision<S>): readonly S[] | undefined {
  return isEmpty(policy) ? undefined : policy.override(input);
}

export function resolveSplits<S>(policy: Policy<S>, input: Decision<S>): readonly S[] {
  return applyPolicy(policy, input) ?? input.splits;
}
