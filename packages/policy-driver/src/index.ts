export { PolicyPath } from './path.js';
export { loadTokenStream, pairTokens, parseTokenStream, type TokenStream } from './tokens.js';
export { walkDecisions, type Router, type WalkOptions, type WalkResult, type WalkStep } from './walk.js';
export * from './trace/index.js';
