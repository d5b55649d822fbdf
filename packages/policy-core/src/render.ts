import { renderEnd } from './end.js';
import type { Policy } from './policy.js';

/**
 * Diagnostic form of a policy. A clause renders as `<label><end><flag>d`,
 * where the flag is `!` when the clause blocks dequeuing, e.g. `bracket>10!d`.
 */
export function renderPolicy<S>(policy: Policy<S>): string {
  switch (policy.kind) {
    case 'empty':
      return 'NoPolicy';
    case 'clause':
      return `${policy.label}${renderEnd(policy.end)}${policy.noDequeue ? '!' : ''}d`;
    case 'proxy':
      return `${policy.label}*(${renderPolicy(policy.inner)})${renderEnd(policy.end)}`;
    case 'andThen':
      return `(${renderPolicy(policy.first)} & ${renderPolicy(policy.second)})`;
    case 'orElse':
      return `(${renderPolicy(policy.first)} | ${renderPolicy(policy.second)})`;
  }
}
