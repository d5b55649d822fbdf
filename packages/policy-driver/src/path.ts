import {
  NoPolicy,
  PolicyError,
  andThen,
  applyPolicy,
  exists,
  filter,
  isEmpty,
  orElse,
  renderPolicy,
  unexpired,
  type ClausePredicate,
  type Decision,
  type FormatToken,
  type Policy,
} from '@splitfmt/policy-core';

import { emit } from './trace/log.js';
import { traceEnabled } from './trace/flag.js';
import type { AttachMode } from './trace/tags.js';

/**
 * The rule set carried by one search path. Every step returns a new path, so
 * forking a path is copying the reference.
 */
export class PolicyPath<S> {
  private constructor(
    readonly policy: Policy<S>,
    private readonly last: FormatToken | undefined,
  ) {}

  static start<S>(policy: Policy<S> = NoPolicy): PolicyPath<S> {
    return new PolicyPath(policy, undefined);
  }

  /** Narrows the held rules to those still covering `ft`. */
  advance(ft: FormatToken): PolicyPath<S> {
    const last = this.last;
    if (last && (ft.left.end < last.left.end || ft.right.end < last.right.end)) {
      throw new PolicyError(
        'E_SCAN_ORDER',
        `boundary ${ft.index} ends at ${ft.left.end}/${ft.right.end}, behind ${last.left.end}/${last.right.end}`,
      );
    }
    const narrowed = unexpired(this.policy, ft);
    if (narrowed !== this.policy && traceEnabled()) {
      emit({ kind: 'Expire', index: ft.index, before: renderPolicy(this.policy), after: renderPolicy(narrowed) });
    }
    return new PolicyPath(narrowed, ft);
  }

  /** The splits the held rules allow for `decision`, or its own splits when no rule applies. */
  resolve(decision: Decision<S>): readonly S[] {
    const replaced = applyPolicy(this.policy, decision);
    if (replaced === undefined) {
      return decision.splits;
    }
    if (traceEnabled()) {
      emit({
        kind: 'Override',
        index: decision.formatToken.index,
        rule: renderPolicy(this.policy),
        count: replaced.length,
      });
    }
    return replaced;
  }

  attach(policy: Policy<S>, mode: AttachMode = 'and'): PolicyPath<S> {
    if (isEmpty(policy)) {
      return this;
    }
    if (traceEnabled()) {
      emit({ kind: 'Attach', mode, rule: renderPolicy(policy) });
    }
    const combined = mode === 'and' ? andThen(this.policy, policy) : orElse(this.policy, policy);
    return new PolicyPath(combined, this.last);
  }

  prune(pred: ClausePredicate<S>): PolicyPath<S> {
    const pruned = filter(this.policy, pred);
    if (pruned === this.policy) {
      return this;
    }
    if (traceEnabled()) {
      emit({ kind: 'Prune', before: renderPolicy(this.policy), after: renderPolicy(pruned) });
    }
    return new PolicyPath(pruned, this.last);
  }

  holds(pred: ClausePredicate<S>): boolean {
    return exists(this.policy, pred);
  }

  /** Whether the state holding this path must stay queued until its blocking rule expires. */
  get blocksDequeue(): boolean {
    return this.policy.noDequeue;
  }

  describe(): string {
    return renderPolicy(this.policy);
  }
}
