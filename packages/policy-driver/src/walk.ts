import { NoPolicy, decision, type FormatToken, type Policy } from '@splitfmt/policy-core';

import { PolicyPath } from './path.js';
import { emit } from './trace/log.js';
import { traceEnabled } from './trace/flag.js';

export interface Router<S> {
  splits(ft: FormatToken): readonly S[];
  attach?(ft: FormatToken, chosen: S): Policy<S> | undefined;
}

export interface WalkOptions<S> {
  readonly start?: Policy<S>;
  readonly choose?: (splits: readonly S[], ft: FormatToken) => S | undefined;
}

export interface WalkStep<S> {
  readonly index: number;
  readonly splits: readonly S[];
  readonly chosen: S | undefined;
  readonly blocked: boolean;
  readonly policy: string;
}

export interface WalkResult<S> {
  readonly steps: readonly WalkStep<S>[];
  readonly path: PolicyPath<S>;
}

const firstSplit = <S>(splits: readonly S[]): S | undefined => splits[0];

/**
 * Single greedy pass over `boundaries`: narrow, apply, choose, then attach
 * whatever the router asks for after the choice.
 */
export function walkDecisions<S>(
  boundaries: readonly FormatToken[],
  router: Router<S>,
  options: WalkOptions<S> = {},
): WalkResult<S> {
  const choose: (splits: readonly S[], ft: FormatToken) => S | undefined = options.choose ?? firstSplit;
  let path = PolicyPath.start(options.start ?? NoPolicy);
  const steps: WalkStep<S>[] = [];

  for (const ft of boundaries) {
    path = path.advance(ft);
    const blocked = path.blocksDequeue;
    if (blocked && traceEnabled()) {
      emit({ kind: 'Block', index: ft.index, rule: path.describe() });
    }
    const splits = path.resolve(decision(ft, router.splits(ft)));
    const chosen = splits.length > 0 ? choose(splits, ft) : undefined;
    steps.push({ index: ft.index, splits, chosen, blocked, policy: path.describe() });
    if (chosen !== undefined && router.attach) {
      path = path.attach(router.attach(ft, chosen) ?? NoPolicy);
    }
  }

  return { steps, path };
}
