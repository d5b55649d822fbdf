import { PolicyError } from './errors.js';
import type { FormatToken, Token } from './tokens.js';

export type EndKind = 'after' | 'before' | 'on';

/** Fixed offset at which a rule stops applying; how it compares depends on `kind`. */
export interface EndBoundary {
  readonly kind: EndKind;
  readonly pos: number;
}

export type EndAnchor = Token | number;

const END_SIGILS: Record<EndKind, string> = {
  after: '>',
  before: '<',
  on: '@',
};

function anchorPos(anchor: EndAnchor): number {
  const pos = typeof anchor === 'number' ? anchor : anchor.end;
  if (!Number.isSafeInteger(pos) || pos < 0) {
    throw new PolicyError('E_END_POS', `end offset must be a non-negative integer, received ${pos}`);
  }
  return pos;
}

export function endBoundary(kind: EndKind, anchor: EndAnchor): EndBoundary {
  return Object.freeze({ kind, pos: anchorPos(anchor) });
}

export const End = Object.freeze({
  after: (anchor: EndAnchor): EndBoundary => endBoundary('after', anchor),
  before: (anchor: EndAnchor): EndBoundary => endBoundary('before', anchor),
  on: (anchor: EndAnchor): EndBoundary => endBoundary('on', anchor),
});

export function notExpiredBy(end: EndBoundary, ft: FormatToken): boolean {
  switch (end.kind) {
    case 'after':
      return ft.left.end <= end.pos;
    case 'before':
      return ft.right.end < end.pos;
    case 'on':
      return ft.right.end <= end.pos;
  }
}

export function renderEnd(end: EndBoundary): string {
  return `${END_SIGILS[end.kind]}${end.pos}`;
}
