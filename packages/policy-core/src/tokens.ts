export interface Token {
  readonly text: string;
  readonly start: number;
  readonly end: number;
}

/** A pair of lexically adjacent tokens; the point where a layout decision is made. */
export interface FormatToken {
  readonly index: number;
  readonly left: Token;
  readonly right: Token;
}

export interface Decision<S> {
  readonly formatToken: FormatToken;
  readonly splits: readonly S[];
}

export function decision<S>(formatToken: FormatToken, splits: readonly S[]): Decision<S> {
  return Object.freeze({ formatToken, splits: Object.freeze([...splits]) });
}

export function withSplits<S>(source: Decision<S>, splits: readonly S[]): Decision<S> {
  return decision(source.formatToken, splits);
}
