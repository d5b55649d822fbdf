export type AttachMode = 'and' | 'or';

export interface Expire {
  kind: 'Expire';
  index: number;
  before: string;
  after: string;
}

export interface Override {
  kind: 'Override';
  index: number;
  rule: string;
  count: number;
}

export interface Attach {
  kind: 'Attach';
  mode: AttachMode;
  rule: string;
}

export interface Prune {
  kind: 'Prune';
  before: string;
  after: string;
}

export interface Block {
  kind: 'Block';
  index: number;
  rule: string;
}

export type TraceTag = Expire | Override | Attach | Prune | Block;
