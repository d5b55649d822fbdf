import { describe, expect, it, vi } from 'vitest';

import {
  End,
  NoPolicy,
  after,
  andThen,
  applyPolicy,
  exists,
  filter,
  proxy,
  unexpired,
  type NonEmptyPolicy,
  type Policy,
  type ProxyPolicy,
  type SplitOverride,
} from '../src/index.js';
import { at, boundary } from './helpers/boundaries.js';

function asProxy<S>(policy: Policy<S>): ProxyPolicy<S> {
  if (policy.kind !== 'proxy') {
    throw new Error(`expected a proxy, received ${policy.kind}`);
  }
  return policy;
}

const tag =
  (suffix: string): SplitOverride<string> =>
  (d) =>
    d.splits.map((s) => `${s}${suffix}`);

const bang = (inner: NonEmptyPolicy<string>): SplitOverride<string> => (d) =>
  applyPolicy(inner, d)?.map((s) => `${s}!`);

describe('proxy', () => {
  const short = after('short', 10, tag('s'));
  const long = after('long', 40, tag('l'), { noDequeue: true });
  const inner = andThen(short, long);

  it('is skipped over an empty rule', () => {
    const factory = vi.fn(bang);
    expect(proxy('wrap', NoPolicy, End.after(50), factory)).toBe(NoPolicy);
    expect(factory).not.toHaveBeenCalled();
  });

  it('derives its override from the inner rule once at construction', () => {
    const factory = vi.fn(bang);
    const wrapped = proxy('wrap', inner, End.after(50), factory);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(factory).toHaveBeenCalledWith(inner);
    expect(applyPolicy(wrapped, at(0, ['a']))).toEqual(['asl!']);
  });

  it('re-derives the override when the inner rule narrows', () => {
    const factory = vi.fn(bang);
    const wrapped = proxy('wrap', inner, End.after(50), factory);
    const narrowed = asProxy(unexpired(wrapped, boundary(20, 21)));
    expect(narrowed).not.toBe(wrapped);
    expect(narrowed.inner).toBe(long);
    expect(factory).toHaveBeenCalledTimes(2);
    expect(factory).toHaveBeenLastCalledWith(long);
    expect(applyPolicy(narrowed, at(0, ['a']))).toEqual(['al!']);
  });

  it('keeps itself when the inner rule is unchanged', () => {
    const factory = vi.fn(bang);
    const wrapped = proxy('wrap', inner, End.after(50), factory);
    expect(unexpired(wrapped, boundary(2, 3))).toBe(wrapped);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('becomes empty once the inner rule expires', () => {
    const wrapped = proxy('wrap', inner, End.after(50), bang);
    expect(unexpired(wrapped, boundary(45, 46))).toBe(NoPolicy);
  });

  it('becomes empty once its own range passes', () => {
    const lasting = after('lasting', 100, tag('x'));
    const wrapped = proxy('wrap', lasting, End.before(30), bang);
    expect(unexpired(wrapped, boundary(28, 29))).toBe(wrapped);
    expect(unexpired(wrapped, boundary(29, 30))).toBe(NoPolicy);
  });

  it('is empty when rebuilt over an already expired rule', () => {
    const b = boundary(11, 12);
    expect(proxy('wrap', unexpired(short, b), End.after(50), bang)).toBe(NoPolicy);
  });

  it('filters itself before its inner rule', () => {
    const wrapped = proxy('wrap', inner, End.after(50), bang);
    expect(filter(wrapped, (c) => c.label !== 'wrap')).toBe(NoPolicy);
    const pruned = asProxy(filter(wrapped, (c) => c.label !== 'short'));
    expect(pruned.inner).toBe(long);
    expect(filter(wrapped, (c) => c.label !== 'short' && c.label !== 'long')).toBe(NoPolicy);
  });

  it('searches itself and its inner rule', () => {
    const wrapped = proxy('wrap', inner, End.after(50), bang);
    expect(exists(wrapped, (c) => c.label === 'wrap')).toBe(true);
    expect(exists(wrapped, (c) => c.label === 'long')).toBe(true);
    expect(exists(wrapped, (c) => c.label === 'other')).toBe(false);
  });

  it('reports the dequeue flag of its inner rule', () => {
    expect(proxy('wrap', inner, End.after(50), bang).noDequeue).toBe(true);
    expect(proxy('wrap', short, End.after(50), bang).noDequeue).toBe(false);
  });
});
