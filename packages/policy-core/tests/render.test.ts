import { describe, expect, it } from 'vitest';

import { End, NoPolicy, after, andThen, applyPolicy, before, on, orElse, proxy, renderPolicy } from '../src/index.js';

const keep = () => undefined;

describe('renderPolicy', () => {
  it('renders the empty policy', () => {
    expect(renderPolicy(NoPolicy)).toBe('NoPolicy');
  });

  it('renders label, end and dequeue flag of a clause', () => {
    expect(renderPolicy(after('bracket', 10, keep, { noDequeue: true }))).toBe('bracket>10!d');
    expect(renderPolicy(before('comma', 7, keep))).toBe('comma<7d');
    expect(renderPolicy(on('close', 12, keep))).toBe('close@12d');
  });

  it('renders both sides of composites', () => {
    const tree = andThen(after('a', 1, keep), orElse(before('b', 2, keep), on('c', 3, keep)));
    expect(renderPolicy(tree)).toBe('(a>1d & (b<2d | c@3d))');
  });

  it('renders a proxy around its inner rule', () => {
    const inner = after('a', 1, keep);
    const wrapped = proxy('wrap', inner, End.on(30), (rule) => (d) => applyPolicy(rule, d));
    expect(renderPolicy(wrapped)).toBe('wrap*(a>1d)@30');
  });
});
