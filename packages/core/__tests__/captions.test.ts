import { describe, it, expect } from 'vitest';
import type { Caption } from '../src/index';
import { mergeConsecutiveDuplicates, renumberCaptions } from '../src/index';

function cap(startMs: number, endMs: number, text: string, ordinal = 0): Caption {
  return { ordinal, span: { startMs, endMs }, text };
}

describe('mergeConsecutiveDuplicates', () => {
  it('merges two identical adjacent captions into one span', () => {
    expect(mergeConsecutiveDuplicates([cap(0, 2000, 'Hi'), cap(2000, 4000, 'Hi')])).toEqual([
      cap(0, 4000, 'Hi', 1),
    ]);
  });

  it('compares normalized text and renumbers the output', () => {
    const merged = mergeConsecutiveDuplicates([
      cap(0, 1000, 'Hi'),
      cap(1000, 3000, '<i>Hi</i>'),
      cap(3000, 4000, 'Bye'),
      cap(4000, 5000, 'Hi'),
    ]);

    expect(merged).toEqual([cap(0, 3000, 'Hi', 1), cap(3000, 4000, 'Bye', 2), cap(4000, 5000, 'Hi', 3)]);
  });

  it('never shortens the accumulated span', () => {
    expect(mergeConsecutiveDuplicates([cap(0, 5000, 'A'), cap(1000, 2000, 'A')])).toEqual([cap(0, 5000, 'A', 1)]);
  });

  it('keeps the invariant that adjacent outputs differ', () => {
    const input = ['a', 'a', 'b', 'b', 'b', 'a', 'c', 'c'].map((text, idx) => cap(idx * 100, idx * 100 + 100, text));
    const merged = mergeConsecutiveDuplicates(input);

    expect(merged.map((c) => c.text)).toEqual(['a', 'b', 'a', 'c']);
    expect(merged.length).toBeLessThanOrEqual(input.length);
    for (let i = 1; i < merged.length; i += 1) {
      expect(merged[i].text).not.toBe(merged[i - 1].text);
      expect(merged[i].span.startMs).toBe(merged[i - 1].span.endMs);
    }
  });

  it('handles empty input', () => {
    expect(mergeConsecutiveDuplicates([])).toEqual([]);
  });
});

describe('renumberCaptions', () => {
  it('assigns ordinals from 1 without mutating input', () => {
    const input = [cap(0, 1, 'x', 7), cap(1, 2, 'y', 3)];
    const out = renumberCaptions(input);

    expect(out.map((c) => c.ordinal)).toEqual([1, 2]);
    expect(input[0].ordinal).toBe(7);
  });
});
