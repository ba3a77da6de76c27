import { describe, it, expect } from 'vitest';
import { createTimeSpan, spanContains, spansEqual } from '../src/index';

describe('createTimeSpan', () => {
  it('accepts ordered non-negative integers', () => {
    expect(createTimeSpan(0, 0)).toEqual({ startMs: 0, endMs: 0 });
    expect(createTimeSpan(1000, 2500)).toEqual({ startMs: 1000, endMs: 2500 });
  });

  it('rejects reversed, negative or fractional bounds', () => {
    expect(createTimeSpan(2000, 1000)).toBeNull();
    expect(createTimeSpan(-1, 10)).toBeNull();
    expect(createTimeSpan(0, 1.5)).toBeNull();
  });
});

describe('span helpers', () => {
  it('containment is inclusive at both ends', () => {
    const outer = { startMs: 1000, endMs: 5000 };
    expect(spanContains(outer, { startMs: 1000, endMs: 5000 })).toBe(true);
    expect(spanContains(outer, { startMs: 999, endMs: 2000 })).toBe(false);
    expect(spanContains(outer, { startMs: 4000, endMs: 5001 })).toBe(false);
  });

  it('compares spans by value', () => {
    expect(spansEqual({ startMs: 1, endMs: 2 }, { startMs: 1, endMs: 2 })).toBe(true);
    expect(spansEqual({ startMs: 1, endMs: 2 }, { startMs: 1, endMs: 3 })).toBe(false);
  });
});
