import { describe, expect, it } from 'vitest';
import { projectInterval, toLocal, toLocalInterval, toShared } from './coords';

const forward = { start: 0, end: 50, strand: '+' as const, x_offset: 100 };
const reverse = { ...forward, strand: '-' as const };
const sub = { start: 200, end: 300, strand: '-' as const, x_offset: 40 };

describe('coords', () => {
  it('maps positions onto forward sequences', () => {
    expect(toShared(forward, 10)).toBe(110);
    expect(projectInterval(forward, { start: 10, end: 20 })).toEqual({ x: 110, xend: 120 });
  });

  it('mirrors intervals on reverse sequences', () => {
    expect(projectInterval(reverse, { start: 10, end: 20 })).toEqual({ x: 130, xend: 140 });
  });

  it('mirrors inside the window of a sub-sequence', () => {
    expect(projectInterval(sub, { start: 210, end: 250 })).toEqual({ x: 90, xend: 130 });
  });

  it('inverts the projection exactly', () => {
    for (const seq of [forward, reverse, sub]) {
      for (const interval of [{ start: seq.start + 3, end: seq.start + 17 }, { start: seq.start, end: seq.end }]) {
        const { x, xend } = projectInterval(seq, interval);
        expect(toLocalInterval(seq, x, xend)).toEqual(interval);
      }
      expect(toLocal(seq, toShared(seq, seq.start + 7))).toBe(seq.start + 7);
    }
  });
});
