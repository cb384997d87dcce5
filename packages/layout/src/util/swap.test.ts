import { describe, expect, it } from 'vitest';
import { swapQuery } from './swap';

describe('swapQuery', () => {
  it('swaps numbered link columns', () => {
    expect(swapQuery([{ seq_id1: 'A', start1: 1, end1: 5, seq_id2: 'B', start2: 10, end2: 20, pident: 90 }])).toEqual([
      { seq_id1: 'B', start1: 10, end1: 20, seq_id2: 'A', start2: 1, end2: 5, pident: 90 },
    ]);
  });

  it('swaps plain and suffixed columns', () => {
    expect(swapQuery([{ seq_id: 'A', start: 1, seq_id2: 'B', start2: 7 }])).toEqual([
      { seq_id: 'B', start: 7, seq_id2: 'A', start2: 1 },
    ]);
  });
});
