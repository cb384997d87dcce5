import type { Interval, Seq } from '../types/layout';

type Placement = Pick<Seq, 'start' | 'end' | 'strand' | 'x_offset'>;

/** Convert a sequence-local position into the shared x coordinate */
export function toShared(seq: Placement, position: number): number {
  return seq.strand === '-'
    ? seq.x_offset + (seq.end - position)
    : seq.x_offset + (position - seq.start);
}

/** Convert a shared x coordinate back into a sequence-local position */
export function toLocal(seq: Placement, x: number): number {
  return seq.strand === '-'
    ? seq.end - (x - seq.x_offset)
    : seq.start + (x - seq.x_offset);
}

/**
 * Project an interval so that x <= xend. On reverse sequences the interval is
 * mirrored inside the sequence window.
 */
export function projectInterval(seq: Placement, { start, end }: Interval): { x: number; xend: number } {
  return seq.strand === '-'
    ? { x: toShared(seq, end), xend: toShared(seq, start) }
    : { x: toShared(seq, start), xend: toShared(seq, end) };
}

export function toLocalInterval(seq: Placement, x: number, xend: number): Interval {
  const a = toLocal(seq, x);
  const b = toLocal(seq, xend);
  return { start: Math.min(a, b), end: Math.max(a, b) };
}

/** Length of the shared stretch of two intervals; negative when they are apart */
export function overlap(a: Interval, b: Interval): number {
  return Math.min(a.end, b.end) - Math.max(a.start, b.start);
}
