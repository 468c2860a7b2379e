/**
 * 32-bit sequence number arithmetic.
 *
 * Sequence numbers wrap at 2^32, so ordering is defined by the signed
 * distance between two numbers rather than by plain comparison.
 *
 * @module engine/segment/sequence
 */

/** Size of the sequence space */
export const SEQUENCE_SPACE = 0x100000000;

/**
 * Adds an offset to a sequence number, wrapping at 2^32.
 */
export function seqAdd(seq: number, offset: number): number {
  return (((seq + offset) % SEQUENCE_SPACE) + SEQUENCE_SPACE) % SEQUENCE_SPACE;
}

/**
 * Signed distance from `from` to `to`, in the range [-2^31, 2^31).
 */
export function seqDiff(to: number, from: number): number {
  const diff = (to - from) >>> 0;
  return diff >= 0x80000000 ? diff - SEQUENCE_SPACE : diff;
}

/** `a` precedes `b` */
export function seqLt(a: number, b: number): boolean {
  return seqDiff(a, b) < 0;
}

/** `a` precedes or equals `b` */
export function seqLte(a: number, b: number): boolean {
  return seqDiff(a, b) <= 0;
}

/** `a` follows `b` */
export function seqGt(a: number, b: number): boolean {
  return seqDiff(a, b) > 0;
}

/** `a` follows or equals `b` */
export function seqGte(a: number, b: number): boolean {
  return seqDiff(a, b) >= 0;
}
