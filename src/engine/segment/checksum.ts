/**
 * 16-bit one's-complement Internet checksum.
 *
 * @module engine/segment/checksum
 */

/**
 * Computes the one's-complement of the one's-complement sum of all 16-bit
 * big-endian words in the given buffers, treated as one byte stream.
 * An odd trailing byte is padded with a zero on its right.
 *
 * @example
 * ```typescript
 * internetChecksum(Buffer.from([0x00, 0x01, 0xf2, 0x03])); // 0x0dfb
 * ```
 */
export function internetChecksum(...parts: Buffer[]): number {
  let sum = 0;
  let pending: number | null = null;

  for (const part of parts) {
    for (let i = 0; i < part.length; i++) {
      if (pending === null) {
        pending = part[i];
      } else {
        sum += (pending << 8) | part[i];
        pending = null;
      }
    }
  }

  if (pending !== null) {
    sum += pending << 8;
  }

  while (sum > 0xffff) {
    sum = (sum & 0xffff) + (sum >>> 16);
  }

  return ~sum & 0xffff;
}
