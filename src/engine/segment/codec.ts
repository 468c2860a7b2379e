/**
 * Transport Segment Codec
 *
 * Serializes segments to a fixed big-endian layout and parses them back,
 * verifying the declared payload length and the Internet checksum.
 *
 * Layout (20-byte header followed by the payload):
 *
 *   offset  size  field
 *   0       2     source port
 *   2       2     destination port
 *   4       4     sequence number
 *   8       4     acknowledgment number
 *   12      1     data offset (header length in 32-bit words) << 4
 *   13      1     flags
 *   14      2     advertised window
 *   16      2     checksum
 *   18      2     payload length
 *
 * @module engine/segment/codec
 */

import { ChecksumError, MalformedError } from '../types.js';
import { internetChecksum } from './checksum.js';

// =============================================================================
// Constants
// =============================================================================

/** Length of the fixed segment header in bytes */
export const HEADER_LENGTH = 20;

/** Largest payload the 16-bit length field can describe */
export const MAX_PAYLOAD_LENGTH = 0xffff;

/** Offset of the checksum field within the header */
const CHECKSUM_OFFSET = 16;

/**
 * Segment control flags.
 */
export const SegmentFlag = {
  FIN: 0x01,
  SYN: 0x02,
  RST: 0x04,
  PSH: 0x08,
  ACK: 0x10,
} as const;

export type SegmentFlagName = keyof typeof SegmentFlag;

// =============================================================================
// Types
// =============================================================================

/**
 * Fields supplied when building a segment. The checksum is always derived.
 */
export interface SegmentFields {
  sourcePort: number;
  destinationPort: number;

  /** Sequence number of the first payload byte (or of the SYN/FIN) */
  seq: number;

  /** Next sequence number expected from the peer (meaningful with ACK) */
  ack: number;

  /** Bitwise OR of {@link SegmentFlag} values */
  flags: number;

  /** Receive window advertised by the sender */
  window: number;

  payload?: Buffer;
}

/**
 * An immutable transport segment.
 */
export interface Segment {
  readonly sourcePort: number;
  readonly destinationPort: number;
  readonly seq: number;
  readonly ack: number;
  readonly flags: number;
  readonly window: number;
  readonly checksum: number;
  readonly payload: Buffer;
}

// =============================================================================
// Construction
// =============================================================================

function assertUint(value: number, bits: 16 | 32, field: string): void {
  const max = bits === 16 ? 0xffff : 0xffffffff;
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new MalformedError(`${field} must be an unsigned ${bits}-bit integer, got ${value}`);
  }
}

/**
 * Writes the header for the given fields with a zero checksum.
 */
function writeHeader(fields: Omit<Segment, 'checksum'>): Buffer {
  const header = Buffer.alloc(HEADER_LENGTH);
  header.writeUInt16BE(fields.sourcePort, 0);
  header.writeUInt16BE(fields.destinationPort, 2);
  header.writeUInt32BE(fields.seq, 4);
  header.writeUInt32BE(fields.ack, 8);
  header.writeUInt8((HEADER_LENGTH / 4) << 4, 12);
  header.writeUInt8(fields.flags, 13);
  header.writeUInt16BE(fields.window, 14);
  header.writeUInt16BE(0, CHECKSUM_OFFSET);
  header.writeUInt16BE(fields.payload.length, 18);
  return header;
}

/**
 * Creates a frozen segment and computes its checksum.
 *
 * The payload is copied so later changes to the caller's buffer cannot
 * alter the segment.
 *
 * @throws {MalformedError} If a field does not fit its header slot
 */
export function createSegment(fields: SegmentFields): Segment {
  assertUint(fields.sourcePort, 16, 'sourcePort');
  assertUint(fields.destinationPort, 16, 'destinationPort');
  assertUint(fields.seq, 32, 'seq');
  assertUint(fields.ack, 32, 'ack');
  assertUint(fields.window, 16, 'window');
  if (!Number.isInteger(fields.flags) || fields.flags < 0 || fields.flags > 0xff) {
    throw new MalformedError(`flags must fit in one byte, got ${fields.flags}`);
  }

  const payload = fields.payload ? Buffer.from(fields.payload) : Buffer.alloc(0);
  if (payload.length > MAX_PAYLOAD_LENGTH) {
    throw new MalformedError(`payload of ${payload.length} bytes exceeds ${MAX_PAYLOAD_LENGTH}`);
  }

  const base = {
    sourcePort: fields.sourcePort,
    destinationPort: fields.destinationPort,
    seq: fields.seq,
    ack: fields.ack,
    flags: fields.flags,
    window: fields.window,
    payload,
  };

  return Object.freeze({
    ...base,
    checksum: internetChecksum(writeHeader(base), payload),
  });
}

// =============================================================================
// Encoding / Decoding
// =============================================================================

/**
 * Serializes a segment. The checksum field is computed last, over the header
 * with the checksum zeroed plus the payload.
 */
export function encodeSegment(segment: Segment): Buffer {
  const header = writeHeader(segment);
  header.writeUInt16BE(internetChecksum(header, segment.payload), CHECKSUM_OFFSET);
  return Buffer.concat([header, segment.payload]);
}

/**
 * Parses and verifies a serialized segment. Pure: has no side effects.
 *
 * @throws {MalformedError} If the bytes are too short, the data offset is
 *   invalid, or the declared payload length disagrees with the byte count
 * @throws {ChecksumError} If the recomputed checksum does not match
 */
export function decodeSegment(data: Buffer): Segment {
  if (data.length < HEADER_LENGTH) {
    throw new MalformedError(
      `Segment too short: expected at least ${HEADER_LENGTH} bytes, got ${data.length}`
    );
  }

  const headerLength = (data.readUInt8(12) >> 4) * 4;
  if (headerLength < HEADER_LENGTH || headerLength > data.length) {
    throw new MalformedError(`Invalid data offset: header length ${headerLength}`);
  }

  const payloadLength = data.readUInt16BE(18);
  const actualLength = data.length - headerLength;
  if (payloadLength !== actualLength) {
    throw new MalformedError(
      `Declared payload length ${payloadLength} disagrees with ${actualLength} received bytes`
    );
  }

  const received = data.readUInt16BE(CHECKSUM_OFFSET);
  const zeroed = Buffer.from(data.subarray(0, headerLength));
  zeroed.writeUInt16BE(0, CHECKSUM_OFFSET);
  const payload = Buffer.from(data.subarray(headerLength));
  const computed = internetChecksum(zeroed, payload);
  if (computed !== received) {
    throw new ChecksumError(
      `Checksum mismatch: segment carries 0x${received.toString(16)}, computed 0x${computed.toString(16)}`,
      received,
      computed
    );
  }

  return Object.freeze({
    sourcePort: data.readUInt16BE(0),
    destinationPort: data.readUInt16BE(2),
    seq: data.readUInt32BE(4),
    ack: data.readUInt32BE(8),
    flags: data.readUInt8(13),
    window: data.readUInt16BE(14),
    payload,
    checksum: received,
  });
}

// =============================================================================
// Flag Helpers
// =============================================================================

/**
 * Check whether a segment carries a flag.
 */
export function hasFlag(segment: Pick<Segment, 'flags'>, flag: SegmentFlagName): boolean {
  return (segment.flags & SegmentFlag[flag]) !== 0;
}

/**
 * Sequence space consumed by a segment: payload bytes plus one each for SYN and FIN.
 */
export function segmentLength(segment: Segment): number {
  let length = segment.payload.length;
  if (hasFlag(segment, 'SYN')) length++;
  if (hasFlag(segment, 'FIN')) length++;
  return length;
}

/**
 * Human-readable flag list, e.g. "SYN|ACK". Returns "-" when no flag is set.
 */
export function describeFlags(flags: number): string {
  const names = Object.entries(SegmentFlag)
    .filter(([, bit]) => (flags & bit) !== 0)
    .map(([name]) => name);
  return names.length > 0 ? names.join('|') : '-';
}

/**
 * One-line summary used by traces.
 */
export function describeSegment(segment: Segment): string {
  return (
    `${describeFlags(segment.flags)} ${segment.sourcePort}->${segment.destinationPort} ` +
    `seq=${segment.seq} ack=${segment.ack} win=${segment.window} len=${segment.payload.length}`
  );
}
