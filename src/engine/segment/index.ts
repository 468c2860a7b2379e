/**
 * Segment module - wire format, checksum and sequence arithmetic.
 *
 * @module engine/segment
 */

export {
  HEADER_LENGTH,
  MAX_PAYLOAD_LENGTH,
  SegmentFlag,
  type SegmentFlagName,
  type SegmentFields,
  type Segment,
  createSegment,
  encodeSegment,
  decodeSegment,
  hasFlag,
  segmentLength,
  describeFlags,
  describeSegment,
} from './codec.js';

export { internetChecksum } from './checksum.js';

export {
  SEQUENCE_SPACE,
  seqAdd,
  seqDiff,
  seqLt,
  seqLte,
  seqGt,
  seqGte,
} from './sequence.js';
