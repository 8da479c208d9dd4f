import { checksum16 } from "./checksum";
import { TRACK_CHECKSUM_SIZE } from "./constants";

/** Split view of a received track block. */
export interface TrackBlock {
  data: Uint8Array;
  computed: number;
  received: number;
  valid: boolean;
}

/** Appends the little-endian checksum of the data; the trailer never covers itself. */
export function appendTrackChecksum(data: Uint8Array): Uint8Array {
  const block = new Uint8Array(data.length + TRACK_CHECKSUM_SIZE);
  block.set(data, 0);
  const checksum = checksum16(data);
  block[data.length] = checksum & 0xff;
  block[data.length + 1] = (checksum >> 8) & 0xff;
  return block;
}

/** Checks the trailer following the first trackLength bytes of a block. */
export function verifyTrackBlock(block: Uint8Array, trackLength: number): TrackBlock {
  if (block.length < trackLength + TRACK_CHECKSUM_SIZE) {
    throw new RangeError(`Track block too short: ${block.length} of ${trackLength + TRACK_CHECKSUM_SIZE} bytes`);
  }
  const data = block.slice(0, trackLength);
  const computed = checksum16(data);
  const received = block[trackLength] | (block[trackLength + 1] << 8);
  return { data, computed, received, valid: computed === received };
}
