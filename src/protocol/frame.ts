import { checksum16 } from "./checksum";
import {
  DRIVE_FIELD_SHIFT,
  FRAME_CHECKSUM_SPAN,
  FRAME_SIZE,
  MAX_DRIVE,
  NO_DRIVE,
  TAG_LENGTH,
  TRACK_FIELD_MASK
} from "./constants";
import type { CommandFrame, DecodedFrame, ResponseFrame } from "./types";

/** Builds a 10-byte frame: ASCII tag, two little-endian words, then the checksum of the first 8 bytes. */
export function encodeFrame(tag: string, field1: number, field2: number): Uint8Array {
  if (!/^[\x20-\x7e]{4}$/.test(tag)) {
    throw new RangeError(`Frame tag must be exactly ${TAG_LENGTH} ASCII characters: ${JSON.stringify(tag)}`);
  }

  const frame = new Uint8Array(FRAME_SIZE);
  for (let i = 0; i < TAG_LENGTH; i += 1) {
    frame[i] = tag.charCodeAt(i);
  }
  frame[4] = field1 & 0xff;
  frame[5] = (field1 >> 8) & 0xff;
  frame[6] = field2 & 0xff;
  frame[7] = (field2 >> 8) & 0xff;

  const checksum = checksum16(frame, FRAME_CHECKSUM_SPAN);
  frame[8] = checksum & 0xff;
  frame[9] = (checksum >> 8) & 0xff;
  return frame;
}

/** Parses a received frame without throwing; callers gate on checksumValid and the tag. */
export function decodeFrame(data: Uint8Array): DecodedFrame {
  const frame = new Uint8Array(FRAME_SIZE);
  frame.set(data.subarray(0, FRAME_SIZE));

  const tag = String.fromCharCode(frame[0], frame[1], frame[2], frame[3]);
  const field1 = frame[4] | (frame[5] << 8);
  const field2 = frame[6] | (frame[7] << 8);
  const checksum = frame[8] | (frame[9] << 8);

  return {
    tag,
    field1,
    field2,
    checksum,
    checksumValid: data.length >= FRAME_SIZE && checksum === checksum16(frame, FRAME_CHECKSUM_SPAN)
  };
}

export function encodeCommand(command: CommandFrame): Uint8Array {
  return encodeFrame(command.tag, command.param1, command.param2);
}

export function encodeResponse(response: ResponseFrame): Uint8Array {
  return encodeFrame(response.tag, response.code, response.data);
}

export function toCommandFrame(decoded: DecodedFrame): CommandFrame {
  return { tag: decoded.tag, param1: decoded.field1, param2: decoded.field2 };
}

export function toResponseFrame(decoded: DecodedFrame): ResponseFrame {
  return { tag: decoded.tag, code: decoded.field1, data: decoded.field2 };
}

/**
 * READ/WRIT parameter 1: track in bits 0..11, drive in bits 12..15.
 * Drives above 15 cannot be expressed on the wire.
 */
export function packDriveTrack(drive: number, track: number): number {
  return ((drive & 0x0f) << DRIVE_FIELD_SHIFT) | (track & TRACK_FIELD_MASK);
}

export function unpackDriveTrack(param1: number): { drive: number; track: number } {
  return {
    drive: (param1 >> DRIVE_FIELD_SHIFT) & 0x0f,
    track: param1 & TRACK_FIELD_MASK
  };
}

/** STAT parameter 1: selected drive (0xFF for none) in the low byte, head-load bit per drive in the high byte. */
export function packStatParam(drive: number | null, headLoaded: readonly boolean[]): number {
  let heads = 0;
  for (let d = 0; d < MAX_DRIVE; d += 1) {
    if (headLoaded[d]) {
      heads |= 1 << d;
    }
  }
  return ((heads & 0xff) << 8) | ((drive ?? NO_DRIVE) & 0xff);
}

export function unpackStatParam(param1: number): { drive: number | null; headLoaded: boolean[] } {
  const low = param1 & 0xff;
  const heads = (param1 >> 8) & 0xff;
  return {
    drive: low === NO_DRIVE ? null : low,
    headLoaded: Array.from({ length: MAX_DRIVE }, (_, d) => (heads & (1 << d)) !== 0)
  };
}

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
}
