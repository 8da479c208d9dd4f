import { describe, expect, it } from "vitest";
import {
  bytesToHex,
  decodeFrame,
  encodeCommand,
  encodeFrame,
  packDriveTrack,
  packStatParam,
  toCommandFrame,
  unpackDriveTrack,
  unpackStatParam
} from "./frame";

describe("frame codec", () => {
  it("encodes tag, little-endian fields and checksum", () => {
    const frame = encodeFrame("STAT", 0x1234, 0x0005);
    // 0x53+0x54+0x41+0x54+0x34+0x12+0x05+0x00 = 0x0187
    expect(bytesToHex(frame)).toBe("53544154341205008701");
  });

  it("decodes what it encodes at the field edges", () => {
    const values = [0, 1, 0x00ff, 0xff00, 0xffff];
    for (const tag of ["STAT", "READ", "WRIT", "WSTA"]) {
      for (const param1 of values) {
        for (const param2 of values) {
          const decoded = decodeFrame(encodeCommand({ tag, param1, param2 }));
          expect(decoded.checksumValid).toBe(true);
          expect(toCommandFrame(decoded)).toEqual({ tag, param1, param2 });
        }
      }
    }
  });

  it("flags every single flipped bit in the checked bytes", () => {
    const original = encodeCommand({ tag: "READ", param1: 0x34d2, param2: 4384 });
    for (let bit = 0; bit < 64; bit += 1) {
      const frame = original.slice();
      frame[bit >> 3] ^= 1 << (bit & 7);
      expect(decodeFrame(frame).checksumValid, `bit ${bit}`).toBe(false);
    }
  });

  it("never reports a short frame as valid", () => {
    const frame = encodeFrame("STAT", 0, 0);
    const decoded = decodeFrame(frame.subarray(0, 9));
    expect(decoded.tag).toBe("STAT");
    expect(decoded.checksumValid).toBe(false);
  });

  it("rejects tags that are not four ASCII characters", () => {
    expect(() => encodeFrame("STA", 0, 0)).toThrow(RangeError);
    expect(() => encodeFrame("STATS", 0, 0)).toThrow(RangeError);
  });
});

describe("parameter packing", () => {
  it("puts the drive in the top nibble and the track below it", () => {
    expect(packDriveTrack(3, 1234)).toBe((3 << 12) | 1234);
    expect(unpackDriveTrack(0x34d2)).toEqual({ drive: 3, track: 1234 });
  });

  it("packs the STAT selection and head-load flags", () => {
    expect(packStatParam(2, [true, false, true, false])).toBe(0x0502);
    expect(packStatParam(null, [false, false, false, false])).toBe(0x00ff);
  });

  it("unpacks STAT parameters", () => {
    expect(unpackStatParam(0x00ff)).toEqual({ drive: null, headLoaded: [false, false, false, false] });
    expect(unpackStatParam(0x0801)).toEqual({ drive: 1, headLoaded: [false, false, false, true] });
  });
});
