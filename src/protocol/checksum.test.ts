import { describe, expect, it } from "vitest";
import { checksum16 } from "./checksum";

describe("checksum16", () => {
  it("sums bytes", () => {
    expect(checksum16(new Uint8Array([1, 2, 3]))).toBe(6);
  });

  it("wraps at 16 bits", () => {
    // 258 * 0xff = 65790, which is 254 past 0x10000
    expect(checksum16(new Uint8Array(258).fill(0xff))).toBe(254);
  });

  it("honours an explicit length", () => {
    expect(checksum16(new Uint8Array([1, 2, 3, 4]), 2)).toBe(3);
    expect(checksum16(new Uint8Array([1, 2]), 10)).toBe(3);
  });

  it("does not depend on byte order", () => {
    const data = Uint8Array.from({ length: 300 }, (_, i) => (i * 37 + 11) & 0xff);
    const reversed = data.slice().reverse();
    const rotated = new Uint8Array([...data.subarray(123), ...data.subarray(0, 123)]);
    const swapped = data.slice();
    [swapped[0], swapped[299]] = [swapped[299], swapped[0]];

    const expected = checksum16(data);
    expect(checksum16(reversed)).toBe(expected);
    expect(checksum16(rotated)).toBe(expected);
    expect(checksum16(swapped)).toBe(expected);
  });

  it("is zero for empty input", () => {
    expect(checksum16(new Uint8Array(0))).toBe(0);
  });
});
