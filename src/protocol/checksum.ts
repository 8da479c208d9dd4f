/** 16-bit additive checksum used by both command frames and track data blocks. */
export function checksum16(data: Uint8Array, length = data.length): number {
  let sum = 0;
  const end = Math.min(length, data.length);
  for (let i = 0; i < end; i += 1) {
    sum = (sum + data[i]) & 0xffff;
  }
  return sum;
}
