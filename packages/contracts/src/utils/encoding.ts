// Integrity and packing helpers for wall data

/**
 * Compute CRC32 (IEEE polynomial).
 */
export function crc32(input: string | Uint8Array): number {
  const bytes =
    typeof input === "string" ? new TextEncoder().encode(input) : input;
  let crc = 0xffffffff;

  for (const byte of bytes) {
    crc ^= byte;
    for (let bit = 0; bit < 8; bit++) {
      const mask = -(crc & 1);
      crc = (crc >>> 1) ^ (0xedb88320 & mask);
    }
  }

  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * Bit-pack 0/1 values into bytes (LSB-first within each byte).
 */
export function bitPack01(values: Uint8Array): Uint8Array {
  const out = new Uint8Array(Math.ceil(values.length / 8));
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    if (value !== undefined && value & 1) {
      const byteIndex = (i / 8) | 0;
      out[byteIndex] = (out[byteIndex] ?? 0) | (1 << (i % 8));
    }
  }
  return out;
}
