// CRC-32 (IEEE, reflected) used for framebuffer digests in tests and scripts
const TABLE = new Uint32Array(256);
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) c = (c & 1) ? 0xEDB88320 ^ (c >>> 1) : (c >>> 1);
  TABLE[n] = c >>> 0;
}

export function crc32(bytes: Uint8Array, seed = 0): number {
  let crc = (~seed) >>> 0;
  for (const b of bytes) crc = (crc >>> 8) ^ TABLE[(crc ^ b) & 0xFF];
  return (~crc) >>> 0;
}

export function crc32Hex(bytes: Uint8Array): string {
  return crc32(bytes).toString(16).padStart(8, '0');
}
