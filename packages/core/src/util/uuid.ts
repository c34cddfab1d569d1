import type { Rng } from './rng.js';

const UUID_V4_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

/**
 * RFC 4122 version 4 UUID built from four uint32 draws of the run RNG, so a
 * fixed seed reproduces the same identifiers.
 */
export function uuidV4(rng: Rng): string {
  const bytes: number[] = [];
  for (let word = 0; word < 4; word++) {
    const value = rng.next();
    bytes.push(
      (value >>> 24) & 0xff,
      (value >>> 16) & 0xff,
      (value >>> 8) & 0xff,
      value & 0xff
    );
  }
  bytes[6] = ((bytes[6] ?? 0) & 0x0f) | 0x40;
  bytes[8] = ((bytes[8] ?? 0) & 0x3f) | 0x80;

  const hex = bytes.map((b) => b.toString(16).padStart(2, '0')).join('');
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join('-');
}

export function isUUIDv4(value: string): boolean {
  return UUID_V4_PATTERN.test(value);
}
