import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import { createRng } from '../rng.js';
import { isUUIDv4, uuidV4 } from '../uuid.js';

describe('uuidV4', () => {
  it('always yields a well-formed version 4 UUID', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 0xffffffff }), (seed) => {
        expect(isUUIDv4(uuidV4(createRng(seed)))).toBe(true);
      })
    );
  });

  it('is reproducible for a seed and distinct across draws', () => {
    const a = createRng(123);
    const b = createRng(123);
    const first = uuidV4(a);
    expect(uuidV4(b)).toBe(first);
    expect(uuidV4(a)).not.toBe(first);
  });

  it('consumes exactly four draws', () => {
    const rng = createRng(5);
    const reference = createRng(5);
    uuidV4(rng);
    for (let i = 0; i < 4; i++) reference.next();
    expect(rng.next()).toBe(reference.next());
  });
});

describe('isUUIDv4', () => {
  it('rejects other versions and variants', () => {
    expect(isUUIDv4('123e4567-e89b-12d3-a456-426614174000')).toBe(false);
    expect(isUUIDv4('123e4567-e89b-42d3-c456-426614174000')).toBe(false);
    expect(isUUIDv4('123e4567-e89b-42d3-a456-426614174000')).toBe(true);
  });
});
