// Seeded RNG: one instance per run, passed explicitly through the evaluator.

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

/**
 * 32-bit finalizer (murmur3 fmix32). Spreads nearby seeds across the whole
 * state space so that seeds 1, 2, 3... do not start on correlated streams.
 */
export function mix32(value: number): number {
  let h = value >>> 0;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b) >>> 0;
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35) >>> 0;
  h ^= h >>> 16;
  return h >>> 0;
}

export const DEFAULT_RNG_STREAM = 'randomjson';

// xorshift32 never leaves the all-zero state
const ZERO_STATE_REPLACEMENT = 0x9e3779b9;

/** Randomness consumed by the evaluator and the built-in functions. */
export interface Rng {
  /** Next uint32. */
  next(): number;
  /** Float in [0, 1). */
  nextFloat01(): number;
  /** Integer in [min, max). */
  nextInt(min: number, max: number): number;
  /** Uniformly chosen element of a non-empty list. */
  pick<T>(items: readonly T[]): T;
}

/**
 * xorshift32 with uint32 state.
 * Initialization: x = mix32((seed >>> 0) ^ fnv1a32(stream))
 * Step: x ^= x << 13; x ^= x >>> 17; x ^= x << 5; (all masked to uint32)
 */
export class XorShift32 implements Rng {
  private x: number;

  constructor(seed: number, stream: string = DEFAULT_RNG_STREAM) {
    const state = mix32((seed >>> 0) ^ fnv1a32(stream));
    this.x = state === 0 ? ZERO_STATE_REPLACEMENT : state;
  }

  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  nextFloat01(): number {
    return (this.next() >>> 0) / 0x100000000;
  }

  /**
   * @throws {RangeError} if min >= max or either bound is not a safe integer
   */
  nextInt(min: number, max: number): number {
    if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
      throw new RangeError('min and max must be safe integers');
    }
    if (min >= max) {
      throw new RangeError(`min (${min}) must be less than max (${max})`);
    }
    const span = max - min;
    if (span <= 0x100000000) {
      return min + Math.floor(this.nextFloat01() * span);
    }
    // Two draws give 53 bits for spans wider than 2^32
    const high = this.next() >>> 5;
    const low = this.next() >>> 6;
    const unit = (high * 67108864 + low) / 9007199254740992;
    return min + Math.floor(unit * span);
  }

  /**
   * @throws {RangeError} if the list is empty
   */
  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot pick from an empty list');
    }
    const index = this.nextInt(0, items.length);
    const item = items[index];
    if (item === undefined) {
      throw new RangeError(`Index ${index} out of range`);
    }
    return item;
  }
}

export function createRng(
  seed: number,
  stream: string = DEFAULT_RNG_STREAM
): Rng {
  return new XorShift32(seed, stream);
}
