import { randomBytes } from "node:crypto";

const MASK_64 = (1n << 64n) - 1n;
const LCG_MULTIPLIER = 1103515245n;
const LCG_INCREMENT = 12345n;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;
const FNV_OFFSET = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;

/**
 * 64-bit linear congruential generator. Every instance owns its state, so
 * concurrent matches never share a sequence.
 */
export class SeededRandom {
  private state: bigint;

  constructor(seed: bigint) {
    this.state = BigInt.asUintN(64, seed);
  }

  next(): bigint {
    this.state = (this.state * LCG_MULTIPLIER + LCG_INCREMENT) & MASK_64;
    return this.state;
  }

  /** Integer in [0, bound), taken from the high bits of the state. */
  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0) {
      throw new RangeError(`bound must be a positive integer, got ${bound}`);
    }
    return Number((this.next() >> 33n) % BigInt(bound));
  }
}

/** Derives the per-turn shape seed so consecutive turns never replay a set. */
export function mixTurn(seed: bigint, turnNumber: number): bigint {
  return BigInt.asUintN(64, seed ^ BigInt.asUintN(64, BigInt(turnNumber) * GOLDEN_GAMMA));
}

export function colorSeed(seed: bigint, turnNumber: number): bigint {
  return BigInt.asUintN(64, seed ^ BigInt(turnNumber * 1000));
}

/** Fresh unpredictable 64-bit seed. */
export function randomSeed(): bigint {
  return randomBytes(8).readBigUInt64BE();
}

/** FNV-1a over the UTF-8 bytes of `value`. */
export function seedFromString(value: string): bigint {
  let hash = FNV_OFFSET;
  for (const byte of Buffer.from(value, "utf8")) {
    hash = ((hash ^ BigInt(byte)) * FNV_PRIME) & MASK_64;
  }
  return hash;
}

export function parseSeed(value: string): bigint {
  return BigInt.asUintN(64, BigInt(value));
}

export function formatSeed(seed: bigint): string {
  return BigInt.asUintN(64, seed).toString();
}
