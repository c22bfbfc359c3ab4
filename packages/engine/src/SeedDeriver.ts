import { hexlify, keccak256, randomBytes, toBeHex, zeroPadValue } from "ethers";
import { GameConfigurationError } from "./errors";

/**
 * Deterministic per-match seed deriver.
 * matchSeed(i) = first 4 bytes of keccak256(batchSeed ++ uint256(i)), as a uint32.
 * A match's randomness depends only on (batchSeed, index), never on which
 * worker ran it.
 */
export class SeedDeriver {
  readonly seed: string; // bytes32 hex string

  constructor(seed: string) {
    if (!/^0x[0-9a-fA-F]{64}$/.test(seed)) {
      throw new GameConfigurationError(`Invalid seed: must be bytes32 hex, got ${seed}`);
    }
    this.seed = seed.toLowerCase();
  }

  /**
   * Derive the PRNG seed of the match at `index` within the batch.
   */
  matchSeed(index: number): number {
    if (!Number.isInteger(index) || index < 0) {
      throw new GameConfigurationError(`Match index must be a non-negative integer, got ${index}`);
    }
    const indexHex = zeroPadValue(toBeHex(index), 32);
    const packed = this.seed + indexHex.slice(2);
    const hash = keccak256(packed);
    return parseInt(hash.slice(2, 10), 16) >>> 0;
  }
}

/** A fresh bytes32 batch seed. */
export function randomBatchSeed(): string {
  return hexlify(randomBytes(32));
}
