import { createHash, randomBytes } from 'crypto';
import type { VRFResult } from '../types';

export class VRF {
  private static readonly HASH_ALGORITHM = 'sha256';

  /** Exclusive upper bound of a random word (2^256). */
  static readonly WORD_LIMIT = 1n << 256n;

  /**
   * Generate a verifiable random value with proof
   * @param seed - Optional seed for deterministic randomness
   */
  static generate(seed?: string): VRFResult {
    const actualSeed = seed || randomBytes(32).toString('hex');

    const value = this.hashValue(actualSeed);
    const proof = this.hashProof(actualSeed, value);

    return {
      value,
      proof,
      seed: actualSeed,
      timestamp: Date.now(),
    };
  }

  /**
   * Verify a VRF result by recomputing value and proof from its seed
   */
  static verify(result: VRFResult): boolean {
    const expectedValue = this.hashValue(result.seed);
    if (expectedValue !== result.value) {
      return false;
    }

    return this.hashProof(result.seed, result.value) === result.proof;
  }

  /**
   * Derive `count` 256-bit words; word i comes from `${seed}:${i}`.
   */
  static toRandomWords(seed: string, count: number): { words: bigint[]; proofs: string[] } {
    const words: bigint[] = [];
    const proofs: string[] = [];

    for (let i = 0; i < count; i++) {
      const vrf = this.generate(`${seed}:${i}`);
      words.push(BigInt(`0x${vrf.value}`));
      proofs.push(vrf.proof);
    }

    return { words, proofs };
  }

  static isRandomWord(word: bigint): boolean {
    return word >= 0n && word < this.WORD_LIMIT;
  }

  private static hashValue(seed: string): string {
    const valueHash = createHash(this.HASH_ALGORITHM);
    valueHash.update(seed);
    valueHash.update('value');
    return valueHash.digest('hex');
  }

  private static hashProof(seed: string, value: string): string {
    const proofHash = createHash(this.HASH_ALGORITHM);
    proofHash.update(seed);
    proofHash.update('proof');
    proofHash.update(value);
    return proofHash.digest('hex');
  }
}
