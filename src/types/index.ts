export * from './lottery';

export interface VRFResult {
  value: string;
  proof: string;
  seed: string;
  /** Wall-clock milliseconds (Date.now) at generation, unlike the engine's seconds Clock. */
  timestamp: number;
}
