import type { Unit } from "./unit.js";

export const IV_BYTES = 32;

/**
 * A fixed-width cryptographic permutation. The first `rate` units of the state
 * are the public rate; the remaining `width - rate` are the capacity.
 */
export interface Permutation<U> {
  readonly name: string;
  readonly unit: Unit<U>;
  readonly width: number;
  readonly rate: number;
  /** Zero state with the 32-byte IV written into the capacity. */
  initialState(iv: Uint8Array): U[];
  permute(state: readonly U[]): U[];
}

export function assertPermutationShape(p: Permutation<unknown>): void {
  if (!Number.isInteger(p.rate) || !Number.isInteger(p.width) || p.rate < 1) {
    throw new Error(`${p.name}: invalid rate/width`);
  }
  if (p.width <= p.rate) throw new Error(`${p.name}: capacity must be > 0`);
}
