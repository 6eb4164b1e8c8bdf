import { keccakP } from "@noble/hashes/sha3";
import { byteSwap32, isLE, u32 } from "@noble/hashes/utils";
import { DuplexSponge } from "./duplex.js";
import { IV_BYTES } from "./permutation.js";
import type { Permutation } from "./permutation.js";
import { byteUnit } from "./unit.js";

export const KECCAK_WIDTH = 200;
export const KECCAK_RATE = 136;

/**
 * Keccak-f[1600] over its 200-byte little-endian lane layout.
 *
 * A duplex sponge built on this is not SHA-3: it runs in overwrite mode with
 * no padding, the IV sits in the first 32 capacity bytes.
 */
export const keccakF1600: Permutation<number> = {
  name: "keccak-f1600",
  unit: byteUnit,
  width: KECCAK_WIDTH,
  rate: KECCAK_RATE,

  initialState(iv) {
    const state = new Array<number>(KECCAK_WIDTH).fill(0);
    for (let i = 0; i < IV_BYTES; i++) state[KECCAK_RATE + i] = iv[i];
    return state;
  },

  permute(state) {
    const buf = Uint8Array.from(state);
    const lanes = u32(buf);
    if (!isLE) byteSwap32(lanes);
    keccakP(lanes);
    if (!isLE) byteSwap32(lanes);
    const out = Array.from(buf);
    buf.fill(0);
    return out;
  },
};

export function keccakSponge(iv: Uint8Array = new Uint8Array(IV_BYTES)): DuplexSponge<number> {
  return new DuplexSponge(keccakF1600, iv);
}
