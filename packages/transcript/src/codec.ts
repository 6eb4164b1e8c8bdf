import { CodecDecodingError } from "./errors.js";
import { bigintToBytesLE, bitLength, bytesToBigintLE } from "./utils/bytes.js";

/**
 * Fixed-width conversion between values and sponge units.
 * `decode(encode(x))` returns `x`; `decode` only ever throws {@link CodecDecodingError}.
 */
export interface Codec<T, U> {
  readonly name: string;
  readonly unitsPerValue: number;
  encode(value: T): U[];
  decode(units: readonly U[]): T;
}

/**
 * Turns squeezed units into a challenge value. `draw` returns
 * `unitsPerChallenge` units; the first call is the declared squeeze, later
 * calls are re-draws for rejected samples.
 */
export interface ChallengeSampler<T, U> {
  readonly name: string;
  readonly unitsPerChallenge: number;
  sample(draw: () => U[]): T;
}

/** Extra bytes drawn above the modulus size before rejection. */
export const SAMPLING_MARGIN_BYTES = 16;

function expectUnits(name: string, units: readonly unknown[], n: number): void {
  if (units.length !== n) {
    throw new CodecDecodingError(`${name}: expected ${n} units, got ${units.length}`, { codec: name });
  }
}

function toByteArray(name: string, units: readonly number[]): Uint8Array {
  const out = new Uint8Array(units.length);
  for (let i = 0; i < units.length; i++) {
    const u = units[i];
    if (!Number.isInteger(u) || u < 0 || u > 0xff) {
      throw new CodecDecodingError(`${name}: unit ${i} is not a byte`, { codec: name, index: i });
    }
    out[i] = u;
  }
  return out;
}

export function bytesCodec(length: number): Codec<Uint8Array, number> {
  if (!Number.isInteger(length) || length < 1) throw new Error("bytesCodec: invalid length");
  const name = `bytes${length}`;
  return {
    name,
    unitsPerValue: length,
    encode(value) {
      if (value.length !== length) throw new Error(`${name}: expected ${length} bytes, got ${value.length}`);
      return Array.from(value);
    },
    decode(units) {
      expectUnits(name, units, length);
      return toByteArray(name, units);
    },
  };
}

function unsignedCodec(name: string, width: number): Codec<bigint, number> {
  const max = 1n << BigInt(8 * width);
  return {
    name,
    unitsPerValue: width,
    encode(value) {
      if (value < 0n || value >= max) throw new Error(`${name}: value out of range`);
      return Array.from(bigintToBytesLE(value, width));
    },
    decode(units) {
      expectUnits(name, units, width);
      return bytesToBigintLE(toByteArray(name, units));
    },
  };
}

export const u32Codec: Codec<bigint, number> = unsignedCodec("u32", 4);
export const u64Codec: Codec<bigint, number> = unsignedCodec("u64", 8);

export function bytesChallenge(length: number): ChallengeSampler<Uint8Array, number> {
  const codec = bytesCodec(length);
  return {
    name: codec.name,
    unitsPerChallenge: length,
    sample: (draw) => codec.decode(draw()),
  };
}

/**
 * Uniform integer in `[0, modulus)` from byte units by rejection sampling.
 *
 * Each draw is read as a little-endian integer `x` of `k` bytes; `x` is
 * accepted when below the largest multiple of `modulus` that fits in `8k`
 * bits, and reduced. Rejected draws are replaced by fresh ones.
 */
export function uniformBelow(modulus: bigint, name = `uniform<${modulus}>`): ChallengeSampler<bigint, number> {
  if (modulus < 2n) throw new Error("uniformBelow: modulus must be >= 2");
  const k = Math.ceil(bitLength(modulus) / 8) + SAMPLING_MARGIN_BYTES;
  const space = 1n << BigInt(8 * k);
  const limit = space - (space % modulus);
  return {
    name,
    unitsPerChallenge: k,
    sample(draw) {
      for (;;) {
        const x = bytesToBigintLE(toByteArray(name, draw()));
        if (x < limit) return x % modulus;
      }
    },
  };
}
