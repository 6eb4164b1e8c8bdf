import { Field, getMinHashLength, mapHashToField } from "@noble/curves/abstract/modular";
import type { IField } from "@noble/curves/abstract/modular";
import { bytesToNumberBE, bytesToNumberLE } from "@noble/curves/abstract/utils";
import { ed25519 } from "@noble/curves/ed25519";
import { secp256k1 } from "@noble/curves/secp256k1";
import {
  CodecDecodingError,
  assertWholeUnits,
  bytesCodec,
  concatBytes,
  uniformBelow,
} from "@duplexfs/transcript";
import type { ChallengeSampler, Codec, ProverTranscript, Unit } from "@duplexfs/transcript";

export type PrimeField = IField<bigint>;

// Ristretto255 shares ed25519's scalar field; little-endian like the curve's own encoding.
export const ed25519ScalarField: PrimeField = Field(ed25519.CURVE.n, undefined, true);
export const secp256k1ScalarField: PrimeField = Field(secp256k1.CURVE.n);

function assertElement(field: PrimeField, x: bigint, where: string): void {
  if (!field.isValid(x)) throw new Error(`${where}: value is not a canonical field element`);
}

function fieldName(field: PrimeField): string {
  return `F(${field.BITS} bits)`;
}

function decodeElement(field: PrimeField, bytes: Uint8Array, name: string): bigint {
  if (bytes.length !== field.BYTES) {
    throw new CodecDecodingError(`${name}: expected ${field.BYTES} bytes, got ${bytes.length}`, { codec: name });
  }
  const x = field.isLE ? bytesToNumberLE(bytes) : bytesToNumberBE(bytes);
  if (!field.isValid(x)) throw new CodecDecodingError(`${name}: non-canonical field element (>= order)`, { codec: name });
  return x;
}

/** Field elements over a byte sponge, in the field's fixed-width encoding. */
export function fieldCodec(field: PrimeField): Codec<bigint, number> {
  const name = fieldName(field);
  const raw = bytesCodec(field.BYTES);
  return {
    name,
    unitsPerValue: field.BYTES,
    encode(value) {
      assertElement(field, value, name);
      return Array.from(field.toBytes(value));
    },
    decode(units) {
      return decodeElement(field, raw.decode(units), name);
    },
  };
}

/** Uniform field-element challenges over a byte sponge, by rejection sampling. */
export function fieldChallenge(field: PrimeField): ChallengeSampler<bigint, number> {
  return uniformBelow(field.ORDER, fieldName(field));
}

/** Field elements as the sponge alphabet itself. */
export function fieldUnit(field: PrimeField): Unit<bigint> {
  const name = fieldName(field);
  const unit: Unit<bigint> = {
    name,
    byteSize: field.BYTES,
    zero: () => field.ZERO,
    write(units) {
      return concatBytes(
        ...units.map((u) => {
          assertElement(field, u, name);
          return field.toBytes(u);
        }),
      );
    },
    read(bytes) {
      const n = assertWholeUnits(unit, bytes);
      const out: bigint[] = [];
      for (let i = 0; i < n; i++) {
        out.push(decodeElement(field, bytes.subarray(i * field.BYTES, (i + 1) * field.BYTES), name));
      }
      return out;
    },
  };
  return unit;
}

/** Direct embedding for sponges whose alphabet is the field. */
export function nativeFieldCodec(field: PrimeField): Codec<bigint, bigint> {
  const name = fieldName(field);
  return {
    name,
    unitsPerValue: 1,
    encode(value) {
      assertElement(field, value, name);
      return [value];
    },
    decode(units) {
      const [x] = units;
      if (units.length !== 1 || x === undefined) {
        throw new CodecDecodingError(`${name}: expected 1 unit, got ${units.length}`, { codec: name });
      }
      if (!field.isValid(x)) throw new CodecDecodingError(`${name}: non-canonical field element`, { codec: name });
      return x;
    },
  };
}

/** Native squeezes are already uniform field elements. */
export function nativeFieldChallenge(field: PrimeField): ChallengeSampler<bigint, bigint> {
  const codec = nativeFieldCodec(field);
  return {
    name: codec.name,
    unitsPerChallenge: 1,
    sample: (draw) => codec.decode(draw()),
  };
}

/** Non-zero field element from the prover's private randomness (e.g. a blinding factor). */
export function randomFieldElement<U>(prover: ProverTranscript<U>, field: PrimeField): bigint {
  const seed = prover.randomBytes(getMinHashLength(field.ORDER));
  try {
    return bytesToNumberBE(mapHashToField(seed, field.ORDER));
  } finally {
    seed.fill(0);
  }
}
