import { CodecDecodingError } from "../errors.js";

/**
 * Alphabet a sponge operates over.
 *
 * Every unit serializes to exactly `byteSize` bytes, and `read(write(xs))`
 * returns `xs`. `read` throws {@link CodecDecodingError} on a length that is
 * not a whole number of units or on a non-canonical unit encoding.
 */
export interface Unit<U> {
  readonly name: string;
  readonly byteSize: number;
  zero(): U;
  write(units: readonly U[]): Uint8Array;
  read(bytes: Uint8Array): U[];
}

export function assertWholeUnits(unit: Unit<unknown>, bytes: Uint8Array): number {
  if (bytes.length % unit.byteSize !== 0) {
    throw new CodecDecodingError(`${unit.name}: ${bytes.length} bytes is not a multiple of ${unit.byteSize}`, {
      unit: unit.name,
      length: bytes.length,
    });
  }
  return bytes.length / unit.byteSize;
}

export const byteUnit: Unit<number> = {
  name: "u8",
  byteSize: 1,
  zero: () => 0,
  write(units) {
    const out = new Uint8Array(units.length);
    for (let i = 0; i < units.length; i++) {
      const u = units[i];
      if (!Number.isInteger(u) || u < 0 || u > 0xff) throw new Error(`u8: invalid unit ${u}`);
      out[i] = u;
    }
    return out;
  },
  read(bytes) {
    return Array.from(bytes);
  },
};
