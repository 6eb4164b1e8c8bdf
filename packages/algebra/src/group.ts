import { RistrettoPoint } from "@noble/curves/ed25519";
import { secp256k1 } from "@noble/curves/secp256k1";
import type { ProjPointType } from "@noble/curves/abstract/weierstrass";
import { CodecDecodingError, bytesCodec } from "@duplexfs/transcript";
import type { Codec } from "@duplexfs/transcript";

export type RistrettoElement = InstanceType<typeof RistrettoPoint>;
export type Secp256k1Point = ProjPointType<bigint>;

export type GroupEncoding<P> = {
  name: string;
  byteSize: number;
  toBytes(p: P): Uint8Array;
  fromBytes(bytes: Uint8Array): P;
};

/**
 * Byte-sponge codec for a group with a fixed-width canonical encoding.
 * Decoding re-encodes the point and rejects any input that does not round-trip.
 */
export function groupCodec<P>(encoding: GroupEncoding<P>): Codec<P, number> {
  const { name, byteSize } = encoding;
  const raw = bytesCodec(byteSize);
  return {
    name,
    unitsPerValue: byteSize,
    encode(p) {
      return Array.from(encoding.toBytes(p));
    },
    decode(units) {
      const bytes = raw.decode(units);
      let p: P;
      try {
        p = encoding.fromBytes(bytes);
      } catch (err) {
        throw new CodecDecodingError(`${name}: invalid encoding (${err instanceof Error ? err.message : String(err)})`, {
          codec: name,
        });
      }
      const rt = encoding.toBytes(p);
      for (let i = 0; i < bytes.length; i++) {
        if (rt[i] !== bytes[i]) throw new CodecDecodingError(`${name}: non-canonical encoding`, { codec: name });
      }
      return p;
    },
  };
}

export const RISTRETTO_BYTES = 32;
export const SECP256K1_COMPRESSED_BYTES = 33;

export const ristretto255Codec: Codec<RistrettoElement, number> = groupCodec<RistrettoElement>({
  name: "ristretto255",
  byteSize: RISTRETTO_BYTES,
  toBytes: (p) => p.toRawBytes(),
  fromBytes: (bytes) => RistrettoPoint.fromHex(bytes),
});

export const secp256k1Codec: Codec<Secp256k1Point, number> = groupCodec<Secp256k1Point>({
  name: "secp256k1",
  byteSize: SECP256K1_COMPRESSED_BYTES,
  toBytes: (p) => p.toRawBytes(true),
  fromBytes: (bytes) => secp256k1.ProjectivePoint.fromHex(bytes),
});
