export {
  type PrimeField,
  ed25519ScalarField,
  fieldChallenge,
  fieldCodec,
  fieldUnit,
  nativeFieldChallenge,
  nativeFieldCodec,
  randomFieldElement,
  secp256k1ScalarField,
} from "./field.js";
export {
  type GroupEncoding,
  type RistrettoElement,
  type Secp256k1Point,
  RISTRETTO_BYTES,
  SECP256K1_COMPRESSED_BYTES,
  groupCodec,
  ristretto255Codec,
  secp256k1Codec,
} from "./group.js";
