export {
  type TranscriptErrorCode,
  TranscriptError,
  PatternDeclarationError,
  ProtocolMismatchError,
  TranscriptTruncatedError,
  CodecDecodingError,
  EntropySourceError,
  isTranscriptError,
} from "./errors.js";
export { type LogLevel, type TranscriptConfig, LOG_LEVELS, loadConfig, resolveConfig } from "./config.js";
export { type Logger, createLogger } from "./log.js";
export {
  Reader,
  bigintToBytesLE,
  bitLength,
  bytesToBigintLE,
  bytesToHex,
  concatBytes,
  hexToBytes,
  u32le,
  utf8,
} from "./utils/bytes.js";
export { type Unit, assertWholeUnits, byteUnit } from "./sponge/unit.js";
export { type Permutation, IV_BYTES } from "./sponge/permutation.js";
export { DuplexSponge } from "./sponge/duplex.js";
export { KECCAK_RATE, KECCAK_WIDTH, keccakF1600, keccakSponge } from "./sponge/keccak.js";
export {
  type Codec,
  type ChallengeSampler,
  SAMPLING_MARGIN_BYTES,
  bytesChallenge,
  bytesCodec,
  u32Codec,
  u64Codec,
  uniformBelow,
} from "./codec.js";
export {
  type CompiledPattern,
  type OpKind,
  type PatternEntry,
  type PatternOp,
  DomainSeparator,
} from "./domainSeparator.js";
export { type SafeCursor, type SafeStatus, SafeSponge, drawChallenges } from "./safe.js";
export { type EntropySource, drawEntropy, systemEntropy } from "./entropy.js";
export {
  type ProverOptions,
  Arthur,
  PUBLIC_DIGEST_BYTES,
  ProverPrivateRng,
  ProverTranscript,
} from "./prover.js";
export { type VerifierOptions, Merlin, VerifierTranscript } from "./verifier.js";
export { type ProveResult, type VerifyResult, prove, verify } from "./session.js";
export { type Hierarchy, type Kind, Interaction, Length, lengthToString } from "./pattern/interaction.js";
export { type PatternErrorReason, InteractionPattern } from "./pattern/interactionPattern.js";
export { HierarchicalPattern } from "./pattern/pattern.js";
export { PatternState } from "./pattern/patternState.js";
export { PatternPlayer } from "./pattern/patternPlayer.js";
