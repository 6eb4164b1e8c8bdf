import type { ChallengeSampler, Codec } from "./codec.js";
import { resolveConfig } from "./config.js";
import type { TranscriptConfig } from "./config.js";
import type { DomainSeparator } from "./domainSeparator.js";
import { drawEntropy, systemEntropy } from "./entropy.js";
import type { EntropySource } from "./entropy.js";
import { ProtocolMismatchError, isTranscriptError } from "./errors.js";
import { createLogger } from "./log.js";
import type { Logger } from "./log.js";
import { SafeSponge, drawChallenges } from "./safe.js";
import { keccakSponge } from "./sponge/keccak.js";
import type { DuplexSponge } from "./sponge/duplex.js";
import type { Permutation } from "./sponge/permutation.js";
import type { Unit } from "./sponge/unit.js";
import { concatBytes, u32le } from "./utils/bytes.js";

/** Bytes of public-sponge digest mixed into every private draw. */
export const PUBLIC_DIGEST_BYTES = 32;

export type ProverOptions = {
  /** Source of fresh randomness; defaults to the platform CSPRNG. */
  entropy?: EntropySource;
  /** Private seed. Copied; drawn from `entropy` when absent. */
  seed?: Uint8Array;
  config?: Partial<TranscriptConfig>;
};

/**
 * Prover-side private randomness.
 *
 * Each draw absorbs a digest of the public transcript, the private seed and
 * fresh entropy into a private Keccak duplex sponge, squeezes, then ratchets.
 * The output stays unpredictable as long as either the seed or the entropy
 * source is sound, and is bound to the transcript it was drawn for.
 */
export class ProverPrivateRng {
  private readonly sponge: DuplexSponge<number>;
  private readonly seed: Uint8Array;
  private readonly entropy: EntropySource;
  private readonly entropyBytes: number;
  private readonly publicDigest: () => Uint8Array;
  private readonly logger: Logger;

  constructor(params: {
    domain: Uint8Array;
    seed: Uint8Array;
    entropy: EntropySource;
    entropyBytes: number;
    publicDigest: () => Uint8Array;
    logger: Logger;
  }) {
    this.sponge = keccakSponge();
    this.sponge.absorb(Array.from(params.domain));
    this.seed = params.seed;
    this.entropy = params.entropy;
    this.entropyBytes = params.entropyBytes;
    this.publicDigest = params.publicDigest;
    this.logger = params.logger;
  }

  fillBytes(dest: Uint8Array): void {
    const fresh = new Uint8Array(this.entropyBytes);
    const digest = this.publicDigest();
    const secrets: number[][] = [];
    try {
      drawEntropy(this.entropy, fresh);
      const digestUnits = Array.from(digest);
      const seedUnits = Array.from(this.seed);
      const freshUnits = Array.from(fresh);
      secrets.push(digestUnits, seedUnits, freshUnits);
      this.sponge.absorb(digestUnits);
      this.sponge.absorb(seedUnits);
      this.sponge.absorb(freshUnits);
      const out = this.sponge.squeeze(dest.length);
      secrets.push(out);
      dest.set(out);
      this.sponge.ratchet();
    } catch (err) {
      if (isTranscriptError(err) && err.code === "ENTROPY_SOURCE") {
        this.logger.error("private randomness unavailable", err.cause);
      }
      throw err;
    } finally {
      fresh.fill(0);
      digest.fill(0);
      for (const units of secrets) units.fill(0);
    }
  }

  wipe(): void {
    this.seed.fill(0);
    this.sponge.wipe();
  }
}

/**
 * Prover transcript (Arthur).
 *
 * Prover messages are absorbed and appended to the transcript; public values
 * are absorbed only; challenges are squeezed. Every call is checked against
 * the domain separator by a {@link SafeSponge}.
 */
export class ProverTranscript<U> {
  readonly domainSeparator: DomainSeparator;
  readonly rng: ProverPrivateRng;
  readonly config: TranscriptConfig;
  private readonly safe: SafeSponge<U>;
  private readonly unit: Unit<U>;
  private readonly logger: Logger;
  private readonly chunks: Uint8Array[] = [];
  private closed = false;

  constructor(domainSeparator: DomainSeparator, permutation: Permutation<U>, options: ProverOptions = {}) {
    this.domainSeparator = domainSeparator;
    this.config = resolveConfig(options.config);
    this.logger = createLogger(this.config.logLevel);
    this.unit = permutation.unit;
    this.safe = new SafeSponge(domainSeparator.compile(), permutation, this.logger);

    const entropy = options.entropy ?? systemEntropy;
    let seed: Uint8Array;
    if (options.seed) {
      if (options.seed.length === 0) throw new Error("ProverTranscript: empty seed");
      seed = Uint8Array.from(options.seed);
    } else {
      seed = new Uint8Array(this.config.privateSeedBytes);
      drawEntropy(entropy, seed);
    }

    const digestUnits = Math.ceil(PUBLIC_DIGEST_BYTES / this.unit.byteSize);
    this.rng = new ProverPrivateRng({
      domain: domainSeparator.toBytes(),
      seed,
      entropy,
      entropyBytes: this.config.entropyBytes,
      publicDigest: () => this.unit.write(this.safe.digest(digestUnits)),
      logger: this.logger,
    });
  }

  get isComplete(): boolean {
    return this.safe.isComplete;
  }

  get cursor() {
    return this.safe.cursor;
  }

  addUnits(units: readonly U[]): void {
    this.assertOpen();
    const encoded = this.unit.write(units);
    this.safe.absorb(units);
    this.chunks.push(encoded);
  }

  addPublicUnits(units: readonly U[]): void {
    this.assertOpen();
    this.safe.absorb(units);
  }

  challengeUnits(count: number): U[] {
    this.assertOpen();
    return this.safe.squeeze(count);
  }

  addValues<T>(codec: Codec<T, U>, values: readonly T[]): void {
    this.addUnits(values.flatMap((v) => codec.encode(v)));
  }

  addPublicValues<T>(codec: Codec<T, U>, values: readonly T[]): void {
    this.addPublicUnits(values.flatMap((v) => codec.encode(v)));
  }

  challengeValues<T>(sampler: ChallengeSampler<T, U>, count: number): T[] {
    this.assertOpen();
    return drawChallenges(this.safe, sampler, count);
  }

  addBytes(this: ProverTranscript<number>, bytes: Uint8Array): void {
    this.addUnits(Array.from(bytes));
  }

  addPublicBytes(this: ProverTranscript<number>, bytes: Uint8Array): void {
    this.addPublicUnits(Array.from(bytes));
  }

  challengeBytes(this: ProverTranscript<number>, count: number): Uint8Array {
    return Uint8Array.from(this.challengeUnits(count));
  }

  ratchet(): void {
    this.assertOpen();
    this.safe.ratchet();
  }

  /** Out-of-band data for the verifier: length-prefixed in the transcript, not absorbed. */
  hint(bytes: Uint8Array): void {
    this.assertOpen();
    this.safe.hint();
    this.chunks.push(u32le(bytes.length), Uint8Array.from(bytes));
  }

  randomBytes(count: number): Uint8Array {
    this.assertOpen();
    const out = new Uint8Array(count);
    this.rng.fillBytes(out);
    return out;
  }

  transcript(): Uint8Array {
    return concatBytes(...this.chunks);
  }

  /** Returns the transcript once every op has been played. Wipes secret state either way. */
  finish(): Uint8Array {
    this.assertOpen();
    try {
      this.safe.expectComplete();
      return this.transcript();
    } finally {
      this.wipe();
    }
  }

  wipe(): void {
    if (this.closed) return;
    this.closed = true;
    this.rng.wipe();
    this.safe.wipe();
  }

  private assertOpen(): void {
    if (this.closed) throw new ProtocolMismatchError("prover transcript already finished");
  }
}

export { ProverTranscript as Arthur };
