import type { ChallengeSampler, Codec } from "./codec.js";
import { resolveConfig } from "./config.js";
import type { TranscriptConfig } from "./config.js";
import type { DomainSeparator } from "./domainSeparator.js";
import { ProtocolMismatchError } from "./errors.js";
import { createLogger } from "./log.js";
import { SafeSponge, drawChallenges } from "./safe.js";
import type { Permutation } from "./sponge/permutation.js";
import type { Unit } from "./sponge/unit.js";
import { Reader } from "./utils/bytes.js";

export type VerifierOptions = {
  config?: Partial<TranscriptConfig>;
};

/**
 * Verifier transcript (Merlin).
 *
 * Replays the prover's schedule from the domain separator and the received
 * transcript bytes alone; it holds no secret and draws no randomness.
 */
export class VerifierTranscript<U> {
  readonly domainSeparator: DomainSeparator;
  readonly config: TranscriptConfig;
  private readonly safe: SafeSponge<U>;
  private readonly unit: Unit<U>;
  private readonly reader: Reader;

  constructor(
    domainSeparator: DomainSeparator,
    permutation: Permutation<U>,
    transcript: Uint8Array,
    options: VerifierOptions = {},
  ) {
    this.domainSeparator = domainSeparator;
    this.config = resolveConfig(options.config);
    this.unit = permutation.unit;
    this.safe = new SafeSponge(domainSeparator.compile(), permutation, createLogger(this.config.logLevel));
    this.reader = new Reader(Uint8Array.from(transcript));
  }

  get isComplete(): boolean {
    return this.safe.isComplete;
  }

  get cursor() {
    return this.safe.cursor;
  }

  get remainingBytes(): number {
    return this.reader.remaining;
  }

  nextUnits(count: number): U[] {
    this.safe.assertLength("absorb", count);
    const units = this.unit.read(this.reader.take(count * this.unit.byteSize));
    this.safe.absorb(units);
    return units;
  }

  addPublicUnits(units: readonly U[]): void {
    this.safe.absorb(units);
  }

  challengeUnits(count: number): U[] {
    return this.safe.squeeze(count);
  }

  nextValues<T>(codec: Codec<T, U>, count: number): T[] {
    const units = this.nextUnits(codec.unitsPerValue * count);
    const out: T[] = [];
    for (let i = 0; i < count; i++) {
      out.push(codec.decode(units.slice(i * codec.unitsPerValue, (i + 1) * codec.unitsPerValue)));
    }
    return out;
  }

  addPublicValues<T>(codec: Codec<T, U>, values: readonly T[]): void {
    this.addPublicUnits(values.flatMap((v) => codec.encode(v)));
  }

  challengeValues<T>(sampler: ChallengeSampler<T, U>, count: number): T[] {
    return drawChallenges(this.safe, sampler, count);
  }

  nextBytes(this: VerifierTranscript<number>, count: number): Uint8Array {
    return Uint8Array.from(this.nextUnits(count));
  }

  addPublicBytes(this: VerifierTranscript<number>, bytes: Uint8Array): void {
    this.addPublicUnits(Array.from(bytes));
  }

  challengeBytes(this: VerifierTranscript<number>, count: number): Uint8Array {
    return Uint8Array.from(this.challengeUnits(count));
  }

  ratchet(): void {
    this.safe.ratchet();
  }

  hint(): Uint8Array {
    this.safe.hint();
    const len = this.reader.takeU32LE();
    return Uint8Array.from(this.reader.take(len));
  }

  /** Accept only a fully replayed pattern with no transcript bytes left over. */
  finish(): void {
    this.safe.expectComplete();
    if (!this.reader.done()) {
      throw new ProtocolMismatchError(`${this.reader.remaining} trailing transcript bytes`, {
        trailing: this.reader.remaining,
      });
    }
  }
}

export { VerifierTranscript as Merlin };
