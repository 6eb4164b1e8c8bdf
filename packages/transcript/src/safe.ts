import type { ChallengeSampler } from "./codec.js";
import type { CompiledPattern, OpKind, PatternOp } from "./domainSeparator.js";
import { ProtocolMismatchError } from "./errors.js";
import type { Logger } from "./log.js";
import { DuplexSponge } from "./sponge/duplex.js";
import type { Permutation } from "./sponge/permutation.js";

export type SafeStatus = "ready" | "failed";

export type SafeCursor = {
  readonly position: number;
  readonly remaining: number;
  readonly status: SafeStatus;
};

function describeOp(op: PatternOp | undefined, remaining: number): string {
  if (!op) return "end of pattern";
  const labels = op.labels.join("+");
  return op.kind === "absorb" || op.kind === "squeeze" ? `${op.kind}(${remaining}) [${labels}]` : `${op.kind} [${labels}]`;
}

/**
 * Sponge gated by a compiled pattern.
 *
 * Every operation must match the kind of the op under the cursor and fit in
 * what is left of it; a request may consume part of an op and the next
 * request continues where it stopped. The first violation moves the engine to
 * `failed` for good.
 */
export class SafeSponge<U> {
  readonly pattern: CompiledPattern;
  private readonly sponge: DuplexSponge<U>;
  private readonly logger?: Logger;
  private position = 0;
  private remaining: number;
  private status: SafeStatus = "ready";

  constructor(pattern: CompiledPattern, permutation: Permutation<U>, logger?: Logger) {
    this.pattern = pattern;
    this.sponge = new DuplexSponge(permutation, pattern.iv);
    this.logger = logger;
    this.remaining = pattern.ops[0]?.length ?? 0;
  }

  get permutation(): Permutation<U> {
    return this.sponge.permutation;
  }

  get cursor(): SafeCursor {
    return { position: this.position, remaining: this.remaining, status: this.status };
  }

  get isComplete(): boolean {
    return this.status === "ready" && this.position >= this.pattern.ops.length;
  }

  /** The op the next request must match, if any. */
  get expected(): PatternOp | undefined {
    return this.pattern.ops[this.position];
  }

  absorb(units: readonly U[]): void {
    this.assertReady("absorb");
    if (units.length === 0) return;
    this.request("absorb", units.length);
    this.sponge.absorb(units);
  }

  squeeze(count: number): U[] {
    this.assertLength("squeeze", count);
    if (count === 0) return [];
    this.request("squeeze", count);
    return this.sponge.squeeze(count);
  }

  ratchet(): void {
    this.request("ratchet", 1);
    this.sponge.ratchet();
  }

  /** Consumes a hint op; hints never touch the sponge. */
  hint(): void {
    this.request("hint", 1);
  }

  /** Re-draw for a rejected challenge sample. Not counted against the pattern. */
  resample(count: number): U[] {
    this.assertLength("resample", count);
    return this.sponge.squeeze(count);
  }

  /** Squeeze from a copy of the sponge, leaving the transcript state untouched. */
  digest(count: number): U[] {
    this.assertLength("digest", count);
    const copy = this.sponge.clone();
    try {
      return copy.squeeze(count);
    } finally {
      copy.wipe();
    }
  }

  expectComplete(): void {
    this.assertReady("finish");
    if (this.position < this.pattern.ops.length) {
      throw new ProtocolMismatchError(
        `transcript incomplete: expected ${describeOp(this.expected, this.remaining)} at op ${this.position}`,
        { position: this.position, remaining: this.remaining, expected: this.expected?.kind },
      );
    }
  }

  wipe(): void {
    this.sponge.wipe();
  }

  /**
   * Rejects a request length that is not a non-negative safe integer. The
   * engine fails before the cursor moves.
   */
  assertLength(action: string, length: number): void {
    this.assertReady(action);
    if (Number.isSafeInteger(length) && length >= 0) return;
    this.fail(`invalid ${action} length ${length} at op ${this.position}`, {
      position: this.position,
      actual: { kind: action, length },
    });
  }

  private assertReady(action: string): void {
    if (this.status === "failed") {
      throw new ProtocolMismatchError(`${action} on a failed transcript`, { position: this.position });
    }
  }

  private fail(msg: string, details: Record<string, unknown>): never {
    this.status = "failed";
    this.logger?.warn(`${this.pattern.protocol}: ${msg}`);
    throw new ProtocolMismatchError(msg, details);
  }

  private request(kind: OpKind, length: number): void {
    this.assertLength(kind, length);
    const op = this.expected;
    if (!op || op.kind !== kind || length > this.remaining) {
      this.fail(
        `pattern mismatch at op ${this.position}: got ${kind}(${length}), expected ${describeOp(op, this.remaining)}`,
        {
          position: this.position,
          expected: op ? { kind: op.kind, remaining: this.remaining, labels: op.labels } : null,
          actual: { kind, length },
        },
      );
    }

    this.logger?.debug(`${this.pattern.protocol}: ${kind}(${length}) at op ${this.position}`);
    this.remaining -= length;
    if (this.remaining === 0) {
      this.position += 1;
      this.remaining = this.pattern.ops[this.position]?.length ?? 0;
    }
  }
}

/**
 * Samples `count` challenges: each takes its declared squeeze first and falls
 * back to re-draws only when the sampler rejects.
 */
export function drawChallenges<T, U>(safe: SafeSponge<U>, sampler: ChallengeSampler<T, U>, count: number): T[] {
  const n = sampler.unitsPerChallenge;
  const out: T[] = [];
  for (let i = 0; i < count; i++) {
    let first = true;
    out.push(
      sampler.sample(() => {
        if (!first) return safe.resample(n);
        first = false;
        return safe.squeeze(n);
      }),
    );
  }
  return out;
}
