import type { ChallengeSampler, Codec } from "./codec.js";
import { PatternDeclarationError } from "./errors.js";
import { DuplexSponge } from "./sponge/duplex.js";
import { keccakSponge } from "./sponge/keccak.js";
import { IV_BYTES } from "./sponge/permutation.js";
import type { Permutation } from "./sponge/permutation.js";
import { utf8 } from "./utils/bytes.js";

export type OpKind = "absorb" | "squeeze" | "ratchet" | "hint";

export type PatternEntry = {
  readonly kind: OpKind;
  /** Units for absorb/squeeze; 1 for ratchet and hint. */
  readonly length: number;
  readonly label: string;
};

/** Entry of the coalesced queue the safe engine walks. */
export type PatternOp = {
  readonly kind: OpKind;
  readonly length: number;
  readonly labels: readonly string[];
};

export type CompiledPattern = {
  readonly protocol: string;
  readonly text: string;
  readonly entries: readonly PatternEntry[];
  readonly ops: readonly PatternOp[];
  readonly absorbLength: number;
  readonly squeezeLength: number;
  readonly iv: Uint8Array;
};

const SEP = "\0";
const OP_CODE: Record<OpKind, string> = { absorb: "A", squeeze: "S", ratchet: "R", hint: "H" };

function checkLabel(label: string, what: string): void {
  if (label.length === 0) throw new PatternDeclarationError(`${what}: empty label`);
  if (label.includes(SEP)) throw new PatternDeclarationError(`${what}: label contains NUL`, { label });
  if (/^[0-9]/.test(label)) {
    throw new PatternDeclarationError(`${what}: label must not start with a digit`, { label });
  }
}

function checkLength(length: number, label: string): void {
  if (!Number.isSafeInteger(length) || length < 1) {
    throw new PatternDeclarationError(`invalid length ${length} for "${label}": must be a positive integer`, {
      label,
      length,
    });
  }
}

function coalesce(entries: readonly PatternEntry[]): PatternOp[] {
  const ops: { kind: OpKind; length: number; labels: string[] }[] = [];
  for (const e of entries) {
    const last = ops[ops.length - 1];
    const mergeable = e.kind === "absorb" || e.kind === "squeeze";
    if (mergeable && last !== undefined && last.kind === e.kind) {
      last.length += e.length;
      last.labels.push(e.label);
    } else {
      ops.push({ kind: e.kind, length: e.length, labels: [e.label] });
    }
  }
  return ops;
}

/**
 * Append-only description of the absorb/squeeze schedule of a protocol.
 *
 * Every append returns a new value, so a shared prefix can be extended in
 * several directions. The textual form binds the protocol label and every
 * entry; it is hashed into the IV of the transcript sponge.
 */
export class DomainSeparator {
  readonly protocol: string;
  readonly entries: readonly PatternEntry[];
  private compiled?: CompiledPattern;

  private constructor(protocol: string, entries: readonly PatternEntry[]) {
    this.protocol = protocol;
    this.entries = entries;
  }

  static new(protocol: string): DomainSeparator {
    if (protocol.length === 0) throw new PatternDeclarationError("empty protocol label");
    if (protocol.includes(SEP)) throw new PatternDeclarationError("protocol label contains NUL", { protocol });
    return new DomainSeparator(protocol, []);
  }

  static parse(text: string): DomainSeparator {
    const [protocol, ...segments] = text.split(SEP);
    let ds = DomainSeparator.new(protocol);
    for (const seg of segments) {
      const code = seg.slice(0, 1);
      const rest = seg.slice(1);
      if (code === "A" || code === "S") {
        const m = /^([0-9]+)([\s\S]*)$/.exec(rest);
        if (!m) throw new PatternDeclarationError(`missing length in "${seg}"`);
        const length = Number.parseInt(m[1], 10);
        ds = code === "A" ? ds.absorb(length, m[2]) : ds.squeeze(length, m[2]);
      } else if (code === "R") {
        if (rest !== "") throw new PatternDeclarationError(`unexpected data after ratchet: "${rest}"`);
        ds = ds.ratchet();
      } else if (code === "H") {
        ds = ds.hint(rest);
      } else {
        throw new PatternDeclarationError(`unknown op "${code}"`, { segment: seg });
      }
    }
    return ds;
  }

  absorb(length: number, label: string): DomainSeparator {
    checkLabel(label, "absorb");
    checkLength(length, label);
    return this.push({ kind: "absorb", length, label });
  }

  squeeze(length: number, label: string): DomainSeparator {
    checkLabel(label, "squeeze");
    checkLength(length, label);
    return this.push({ kind: "squeeze", length, label });
  }

  ratchet(): DomainSeparator {
    return this.push({ kind: "ratchet", length: 1, label: "ratchet" });
  }

  /** An out-of-band prover hint: written to the transcript, never absorbed. */
  hint(label: string): DomainSeparator {
    checkLabel(label, "hint");
    return this.push({ kind: "hint", length: 1, label });
  }

  absorbValues<T, U>(codec: Codec<T, U>, count: number, label: string): DomainSeparator {
    checkLength(count, label);
    return this.absorb(codec.unitsPerValue * count, label);
  }

  challengeValues<T, U>(sampler: ChallengeSampler<T, U>, count: number, label: string): DomainSeparator {
    checkLength(count, label);
    return this.squeeze(sampler.unitsPerChallenge * count, label);
  }

  toString(): string {
    let text = this.protocol;
    for (const e of this.entries) {
      const len = e.kind === "absorb" || e.kind === "squeeze" ? String(e.length) : "";
      const label = e.kind === "ratchet" ? "" : e.label;
      text += `${SEP}${OP_CODE[e.kind]}${len}${label}`;
    }
    return text;
  }

  toBytes(): Uint8Array {
    return utf8(this.toString());
  }

  compile(): CompiledPattern {
    if (this.compiled) return this.compiled;
    const text = this.toString();
    const tagSponge = keccakSponge(new Uint8Array(IV_BYTES));
    tagSponge.absorb(Array.from(utf8(text)));
    const iv = Uint8Array.from(tagSponge.squeeze(IV_BYTES));

    let absorbLength = 0;
    let squeezeLength = 0;
    for (const e of this.entries) {
      if (e.kind === "absorb") absorbLength += e.length;
      if (e.kind === "squeeze") squeezeLength += e.length;
    }

    this.compiled = Object.freeze({
      protocol: this.protocol,
      text,
      entries: this.entries,
      ops: Object.freeze(coalesce(this.entries)),
      absorbLength,
      squeezeLength,
      iv,
    });
    return this.compiled;
  }

  sponge<U>(permutation: Permutation<U>): DuplexSponge<U> {
    return new DuplexSponge(permutation, this.compile().iv);
  }

  private push(entry: PatternEntry): DomainSeparator {
    return new DomainSeparator(this.protocol, Object.freeze([...this.entries, Object.freeze(entry)]));
  }
}
