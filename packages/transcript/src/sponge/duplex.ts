import { IV_BYTES, assertPermutationShape } from "./permutation.js";
import type { Permutation } from "./permutation.js";

/**
 * Duplex sponge in overwrite mode.
 *
 * Input overwrites the rate region starting at the absorb cursor; output is
 * read from the rate region at the squeeze cursor. The permutation runs lazily
 * (only when a cursor hits the rate and more work remains), so the state after
 * a sequence of absorbs depends on the concatenated input alone.
 */
export class DuplexSponge<U> {
  readonly permutation: Permutation<U>;
  private state: U[];
  private absorbPos: number;
  private squeezePos: number;

  constructor(permutation: Permutation<U>, iv: Uint8Array) {
    assertPermutationShape(permutation);
    if (iv.length !== IV_BYTES) throw new Error(`DuplexSponge: expected ${IV_BYTES}-byte IV`);
    this.permutation = permutation;
    this.state = permutation.initialState(iv);
    if (this.state.length !== permutation.width) {
      throw new Error(`${permutation.name}: initial state has ${this.state.length} units`);
    }
    this.absorbPos = 0;
    this.squeezePos = permutation.rate;
  }

  get rate(): number {
    return this.permutation.rate;
  }

  absorb(input: readonly U[]): this {
    const rate = this.rate;
    this.squeezePos = rate;

    let off = 0;
    while (off < input.length) {
      if (this.absorbPos === rate) {
        this.permute();
        this.absorbPos = 0;
        continue;
      }
      const chunk = Math.min(input.length - off, rate - this.absorbPos);
      for (let i = 0; i < chunk; i++) this.state[this.absorbPos + i] = input[off + i];
      this.absorbPos += chunk;
      off += chunk;
    }
    return this;
  }

  squeeze(count: number): U[] {
    if (!Number.isInteger(count) || count < 0) throw new Error("DuplexSponge.squeeze: invalid count");
    const out: U[] = [];
    if (count === 0) return out;

    const rate = this.rate;
    this.absorbPos = 0;
    while (out.length < count) {
      if (this.squeezePos === rate) {
        this.squeezePos = 0;
        this.permute();
      }
      const chunk = Math.min(count - out.length, rate - this.squeezePos);
      for (let i = 0; i < chunk; i++) out.push(this.state[this.squeezePos + i]);
      this.squeezePos += chunk;
    }
    return out;
  }

  /** Permute and zero the rate so earlier outputs cannot be recomputed from the state. */
  ratchet(): this {
    this.permute();
    const zero = this.permutation.unit.zero();
    for (let i = 0; i < this.rate; i++) this.state[i] = zero;
    this.squeezePos = this.rate;
    return this;
  }

  clone(): DuplexSponge<U> {
    const copy = new DuplexSponge(this.permutation, new Uint8Array(IV_BYTES));
    copy.state = this.state.slice();
    copy.absorbPos = this.absorbPos;
    copy.squeezePos = this.squeezePos;
    return copy;
  }

  equals(other: DuplexSponge<U>): boolean {
    if (this.absorbPos !== other.absorbPos || this.squeezePos !== other.squeezePos) return false;
    const unit = this.permutation.unit;
    const a = unit.write(this.state);
    const b = unit.write(other.state);
    if (a.length !== b.length) return false;
    let diff = 0;
    for (let i = 0; i < a.length; i++) diff |= a[i] ^ b[i];
    return diff === 0;
  }

  wipe(): void {
    this.state.fill(this.permutation.unit.zero());
    this.absorbPos = 0;
    this.squeezePos = this.rate;
  }

  private permute(): void {
    const next = this.permutation.permute(this.state);
    if (next.length !== this.permutation.width) {
      throw new Error(`${this.permutation.name}: permutation changed the state width`);
    }
    if (next !== this.state) this.state.fill(this.permutation.unit.zero());
    this.state = next;
  }
}
