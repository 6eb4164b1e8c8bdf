import { describe, expect, it } from "vitest";
import { Field } from "@noble/curves/abstract/modular";
import {
  DomainSeparator,
  type Permutation,
  ProverTranscript,
  VerifierTranscript,
  bytesToBigintLE,
  prove,
  utf8,
  verify,
} from "@duplexfs/transcript";

import { fieldUnit, nativeFieldChallenge, nativeFieldCodec } from "../src/index.js";

// x^5 is a bijection here since gcd(5, p - 1) = 1.
const F = Field(2n ** 31n - 1n);
const QUIET = { logLevel: "silent" } as const;

/** Toy width-3 power-map permutation. Not secure; exercises the generic sponge. */
const toyPermutation: Permutation<bigint> = {
  name: "toy-pow5",
  unit: fieldUnit(F),
  width: 3,
  rate: 2,
  initialState(iv) {
    return [F.ZERO, F.ZERO, F.create(bytesToBigintLE(iv))];
  },
  permute(state) {
    let s = state.slice();
    for (let round = 0; round < 8; round++) {
      s = s.map((x, i) => F.pow(F.add(x, BigInt(3 * round + i + 1)), 5n));
      const sum = s.reduce((acc, x) => F.add(acc, x), F.ZERO);
      s = s.map((x) => F.add(x, sum));
    }
    return s;
  },
};

const codec = nativeFieldCodec(F);
const sampler = nativeFieldChallenge(F);
const ds = DomainSeparator.new("native-sponge").absorbValues(codec, 5, "m").challengeValues(sampler, 2, "c");
const message = [5n, 7n, 11n, 13n, 17n];

describe("native field sponge", () => {
  it("writes prover messages in the field encoding", () => {
    const { transcript, output } = prove(
      ds,
      toyPermutation,
      (p) => {
        p.addValues(codec, message);
        return p.challengeValues(sampler, 2);
      },
      { seed: utf8("seed"), config: QUIET },
    );
    expect(transcript.subarray(0, 8)).toEqual(Uint8Array.from([0, 0, 0, 5, 0, 0, 0, 7]));
    expect(transcript).toHaveLength(20);
    for (const c of output) expect(F.isValid(c)).toBe(true);

    const result = verify(
      ds,
      toyPermutation,
      transcript,
      (v) => {
        const m = v.nextValues(codec, 5);
        const c = v.challengeValues(sampler, 2);
        return m.join() === message.join() && c.join() === output.join();
      },
      { config: QUIET },
    );
    expect(result).toEqual({ ok: true });
  });

  it("is chunk-invariant across rate blocks", () => {
    const whole = new ProverTranscript(ds, toyPermutation, { seed: utf8("s"), config: QUIET });
    whole.addValues(codec, message);

    const split = new ProverTranscript(ds, toyPermutation, { seed: utf8("s"), config: QUIET });
    split.addValues(codec, message.slice(0, 3));
    split.addValues(codec, message.slice(3));

    expect(split.challengeValues(sampler, 2)).toEqual(whole.challengeValues(sampler, 2));
  });

  it("rejects a non-canonical element in the transcript", () => {
    const bytes = new Uint8Array(20);
    bytes.fill(0xff, 0, 4);
    const result = verify(ds, toyPermutation, bytes, (v) => v.nextValues(codec, 5).length === 5, { config: QUIET });
    expect(result).toEqual({
      ok: false,
      error: "F(31 bits): non-canonical field element (>= order)",
      code: "CODEC_DECODING",
    });
  });

  it("separates protocols by label", () => {
    const other = DomainSeparator.new("native-sponge").absorbValues(codec, 5, "n").challengeValues(sampler, 2, "c");
    const a = new VerifierTranscript(ds, toyPermutation, new Uint8Array(0), { config: QUIET });
    const b = new VerifierTranscript(other, toyPermutation, new Uint8Array(0), { config: QUIET });
    a.addPublicValues(codec, message);
    b.addPublicValues(codec, message);
    expect(a.challengeValues(sampler, 2)).not.toEqual(b.challengeValues(sampler, 2));
  });

  it("draws private randomness over a field sponge", () => {
    const prover = new ProverTranscript(ds, toyPermutation, { seed: utf8("s"), config: QUIET });
    prover.addValues(codec, message);
    expect(prover.randomBytes(16)).toHaveLength(16);
  });
});
