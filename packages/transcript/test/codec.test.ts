import { describe, expect, it } from "vitest";

import {
  CodecDecodingError,
  DomainSeparator,
  ProverTranscript,
  SAMPLING_MARGIN_BYTES,
  VerifierTranscript,
  bytesChallenge,
  bytesCodec,
  keccakF1600,
  u32Codec,
  u64Codec,
  uniformBelow,
  utf8,
} from "../src/index.js";

describe("byte codecs", () => {
  it("encodes fixed-width byte strings", () => {
    const codec = bytesCodec(3);
    expect(codec.name).toBe("bytes3");
    expect(codec.encode(Uint8Array.from([7, 8, 9]))).toEqual([7, 8, 9]);
    expect(codec.decode([7, 8, 9])).toEqual(Uint8Array.from([7, 8, 9]));
    expect(() => codec.encode(Uint8Array.from([1]))).toThrow("bytes3: expected 3 bytes, got 1");
  });

  it("rejects wrong lengths and non-byte units on decode", () => {
    const codec = bytesCodec(2);
    expect(() => codec.decode([1])).toThrow(CodecDecodingError);
    expect(() => codec.decode([1, 256])).toThrow("bytes2: unit 1 is not a byte");
  });

  it("encodes unsigned integers little-endian", () => {
    expect(u32Codec.encode(0x01020304n)).toEqual([4, 3, 2, 1]);
    expect(u32Codec.decode([4, 3, 2, 1])).toBe(0x01020304n);
    expect(u64Codec.encode(2n ** 64n - 1n)).toEqual(new Array(8).fill(0xff));
    expect(u64Codec.decode([0, 0, 0, 0, 0, 0, 0, 0x80])).toBe(2n ** 63n);
    expect(() => u32Codec.encode(2n ** 32n)).toThrow("u32: value out of range");
    expect(() => u64Codec.encode(-1n)).toThrow("u64: value out of range");
    expect(() => u64Codec.decode([1, 2, 3])).toThrow("u64: expected 8 units, got 3");
  });

  it("bytesChallenge passes the squeezed bytes through", () => {
    const sampler = bytesChallenge(4);
    expect(sampler.sample(() => [9, 8, 7, 6])).toEqual(Uint8Array.from([9, 8, 7, 6]));
  });
});

describe("uniformBelow", () => {
  it("draws the modulus size plus the margin", () => {
    expect(uniformBelow(3n).unitsPerChallenge).toBe(1 + SAMPLING_MARGIN_BYTES);
    expect(uniformBelow(2n ** 255n - 19n).unitsPerChallenge).toBe(32 + SAMPLING_MARGIN_BYTES);
    expect(() => uniformBelow(1n)).toThrow("uniformBelow: modulus must be >= 2");
  });

  it("rejects draws at or above the largest multiple of the modulus", () => {
    // 2^136 mod 3 == 1, so the all-ones draw is the single rejected value.
    const sampler = uniformBelow(3n);
    const draws = [new Array<number>(17).fill(0xff), [5, ...new Array<number>(16).fill(0)]];
    let calls = 0;
    const value = sampler.sample(() => draws[calls++]);
    expect(value).toBe(2n);
    expect(calls).toBe(2);
  });

  it("accepts the top draw when the modulus divides the space", () => {
    let calls = 0;
    const value = uniformBelow(2n).sample(() => {
      calls++;
      return new Array<number>(17).fill(0xff);
    });
    expect(value).toBe(1n);
    expect(calls).toBe(1);
  });

  it("is roughly uniform over a small modulus", () => {
    const n = 7000;
    const sampler = uniformBelow(7n, "mod7");
    const ds = DomainSeparator.new("fairness").challengeValues(sampler, n, "c");
    const prover = new ProverTranscript(ds, keccakF1600, { seed: utf8("s"), config: { logLevel: "silent" } });
    const values = prover.challengeValues(sampler, n);
    expect(prover.isComplete).toBe(true);

    const buckets = new Array<number>(7).fill(0);
    for (const v of values) buckets[Number(v)]++;
    for (const count of buckets) {
      expect(count).toBeGreaterThan(850);
      expect(count).toBeLessThan(1150);
    }

    const verifier = new VerifierTranscript(ds, keccakF1600, new Uint8Array(0), { config: { logLevel: "silent" } });
    expect(verifier.challengeValues(sampler, n)).toEqual(values);
    verifier.finish();
  });
});
