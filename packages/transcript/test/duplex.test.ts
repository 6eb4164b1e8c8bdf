import { describe, expect, it } from "vitest";

import { DuplexSponge, bytesToHex, hexToBytes, keccakF1600, keccakSponge, utf8 } from "../src/index.js";

const iv = (tag: string) => {
  const bytes = utf8(tag);
  expect(bytes.length).toBe(32);
  return bytes;
};

const absorbStr = (s: DuplexSponge<number>, str: string) => s.absorb(Array.from(utf8(str)));
const squeezeHex = (s: DuplexSponge<number>, n: number) => bytesToHex(Uint8Array.from(s.squeeze(n)));

const HELLO_64 =
  "73e4a040a956f57693fb2b2dde8a8ea2c14d39ff8830060cd0301d6de25b2097" +
  "ba858efedeeb89368eaf7c94a68f62835f932b5f0dd0ba376c48a0fdb5e21f0c";

describe("keccak duplex sponge", () => {
  it("matches the reference output for a single absorb/squeeze", () => {
    const sponge = keccakSponge(iv("unit_tests_keccak_tag___________"));
    absorbStr(sponge, "Hello, World!");
    expect(Uint8Array.from(sponge.squeeze(64))).toEqual(hexToBytes(HELLO_64));
  });

  it("ignores empty absorbs and squeezes", () => {
    const sponge = keccakSponge(iv("unit_tests_keccak_tag___________"));
    sponge.squeeze(0);
    sponge.absorb([]);
    absorbStr(sponge, "Hello, World!");
    sponge.absorb([]);
    sponge.squeeze(0);
    expect(squeezeHex(sponge, 64)).toBe(HELLO_64);
  });

  it("continues after absorb/squeeze/absorb", () => {
    const sponge = keccakSponge(iv("edge-case-test-domain-absorb0000"));
    absorbStr(sponge, "first");
    sponge.squeeze(32);
    absorbStr(sponge, "second");
    expect(squeezeHex(sponge, 32)).toBe("20ce6da64ffc09df8de254222c068358da39d23ec43e522ceaaa1b82b90c8b9a");
  });

  it("absorbing in pieces equals absorbing at once", () => {
    const tag = iv("absorb-associativity-domain-----");
    const expected = "7dfada182d6191e106ce287c2262a443ce2fb695c7cc5037a46626e88889af58";

    const one = keccakSponge(tag);
    absorbStr(one, "hello world");

    const two = keccakSponge(tag);
    absorbStr(two, "hello");
    absorbStr(two, " world");

    expect(one.equals(two)).toBe(true);
    expect(squeezeHex(one, 32)).toBe(expected);
    expect(squeezeHex(two, 32)).toBe(expected);
  });

  it("the IV changes the output", () => {
    const a = keccakSponge(iv("domain-one-differs-here-00000000"));
    const b = keccakSponge(iv("domain-two-differs-here-00000000"));
    absorbStr(a, "input");
    absorbStr(b, "input");
    expect(squeezeHex(a, 32)).toBe("2ecad63584ec0ff7f31edb822530762e5cb4b7dc1a62b1ffe02c43f3073a61b8");
    expect(squeezeHex(b, 32)).toBe("6310fa0356e1bab0442fa19958e1c4a6d1dcc565b2b139b6044d1a809f531825");
  });

  it("is chunk-invariant across several rate blocks", () => {
    const input = Array.from({ length: 3 * 200 + 7 }, (_, i) => (i * 31 + 7) & 0xff);
    const whole = keccakSponge();
    whole.absorb(input);

    const pieces = keccakSponge();
    for (const size of [1, 135, 136, 137, 64, 134]) {
      pieces.absorb(input.splice(0, size));
    }
    pieces.absorb(input);

    expect(pieces.equals(whole)).toBe(true);
    expect(pieces.squeeze(300)).toEqual(whole.squeeze(300));
  });

  it("squeezes one contiguous stream across calls", () => {
    const a = keccakSponge();
    const b = keccakSponge();
    a.absorb([1, 2, 3]);
    b.absorb([1, 2, 3]);

    const whole = a.squeeze(400);
    const parts = [...b.squeeze(1), ...b.squeeze(135), ...b.squeeze(136), ...b.squeeze(128)];
    expect(parts).toEqual(whole);
  });

  it("ratchet zeroes the rate and changes the stream", () => {
    const a = keccakSponge();
    const b = keccakSponge();
    a.absorb([9, 9, 9]);
    b.absorb([9, 9, 9]);
    b.ratchet();
    expect(b.squeeze(32)).not.toEqual(a.squeeze(32));
  });

  it("clone is independent of its source", () => {
    const a = keccakSponge();
    a.absorb([4, 5, 6]);
    const c = a.clone();
    expect(c.equals(a)).toBe(true);
    const fromClone = c.squeeze(16);
    expect(c.equals(a)).toBe(false);
    expect(a.squeeze(16)).toEqual(fromClone);
  });

  it("wipe resets the state to zero", () => {
    const a = keccakSponge();
    a.absorb([1, 2, 3]);
    a.wipe();
    expect(a.equals(new DuplexSponge(keccakF1600, new Uint8Array(32)))).toBe(true);
  });

  it("rejects an IV of the wrong size", () => {
    expect(() => new DuplexSponge(keccakF1600, new Uint8Array(16))).toThrow(/32-byte IV/);
  });
});
