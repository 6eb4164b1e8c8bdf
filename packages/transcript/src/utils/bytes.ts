import { concatBytes as nobleConcatBytes } from "@noble/hashes/utils";
import { TranscriptTruncatedError } from "../errors.js";

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  return nobleConcatBytes(...parts);
}

export function u32le(n: number): Uint8Array {
  if (!Number.isInteger(n) || n < 0 || n > 0xffffffff) {
    throw new Error(`u32le: invalid value ${n}`);
  }
  const out = new Uint8Array(4);
  out[0] = n & 0xff;
  out[1] = (n >>> 8) & 0xff;
  out[2] = (n >>> 16) & 0xff;
  out[3] = (n >>> 24) & 0xff;
  return out;
}

export function u32FromBytesLE(bytes: Uint8Array): number {
  if (bytes.length !== 4) throw new Error("u32FromBytesLE: expected 4 bytes");
  return (bytes[0] | (bytes[1] << 8) | (bytes[2] << 16) | (bytes[3] << 24)) >>> 0;
}

export function bytesToHex(bytes: Uint8Array): string {
  let hex = "";
  for (const b of bytes) hex += b.toString(16).padStart(2, "0");
  return hex;
}

export function hexToBytes(hex: string): Uint8Array {
  const h = hex.startsWith("0x") ? hex.slice(2) : hex;
  if (h.length % 2 !== 0) throw new Error("hexToBytes: invalid length");
  const out = new Uint8Array(h.length / 2);
  for (let i = 0; i < out.length; i++) {
    const byte = Number.parseInt(h.slice(i * 2, i * 2 + 2), 16);
    if (!Number.isFinite(byte)) throw new Error("hexToBytes: invalid hex");
    out[i] = byte;
  }
  return out;
}

export function utf8(s: string): Uint8Array {
  return new TextEncoder().encode(s);
}

export function bytesToBigintLE(bytes: Uint8Array): bigint {
  let x = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) {
    x = (x << 8n) + BigInt(bytes[i]);
  }
  return x;
}

export function bigintToBytesLE(x: bigint, len: number): Uint8Array {
  if (x < 0n) throw new Error("bigintToBytesLE: negative");
  const out = new Uint8Array(len);
  let v = x;
  for (let i = 0; i < len; i++) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  if (v !== 0n) throw new Error("bigintToBytesLE: overflow");
  return out;
}

export function bitLength(x: bigint): number {
  let bits = 0;
  for (let v = x; v > 0n; v >>= 1n) bits++;
  return bits;
}

/** Sequential reader over a received transcript. */
export class Reader {
  readonly bytes: Uint8Array;
  off = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  get remaining(): number {
    return this.bytes.length - this.off;
  }

  take(n: number): Uint8Array {
    if (!Number.isInteger(n) || n < 0) throw new Error("Reader.take: invalid n");
    if (this.off + n > this.bytes.length) {
      throw new TranscriptTruncatedError(`transcript truncated: need ${n} bytes, ${this.remaining} left`, {
        offset: this.off,
        needed: n,
        available: this.remaining,
      });
    }
    const out = this.bytes.subarray(this.off, this.off + n);
    this.off += n;
    return out;
  }

  takeU32LE(): number {
    return u32FromBytesLE(this.take(4));
  }

  done(): boolean {
    return this.off === this.bytes.length;
  }
}
