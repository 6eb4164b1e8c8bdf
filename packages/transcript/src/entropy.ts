import { randomBytes } from "@noble/hashes/utils";
import { EntropySourceError } from "./errors.js";

/** Supplies fresh unpredictable bytes. Implementations throw on failure. */
export interface EntropySource {
  fill(buffer: Uint8Array): void;
}

/** The platform CSPRNG (`crypto.getRandomValues`). */
export const systemEntropy: EntropySource = {
  fill(buffer) {
    const bytes = randomBytes(buffer.length);
    buffer.set(bytes);
    bytes.fill(0);
  },
};

export function drawEntropy(source: EntropySource, buffer: Uint8Array): void {
  try {
    source.fill(buffer);
  } catch (err) {
    buffer.fill(0);
    throw new EntropySourceError(`entropy source failed to supply ${buffer.length} bytes`, err);
  }
}
