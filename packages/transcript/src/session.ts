import type { DomainSeparator } from "./domainSeparator.js";
import { isTranscriptError } from "./errors.js";
import type { TranscriptErrorCode } from "./errors.js";
import { createLogger } from "./log.js";
import { ProverTranscript } from "./prover.js";
import type { ProverOptions } from "./prover.js";
import type { Permutation } from "./sponge/permutation.js";
import { VerifierTranscript } from "./verifier.js";
import type { VerifierOptions } from "./verifier.js";

export type ProveResult<T> = {
  transcript: Uint8Array;
  output: T;
};

export type VerifyResult = { ok: true } | { ok: false; error: string; code?: TranscriptErrorCode };

/**
 * Runs a prover and returns its transcript. The prover's secret state is wiped
 * when this returns or throws.
 */
export function prove<U, T>(
  domainSeparator: DomainSeparator,
  permutation: Permutation<U>,
  body: (prover: ProverTranscript<U>) => T,
  options: ProverOptions = {},
): ProveResult<T> {
  const prover = new ProverTranscript(domainSeparator, permutation, options);
  try {
    const output = body(prover);
    if (prover.isComplete || prover.config.strictFinish) {
      return { transcript: prover.finish(), output };
    }
    createLogger(prover.config.logLevel).warn(
      `${domainSeparator.protocol}: prover finished with pattern ops left at op ${prover.cursor.position}`,
    );
    return { transcript: prover.transcript(), output };
  } finally {
    prover.wipe();
  }
}

/**
 * Replays a transcript and reports acceptance. Transcript errors (mismatch,
 * truncation, decoding) become rejections; anything else propagates.
 */
export function verify<U>(
  domainSeparator: DomainSeparator,
  permutation: Permutation<U>,
  transcript: Uint8Array,
  body: (verifier: VerifierTranscript<U>) => boolean,
  options: VerifierOptions = {},
): VerifyResult {
  const verifier = new VerifierTranscript(domainSeparator, permutation, transcript, options);
  const logger = createLogger(verifier.config.logLevel);
  try {
    if (!body(verifier)) {
      logger.debug(`${domainSeparator.protocol}: proof rejected by verifier`);
      return { ok: false, error: "proof rejected" };
    }
    verifier.finish();
    return { ok: true };
  } catch (err) {
    if (!isTranscriptError(err)) throw err;
    logger.debug(`${domainSeparator.protocol}: ${err.message}`);
    return { ok: false, error: err.message, code: err.code };
  }
}
