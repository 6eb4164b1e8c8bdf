export type TranscriptErrorCode =
  | "PATTERN_DECLARATION"
  | "PROTOCOL_MISMATCH"
  | "TRANSCRIPT_TRUNCATED"
  | "CODEC_DECODING"
  | "ENTROPY_SOURCE";

export class TranscriptError extends Error {
  readonly code: TranscriptErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: TranscriptErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TranscriptError";
    this.code = code;
    this.details = details;
  }
}

/** Malformed domain separator or interaction pattern. Always a programming bug. */
export class PatternDeclarationError extends TranscriptError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PATTERN_DECLARATION", message, details);
    this.name = "PatternDeclarationError";
  }
}

/** A runtime operation disagreed with the compiled pattern. Fatal to the transcript. */
export class ProtocolMismatchError extends TranscriptError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PROTOCOL_MISMATCH", message, details);
    this.name = "ProtocolMismatchError";
  }
}

export class TranscriptTruncatedError extends TranscriptError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("TRANSCRIPT_TRUNCATED", message, details);
    this.name = "TranscriptTruncatedError";
  }
}

export class CodecDecodingError extends TranscriptError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CODEC_DECODING", message, details);
    this.name = "CodecDecodingError";
  }
}

export class EntropySourceError extends TranscriptError {
  constructor(message: string, cause: unknown) {
    super("ENTROPY_SOURCE", message, undefined, { cause });
    this.name = "EntropySourceError";
  }
}

export function isTranscriptError(err: unknown): err is TranscriptError {
  return err instanceof TranscriptError;
}
