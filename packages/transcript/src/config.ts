import { z } from "zod";

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const TranscriptConfigSchema = z.object({
  /** Minimum level written to the console. */
  logLevel: z.enum(LOG_LEVELS),
  /** Throw (rather than warn) when a prover session ends with pattern ops left. */
  strictFinish: z.boolean(),
  /** Size of the prover's private seed when none is supplied. */
  privateSeedBytes: z.number().int().min(16).max(1024),
  /** Fresh entropy drawn for every private randomness request. */
  entropyBytes: z.number().int().min(16).max(1024),
});

export type TranscriptConfig = z.infer<typeof TranscriptConfigSchema>;

type Env = Record<string, string | undefined>;

function envStr(env: Env, key: string, fallback: string): string {
  return (env[key] ?? "").trim() || fallback;
}

function envBool(env: Env, key: string, fallback: boolean): boolean {
  const v = (env[key] ?? "").trim().toLowerCase();
  if (!v) return fallback;
  return v === "1" || v === "true" || v === "yes";
}

function envInt(env: Env, key: string, fallback: number): number {
  const v = (env[key] ?? "").trim();
  if (!v) return fallback;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : fallback;
}

function validate(raw: unknown): TranscriptConfig {
  const parsed = TranscriptConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`invalid transcript config: ${issues}`);
  }
  return parsed.data;
}

export function loadConfig(env: Env = process.env): TranscriptConfig {
  return validate({
    logLevel: envStr(env, "DUPLEXFS_LOG_LEVEL", "warn").toLowerCase(),
    strictFinish: envBool(env, "DUPLEXFS_STRICT_FINISH", true),
    privateSeedBytes: envInt(env, "DUPLEXFS_SEED_BYTES", 32),
    entropyBytes: envInt(env, "DUPLEXFS_ENTROPY_BYTES", 32),
  });
}

export function resolveConfig(overrides?: Partial<TranscriptConfig>): TranscriptConfig {
  return validate({ ...loadConfig(), ...overrides });
}
