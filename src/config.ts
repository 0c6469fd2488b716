/**
 * Configuration validation.
 */
import { z } from "zod";
import { InvalidArgumentsError } from "./core/exceptions.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** scrypt parameters used when locking a file. Unlock reads them from the envelope. */
export const KdfConfigSchema = z.object({
  /** log2 of the scrypt CPU/memory cost N. */
  cost: z.number().int().min(10).max(20).default(15),
  blockSize: z.number().int().min(1).max(32).default(8),
  parallelization: z.number().int().min(1).max(16).default(1),
});

export const ConfigSchema = z.object({
  table: z.string().trim().min(1, "table name must not be empty").default("data"),
  logLevel: z.enum(LOG_LEVELS).default("warn"),
  kdf: KdfConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type KdfConfig = z.infer<typeof KdfConfigSchema>;
export type RawConfig = z.input<typeof ConfigSchema>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function parseConfig(raw: RawConfig = {}): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new InvalidArgumentsError(`Invalid configuration: ${where}${issue.message}`);
  }
  return result.data;
}
