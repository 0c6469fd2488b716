/**
 * Shared test fixtures: temp dirs, a pre-configured Dbee, captured CLI output.
 */
import { mkdtempSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { runCli, type CliIO } from "../src/cli.js";
import type { KdfConfig } from "../src/config.js";
import { Dbee, type RawConfig } from "../src/index.js";
import { silentLogger } from "../src/logger.js";

/** Cheapest scrypt settings the config accepts. */
export const FAST_KDF: KdfConfig = { cost: 10, blockSize: 8, parallelization: 1 };

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "dbee-test-"));
}

export function makeDbee(config: RawConfig = {}): Dbee {
  return Dbee.fromConfig({ kdf: FAST_KDF, ...config }, silentLogger());
}

/** A fresh database file holding an empty table with `headers`. */
export async function makeTable(
  dbee: Dbee,
  headers: string[] = ["No", "Title"],
): Promise<string> {
  const path = join(makeTmpDir(), "t.db");
  await dbee.makeDatabase(path);
  await dbee.createTable(path, headers);
  return path;
}

// ---------------------------------------------------------------------------
// CLI
// ---------------------------------------------------------------------------

export interface CliRun {
  code: number;
  out: string[];
  err: string[];
}

export async function cli(...argv: string[]): Promise<CliRun> {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    out: (text) => out.push(text),
    err: (text) => err.push(text),
  };
  const code = await runCli(argv, { io, logger: silentLogger() });
  return { code, out, err };
}
