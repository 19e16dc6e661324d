/**
 * Runtime configuration from the environment.
 * Values may be set in .env.local; every setting has a default.
 */

import * as dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });

export interface ExtractorConfig {
  /** Ghostscript executable used to render PDFs to text */
  ghostscriptBin: string;
  /** Kill the Ghostscript process after this long */
  pdfTextTimeoutMs: number;
  /** Attempt history database, used when --db is not given */
  historyDbPath: string | null;
}

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const value = env[key];
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Environment variable "${key}" must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExtractorConfig {
  return {
    ghostscriptBin: env.GHOSTSCRIPT_BIN || 'gs',
    pdfTextTimeoutMs: readPositiveInt(env, 'PDF_TEXT_TIMEOUT_MS', 60000),
    historyDbPath: env.EXAM_HISTORY_DB || null,
  };
}
