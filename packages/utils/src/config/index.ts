/**
 * Configuration loading from environment variables
 *
 * `.env` in the working directory is read once through dotenv; values already
 * present in the process environment win.
 */

import dotenv from 'dotenv';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError, SOURCE_TAGS, isSourceTag } from '@fxledger/core';
import type { SourceTag } from '@fxledger/core';

export interface FxLedgerConfig {
  /** Connection string; absent means the embedded SQLite file */
  databaseUrl?: string;
  sqlitePath: string;
  /** Display order for multi-source results */
  sourcePriority: SourceTag[];
  /** Rows per batch when copying between backends */
  batchSize: number;
}

export const DEFAULT_SOURCE_PRIORITY: readonly SourceTag[] = ['SBI', 'RBI'];

let dotenvLoaded = false;

function loadDotenvOnce(): void {
  if (dotenvLoaded) {
    return;
  }
  dotenv.config();
  dotenvLoaded = true;
}

const sourcePrioritySchema = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((token) => token.trim().toUpperCase())
      .filter((token) => token.length > 0)
  )
  .pipe(
    z
      .array(z.string().refine(isSourceTag, { message: `Expected one of ${SOURCE_TAGS.join(', ')}` }))
      .min(1)
  );

const envSchema = z.object({
  FXLEDGER_DB_URL: z.string().trim().min(1).optional(),
  FXLEDGER_SQLITE_PATH: z.string().trim().min(1).optional(),
  FXLEDGER_SOURCE_PRIORITY: sourcePrioritySchema.optional(),
  FXLEDGER_BATCH_SIZE: z.coerce.number().int().positive().default(500),
});

export function defaultSqlitePath(cwd: string = process.cwd()): string {
  return path.join(cwd, 'data', 'fxledger.db');
}

/**
 * Parse a comma-separated priority list into source tags, appending any
 * source left out so every source still appears in multi-source results.
 */
export function resolveSourcePriority(tokens: readonly string[]): SourceTag[] {
  const ordered: SourceTag[] = [];
  for (const token of tokens) {
    if (isSourceTag(token) && !ordered.includes(token)) {
      ordered.push(token);
    }
  }
  for (const tag of SOURCE_TAGS) {
    if (!ordered.includes(tag)) {
      ordered.push(tag);
    }
  }
  return ordered;
}

/**
 * Load fxledger configuration from the environment
 */
export function getFxLedgerConfig(env: NodeJS.ProcessEnv = process.env): FxLedgerConfig {
  if (env === process.env) {
    loadDotenvOnce();
  }

  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue ? String(issue.path[0] ?? '') : '';
    throw new ConfigurationError(
      `Invalid configuration${key ? ` for ${key}` : ''}: ${issue?.message ?? 'unknown error'}`,
      key || undefined,
      { issues: result.error.issues }
    );
  }

  const parsed = result.data;
  return {
    databaseUrl: parsed.FXLEDGER_DB_URL,
    sqlitePath: parsed.FXLEDGER_SQLITE_PATH ?? defaultSqlitePath(),
    sourcePriority: resolveSourcePriority(parsed.FXLEDGER_SOURCE_PRIORITY ?? DEFAULT_SOURCE_PRIORITY),
    batchSize: parsed.FXLEDGER_BATCH_SIZE,
  };
}
