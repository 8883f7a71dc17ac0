/**
 * Server configuration from the environment.
 *
 *   DMD_EXPORT_DIR   where export_dmd writes (default $TMPDIR/dmd-tools)
 *   DMD_LOG_LEVEL    debug | info | warn | error | silent (default info)
 */

import * as path from 'node:path';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './logger.js';

const EnvSchema = z.object({
  DMD_EXPORT_DIR: z.string().min(1, 'must not be empty').optional(),
  DMD_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  TMPDIR: z.string().optional(),
});

export interface ServerConfig {
  exportDir: string;
  logLevel: LogLevel;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration — ${issues.join('; ')}`);
  }
  const { DMD_EXPORT_DIR, DMD_LOG_LEVEL, TMPDIR } = parsed.data;
  return {
    exportDir: DMD_EXPORT_DIR ?? path.join(TMPDIR ?? '/tmp', 'dmd-tools'),
    logLevel: DMD_LOG_LEVEL,
  };
}
