/**
 * Server configuration from environment variables and the command line
 */

import path from 'node:path';
import { z } from 'zod/v4';
import { SAFETY_LEVELS, type SafetyLevel } from './linker/safety.js';
import { DEFAULT_CONFIDENCE_THRESHOLD } from './linker/safeLinker.js';
import { DEFAULT_OPENAI_MODEL } from './semantic/classifier.js';

export const DEFAULT_BACKUP_DIR_NAME = 'vault_linker_backups';

export interface Config {
  vaultPath: string;
  backupDir: string;
  safetyLevel: SafetyLevel;
  confidenceThreshold: number;
  openAiApiKey?: string;
  openAiModel: string;
}

const envSchema = z.object({
  VAULT_PATH: z.string().min(1, 'vault path is required (VAULT_PATH or first argument)'),
  VAULT_LINKER_BACKUP_DIR: z.string().min(1).optional(),
  VAULT_LINKER_SAFETY_LEVEL: z.enum(SAFETY_LEVELS).default('conservative'),
  VAULT_LINKER_CONFIDENCE: z.coerce.number().min(0).max(1).default(DEFAULT_CONFIDENCE_THRESHOLD),
  OPENAI_API_KEY: z.string().min(1).optional(),
  VAULT_LINKER_OPENAI_MODEL: z.string().min(1).default(DEFAULT_OPENAI_MODEL),
});

/**
 * Build the configuration. Empty variables count as unset. Throws an Error
 * naming every invalid key.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  argv: readonly string[] = process.argv.slice(2),
  cwd: string = process.cwd(),
): Config {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]?.trim();
    if (value) raw[key] = value;
  }
  raw.VAULT_PATH = argv[0] || raw.VAULT_PATH || '';

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }

  const parsed = result.data;
  return {
    vaultPath: path.resolve(cwd, parsed.VAULT_PATH),
    backupDir: path.resolve(cwd, parsed.VAULT_LINKER_BACKUP_DIR ?? DEFAULT_BACKUP_DIR_NAME),
    safetyLevel: parsed.VAULT_LINKER_SAFETY_LEVEL,
    confidenceThreshold: parsed.VAULT_LINKER_CONFIDENCE,
    openAiApiKey: parsed.OPENAI_API_KEY,
    openAiModel: parsed.VAULT_LINKER_OPENAI_MODEL,
  };
}
