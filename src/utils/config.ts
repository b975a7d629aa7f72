/**
 * Configuration loading for Reseller Ledger
 *
 * Loads config from ~/.reseller-ledger/.env and ~/.reseller-ledger/reseller.json
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { createLogger } from './logger';

const logger = createLogger('config');

// Load .env file from ~/.reseller-ledger/.env first, then CWD fallback
dotenvConfig({ path: join(homedir(), '.reseller-ledger', '.env') });
dotenvConfig(); // CWD fallback (won't override existing vars)

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.RESELLER_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.reseller-ledger');
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.RESELLER_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), 'reseller.json');
}

// Header names as an array or one pipe-separated string ("Current price|Start price")
const headerListSchema = z
  .union([z.string().transform((value) => value.split('|')), z.array(z.string())])
  .pipe(z.array(z.string().trim().min(1)).min(1));

const configSchema = z.object({
  database: z
    .object({
      path: z.string().min(1).optional(),
      backupMax: z.coerce.number().int().min(1).default(10),
    })
    .default({}),
  drafts: z
    .object({
      defaultCategoryId: z.string().min(1).default('47140'),
      defaultConditionId: z.coerce.number().int().positive().default(3000),
      format: z.string().min(1).default('FixedPrice'),
      template: z.string().min(1).default('eBay-draft-listings-template_US'),
    })
    .default({}),
  import: z
    .object({
      delimiter: z
        .string()
        .length(1)
        .refine((value) => !['"', '\r', '\n'].includes(value), 'Delimiter cannot be a quote or line break')
        .default(','),
      // field -> header names, e.g. { "sku": ["Artikelnummer"] }
      mappings: z
        .object({
          listing: z.record(z.string(), headerListSchema).default({}),
          order: z.record(z.string(), headerListSchema).default({}),
        })
        .default({}),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;
export type DraftSettings = Config['drafts'];
export type ImportSettings = Config['import'];

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
function substituteEnvVars(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
      return env[varName] ?? '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVars(item, env));
  }
  if (obj && typeof obj === 'object') {
    const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (DANGEROUS_KEYS.has(key)) continue;
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

/** Defaults for every setting; the database path is derived from the state dir. */
export function defaultConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const config = configSchema.parse({});
  config.database.path = join(resolveStateDir(env), 'reseller.db');
  return config;
}

/**
 * Load configuration from file and environment.
 *
 * A missing file yields the defaults. An unreadable or invalid file is logged
 * and the defaults are used instead.
 */
export function loadConfig(customPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  const configPath = customPath ?? resolveConfigPath(env);
  const defaults = defaultConfig(env);

  if (!existsSync(configPath)) {
    return defaults;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    logger.error({ configPath, error: err instanceof Error ? err.message : String(err) }, 'Failed to parse config file');
    return defaults;
  }

  const parsed = configSchema.safeParse(substituteEnvVars(raw, env));
  if (!parsed.success) {
    logger.error({ configPath, issues: parsed.error.issues }, 'Invalid config file, using defaults');
    return defaults;
  }

  const config = parsed.data;
  config.database.path = config.database.path
    ? resolveUserPath(config.database.path)
    : defaults.database.path;
  return config;
}
