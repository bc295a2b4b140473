/**
 * Pipeline configuration
 *
 * Loads datasources.yml (js-yaml), applies environment overrides (.env via
 * dotenv) and validates the result once.
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import * as dotenv from 'dotenv';
import { z } from 'zod';

const positiveInt = z.number().int().positive();

const ConfigSchema = z.object({
  source: z.object({
    baseUrl: z.string().url(),
    userAgent: z.string().min(1),
    timeoutMs: positiveInt,
    resultsTimezone: z.coerce.string().default('0'),
    payloadDecoder: z.enum(['json', 'aes']).default('json'),
    payloadPassword: z.string().optional(),
    payloadSalt: z.string().optional(),
  }),
  retry: z.object({
    maxAttempts: positiveInt,
    initialDelayMs: positiveInt,
    maxDelayMs: positiveInt,
  }),
  budget: z.object({
    burst: positiveInt,
    sustained: positiveInt,
    burstWindowMs: positiveInt,
    sustainedWindowMs: positiveInt,
    maxConcurrency: positiveInt,
  }),
  pipeline: z.object({
    maxConcurrentMatches: positiveInt,
    maxConcurrentMarkets: positiveInt,
    clockSkewToleranceSeconds: z.number().nonnegative(),
    defaultBettingTypes: z.array(positiveInt).min(1),
    defaultScopes: z.array(positiveInt).min(1),
  }),
  tokenExtraction: z.object({
    strategies: z.array(z.enum(['header', 'substitution'])).min(1),
    substitution: z.object({
      valuePattern: z.string().min(1),
      tablePattern: z.string().min(1),
    }),
  }),
  databaseUrl: z.string().optional(),
});

export type PipelineConfig = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

/**
 * Merge environment overrides into the parsed YAML document and validate.
 */
export function parseConfig(document: unknown, env: Env = process.env): PipelineConfig {
  const raw = isRecord(document) ? { ...document } : {};
  const source = section(raw, 'source');
  const budget = section(raw, 'budget');

  if (env.ODDS_BASE_URL) source.baseUrl = env.ODDS_BASE_URL;
  if (env.ODDS_PAYLOAD_PASSWORD) source.payloadPassword = env.ODDS_PAYLOAD_PASSWORD;
  if (env.ODDS_PAYLOAD_SALT) source.payloadSalt = env.ODDS_PAYLOAD_SALT;
  if (env.ODDS_MAX_CONCURRENCY) budget.maxConcurrency = parseInt(env.ODDS_MAX_CONCURRENCY, 10);

  const result = ConfigSchema.safeParse({
    ...raw,
    source,
    budget,
    databaseUrl: env.DATABASE_URL,
  });

  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const config = result.data;
  config.source.baseUrl = config.source.baseUrl.replace(/\/+$/, '');
  return config;
}

export function loadConfig(configPath: string = 'datasources.yml'): PipelineConfig {
  dotenv.config();

  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    console.error('[CONFIG] FATAL: Config file not found at', resolved);
    throw new Error(`${configPath} not found`);
  }

  const document = yaml.load(fs.readFileSync(resolved, 'utf8'));
  return parseConfig(document);
}
