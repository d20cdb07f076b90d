import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { parseLogLevel } from './logger.js';

const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

export const DEFAULT_CONFIG_PATH = join(homedir(), '.tradebridge', 'config.yaml');

const ConfigSchema = z.object({
  ledger: z
    .object({
      dbPath: z.string().optional(),
      initialUsd: z.number().nonnegative().default(10_000),
    })
    .default({}),
  rateLimit: z
    .object({
      // Matches Binance's public weight budget.
      maxCalls: z.number().int().positive().default(1200),
      windowMs: z.number().int().positive().default(60_000),
    })
    .default({}),
  exchange: z
    .object({
      provider: z.enum(['binance', 'none']).default('binance'),
      baseUrl: z.string().default('https://api.binance.com'),
      defaultQuote: z
        .string()
        .regex(/^[A-Za-z0-9]+$/)
        .transform((value) => value.toUpperCase())
        .default('USDT'),
      timeoutMs: z.number().int().positive().default(10_000),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type TradeBridgeConfig = z.infer<typeof ConfigSchema>;

export function parseConfig(raw: unknown): TradeBridgeConfig {
  return ConfigSchema.parse(raw ?? {});
}

export function loadConfig(configPath?: string): TradeBridgeConfig {
  const explicit = configPath || process.env.TRADEBRIDGE_CONFIG_PATH || undefined;
  const path = explicit ?? DEFAULT_CONFIG_PATH;

  // Only an explicitly requested file has to exist.
  let parsed: unknown = {};
  if (explicit || existsSync(path)) {
    const raw = readFileSync(path, 'utf-8');
    parsed = yaml.parse(raw) ?? {};
  }

  const cfg = parseConfig(parsed);

  const envDbPath = process.env.TRADEBRIDGE_DB_PATH;
  if (envDbPath) {
    cfg.ledger.dbPath = envDbPath;
  }

  const envLevel = process.env.TRADEBRIDGE_LOG_LEVEL;
  if (envLevel) {
    cfg.logging.level = parseLogLevel(envLevel, cfg.logging.level);
  }

  if (cfg.ledger.dbPath) {
    cfg.ledger.dbPath = expandHome(cfg.ledger.dbPath);
  }

  return cfg;
}
