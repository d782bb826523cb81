import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { ConfigError } from './errors.js';

const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

const ConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  storage: z
    .object({
      dbPath: z.string().default('~/.strikewatch/strikewatch.sqlite'),
      busyTimeoutMs: z.number().default(5000),
      tickRetentionMinutes: z.number().default(35),
    })
    .default({}),
  feed: z
    .object({
      wsUrl: z.string().default('wss://ws-feed.exchange.coinbase.com'),
      productId: z.string().default('BTC-USD'),
      staleAfterMs: z.number().default(5000),
      reorderWindowMs: z.number().default(250),
      reconnectBaseMs: z.number().default(500),
      maxBackoffMs: z.number().default(30_000),
      connectTimeoutMs: z.number().default(10_000),
    })
    .default({}),
  signals: z
    .object({
      volatilityWindowSeconds: z.number().default(30),
      // Percent of price, e.g. 0.03 means 0.03%.
      volatilityThresholdPct: z.number().default(0.03),
      maxGapSeconds: z.number().int().positive().default(60),
      momentumGainBps: z.number().default(15_000),
      momentumFullEffectMinutes: z.number().default(5),
      volatilityDampening: z.number().min(0).max(1).default(0.5),
      baseTablePath: z.string().optional(),
    })
    .default({}),
  entry: z
    .object({
      enabled: z.boolean().default(false),
      intervalMs: z.number().default(1000),
      minTtcSeconds: z.number().default(0),
      maxTtcSeconds: z.number().default(3600),
      marginBps: z.number().default(100),
      maxEntryPriceCents: z.number().default(98),
      positionSize: z.number().int().positive().default(1),
      maxStrikeDistancePct: z.number().default(2),
    })
    .default({}),
  execution: z
    .object({
      mode: z.enum(['paper', 'live']).default('paper'),
      pollIntervalMs: z.number().default(250),
      maxRetries: z.number().int().min(0).default(3),
      retryBaseMs: z.number().default(250),
      retryMaxMs: z.number().default(4000),
      fillTimeoutMs: z.number().default(2000),
      fillPollMs: z.number().default(200),
      lockTtlMs: z.number().default(30_000),
    })
    .default({}),
  supervisor: z
    .object({
      activeIntervalMs: z.number().default(1000),
      idleIntervalMs: z.number().default(5000),
      driftThreshold: z.number().int().positive().default(3),
      pendingFillWindowMs: z.number().default(30_000),
      holdToSettlementTtcSeconds: z.number().default(60),
      expiryGraceMs: z.number().default(15 * 60_000),
      autoStop: z
        .object({
          enabled: z.boolean().default(false),
          thresholdBps: z.number().default(2500),
          minSecondsSinceEntry: z.number().default(60),
        })
        .default({}),
      momentumSpike: z
        .object({
          enabled: z.boolean().default(false),
          threshold: z.number().default(0.35),
        })
        .default({}),
    })
    .default({}),
  kalshi: z
    .object({
      environment: z.enum(['prod', 'demo']).default('demo'),
      baseUrl: z.string().optional(),
      wsUrl: z.string().optional(),
      apiKeyId: z.string().optional(),
      privateKeyPath: z.string().optional(),
      seriesTicker: z.string().default('KXBTCD'),
      requestsPerMinute: z.number().default(600),
      requestTimeoutMs: z.number().default(10_000),
      heartbeatSeconds: z.number().default(10),
      reconnectBaseMs: z.number().default(1000),
      maxBackoffMs: z.number().default(30_000),
    })
    .default({}),
  paper: z
    .object({
      startingBalanceCents: z.number().default(100_000),
      // `kalshi` prices paper orders against the venue's public quotes.
      quotes: z.enum(['kalshi', 'local']).default('kalshi'),
    })
    .default({}),
});

export type StrikewatchConfig = z.infer<typeof ConfigSchema>;

export const KALSHI_BASE_URLS = {
  prod: 'https://api.elections.kalshi.com/trade-api/v2',
  demo: 'https://demo-api.kalshi.co/trade-api/v2',
} as const;

export const KALSHI_WS_URLS = {
  prod: 'wss://api.elections.kalshi.com/trade-api/ws/v2',
  demo: 'wss://demo-api.kalshi.co/trade-api/ws/v2',
} as const;

export function parseConfig(raw: unknown): StrikewatchConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const cfg = result.data;

  const envDb = process.env.STRIKEWATCH_DB_PATH;
  if (envDb) {
    cfg.storage.dbPath = envDb;
  }
  const envMode = process.env.STRIKEWATCH_EXECUTION_MODE;
  if (envMode === 'paper' || envMode === 'live') {
    cfg.execution.mode = envMode;
  }
  cfg.kalshi.apiKeyId = cfg.kalshi.apiKeyId ?? process.env.KALSHI_API_KEY_ID;
  cfg.kalshi.privateKeyPath = cfg.kalshi.privateKeyPath ?? process.env.KALSHI_PRIVATE_KEY_PATH;
  cfg.kalshi.baseUrl = cfg.kalshi.baseUrl ?? KALSHI_BASE_URLS[cfg.kalshi.environment];
  cfg.kalshi.wsUrl = cfg.kalshi.wsUrl ?? KALSHI_WS_URLS[cfg.kalshi.environment];

  if (cfg.storage.dbPath !== ':memory:') {
    cfg.storage.dbPath = expandHome(cfg.storage.dbPath);
  }
  if (cfg.kalshi.privateKeyPath) {
    cfg.kalshi.privateKeyPath = expandHome(cfg.kalshi.privateKeyPath);
  }
  if (cfg.signals.baseTablePath) {
    cfg.signals.baseTablePath = expandHome(cfg.signals.baseTablePath);
  }
  if (cfg.entry.minTtcSeconds > cfg.entry.maxTtcSeconds) {
    throw new ConfigError('entry.minTtcSeconds must not exceed entry.maxTtcSeconds');
  }
  // The executor renews its lease before each order attempt; one request plus
  // one backoff must fit inside it.
  if (cfg.execution.lockTtlMs <= cfg.kalshi.requestTimeoutMs + cfg.execution.retryMaxMs) {
    throw new ConfigError(
      'execution.lockTtlMs must exceed kalshi.requestTimeoutMs + execution.retryMaxMs'
    );
  }

  return cfg;
}

export function loadConfig(configPath?: string): StrikewatchConfig {
  const path =
    configPath ??
    process.env.STRIKEWATCH_CONFIG_PATH ??
    join(homedir(), '.strikewatch', 'config.yaml');

  // A missing default file means "all defaults"; an explicit path must exist.
  if (!existsSync(path)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    return parseConfig({});
  }

  const raw = readFileSync(path, 'utf-8');
  const parsed: unknown = yaml.parse(raw) ?? {};
  return parseConfig(parsed);
}
