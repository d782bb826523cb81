#!/usr/bin/env node
/**
 * strikewatch CLI
 *
 * Runs the trade lifecycle workers and exposes the trade store read contract.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { VERSION } from '../index.js';
import { loadConfig, type StrikewatchConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { openDatabase } from '../memory/db.js';
import { TickStore } from '../feed/tick_store.js';
import { MomentumEngine, MOMENTUM_HISTORY_SECONDS } from '../signals/momentum.js';
import { TradeStore } from '../trade-management/db.js';
import { TradeLifecycleService } from '../trade-management/service.js';
import { parseTradeStatus } from '../trade-management/state.js';
import { formatAlert, formatEvent, formatTradeDetail, formatTradeRow } from './format.js';

const program = new Command();

program
  .name('strikewatch')
  .description('Hourly binary-option trade lifecycle coordinator')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to config.yaml');

function currentConfig(): StrikewatchConfig {
  const { config } = program.opts<{ config?: string }>();
  return loadConfig(config);
}

function openStore(config: StrikewatchConfig): TradeStore {
  return new TradeStore(openDatabase(config.storage.dbPath, { busyTimeoutMs: config.storage.busyTimeoutMs }));
}

function parseId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new Error(`Invalid trade id: ${raw}`);
  }
  return id;
}

program
  .command('run')
  .description('Start feed, entry, executor and supervisor workers')
  .option('--live', 'Trade against the live venue (overrides config)', false)
  .option('--auto-entry', 'Enable auto entry (overrides config)', false)
  .action(async (options: { live: boolean; autoEntry: boolean }) => {
    const config = currentConfig();
    if (options.live) config.execution.mode = 'live';
    if (options.autoEntry) config.entry.enabled = true;
    const logger = new Logger(config.logLevel);
    const service = new TradeLifecycleService({ config, logger });
    service.supervisor.on('drift', (err) => {
      logger.error(`Review required: ${err.message}`);
    });
    service.start();

    await new Promise<void>((resolve) => {
      const shutdown = (signal: string) => {
        logger.info(`Received ${signal}; shutting down`);
        service.stop().then(resolve, (err: unknown) => {
          logger.error('Shutdown failed', err);
          resolve();
        });
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    });
  });

const trades = program.command('trades').description('Inspect trades');

trades
  .command('list')
  .description('List trades, newest first')
  .option('-s, --status <status...>', 'Filter by status')
  .option('--since <iso>', 'Created at or after')
  .option('--until <iso>', 'Created before')
  .option('-l, --limit <n>', 'Maximum rows', '50')
  .action((options: { status?: string[]; since?: string; until?: string; limit: string }) => {
    const store = openStore(currentConfig());
    const rows = store.listTrades({
      status: options.status?.map(parseTradeStatus),
      since: options.since,
      until: options.until,
      limit: Number(options.limit),
    });
    if (rows.length === 0) {
      console.log('No trades.');
      return;
    }
    for (const trade of rows) {
      console.log(formatTradeRow(trade));
    }
  });

trades
  .command('show <id>')
  .description('Show one trade')
  .action((id: string) => {
    const store = openStore(currentConfig());
    const trade = store.getTrade(parseId(id));
    if (!trade) {
      console.log(`Trade ${id} not found.`);
      process.exitCode = 1;
      return;
    }
    console.log(formatTradeDetail(trade));
    const active = store.getActiveTrade(trade.id);
    if (active) {
      console.log(`Drift: ${active.driftCount}${active.frozen ? `  FROZEN (${active.frozenReason ?? ''})` : ''}`);
    }
  });

trades
  .command('events <id>')
  .description('Show the audit trail of one trade')
  .action((id: string) => {
    const store = openStore(currentConfig());
    const events = store.listTradeEvents(parseId(id));
    if (events.length === 0) {
      console.log(`No events for trade ${id}.`);
      return;
    }
    for (const event of events) {
      console.log(formatEvent(event));
    }
  });

const review = program.command('review').description('Reconciliation alerts and frozen trades');

review
  .command('list')
  .description('List reconciliation alerts')
  .option('-a, --all', 'Include resolved alerts', false)
  .action((options: { all: boolean }) => {
    const store = openStore(currentConfig());
    const alerts = store.listAlerts({ unresolvedOnly: !options.all });
    if (alerts.length === 0) {
      console.log('No alerts.');
      return;
    }
    for (const alert of alerts) {
      console.log(formatAlert(alert));
    }
  });

review
  .command('resolve <id>')
  .description('Unfreeze a trade after manual review')
  .requiredOption('-n, --note <text>', 'Resolution note')
  .action((id: string, options: { note: string }) => {
    const store = openStore(currentConfig());
    const resolved = store.resolveFreeze(parseId(id), options.note);
    console.log(resolved ? `Trade ${id} unfrozen.` : `Trade ${id} was not frozen.`);
  });

program
  .command('momentum')
  .description('Momentum from persisted ticks')
  .action(() => {
    const config = currentConfig();
    const ticks = new TickStore(openDatabase(config.storage.dbPath)).loadSince(
      Date.now() - config.storage.tickRetentionMinutes * 60_000
    );
    const engine = new MomentumEngine({
      volatilityWindowSeconds: config.signals.volatilityWindowSeconds,
      volatilityThresholdPct: config.signals.volatilityThresholdPct,
      maxGapSeconds: config.signals.maxGapSeconds,
    });
    engine.warmUp(ticks);
    const result = engine.current();
    if (result.kind === 'insufficient') {
      console.log(`Insufficient history: ${result.haveSeconds}s of ${MOMENTUM_HISTORY_SECONDS}s`);
      return;
    }
    console.log(`Price: ${engine.latestPrice()?.toFixed(2) ?? '-'}`);
    console.log(`Momentum: ${result.sample.momentum.toFixed(4)}${engine.isVolatile() ? ' (volatile)' : ''}`);
    for (const [interval, delta] of Object.entries(result.sample.deltas)) {
      console.log(`  ${interval.padEnd(4)} ${delta.toFixed(4)}%`);
    }
  });

const configCmd = program.command('config').description('Configuration');

configCmd
  .command('check')
  .description('Validate and print the effective configuration')
  .action(() => {
    const config = currentConfig();
    const redacted = {
      ...config,
      kalshi: { ...config.kalshi, apiKeyId: config.kalshi.apiKeyId ? '(set)' : undefined },
    };
    console.log(JSON.stringify(redacted, null, 2));
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
