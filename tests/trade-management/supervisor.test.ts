import { describe, it, expect } from 'vitest';

import type { ReconciliationDriftError } from '../../src/core/errors.js';
import { decideReconciliation } from '../../src/trade-management/reconcile.js';
import { ActiveTradeSupervisor, type SupervisorSignals } from '../../src/trade-management/supervisor.js';
import { MARKET_TICKER, SETTLEMENT_MS, createHarness, quietLogger, tradeInput } from '../fixtures.js';

function setup(options: { config?: Record<string, unknown>; signals?: SupervisorSignals; fillMode?: 'match' | 'rest' } = {}) {
  const h = createHarness({ config: options.config });
  if (options.fillMode) h.paper.setFillMode(options.fillMode);
  const supervisor = new ActiveTradeSupervisor({
    store: h.store,
    exchange: h.paper,
    executor: h.executor,
    config: h.config.supervisor,
    lockTtlMs: h.config.execution.lockTtlMs,
    signals: options.signals,
    logger: quietLogger,
    owner: 'supervisor-test',
    clock: h.clock.read,
  });
  const drifts: ReconciliationDriftError[] = [];
  supervisor.on('drift', (err) => drifts.push(err));
  const trade = h.store.createPendingTrade(tradeInput());
  return { ...h, supervisor, drifts, trade };
}

describe('decideReconciliation', () => {
  const base = { pendingAgeMs: 0, pendingFillWindowMs: 30_000 };

  it('lets the venue decide fills and settlement', () => {
    expect(decideReconciliation({ ...base, local: 'pending', venue: 'filled' })).toEqual({ kind: 'promote' });
    expect(decideReconciliation({ ...base, local: 'pending', venue: 'settled_win' })).toEqual({
      kind: 'expire',
      reason: 'market_settled_before_fill',
    });
    expect(decideReconciliation({ ...base, local: 'closing', venue: 'settled_loss' })).toEqual({ kind: 'settle' });
    expect(decideReconciliation({ ...base, local: 'closing', venue: 'position_closed' })).toEqual({
      kind: 'close_from_fill',
    });
  });

  it('cancels a pending order only past the fill window', () => {
    expect(decideReconciliation({ ...base, local: 'pending', venue: 'order_open', pendingAgeMs: 30_000 })).toEqual({
      kind: 'in_sync',
    });
    expect(decideReconciliation({ ...base, local: 'pending', venue: 'order_open', pendingAgeMs: 30_001 })).toEqual({
      kind: 'cancel_stale',
    });
  });

  it('counts any other active disagreement as drift', () => {
    expect(decideReconciliation({ ...base, local: 'active', venue: 'settled_loss' })).toEqual({ kind: 'drift' });
    expect(decideReconciliation({ ...base, local: 'active', venue: 'no_order' })).toEqual({ kind: 'drift' });
    expect(decideReconciliation({ ...base, local: 'active', venue: 'filled' })).toEqual({ kind: 'in_sync' });
  });
});

describe('ActiveTradeSupervisor', () => {
  it('freezes a trade after three polls of disagreement and alerts once', async () => {
    const { supervisor, executor, paper, store, drifts, trade } = setup();
    await executor.submit(trade.id);
    paper.settleMarket(MARKET_TICKER, 'no');

    const first = await supervisor.poll();
    expect(first[0]).toMatchObject({ kind: 'reconciled', venue: 'settled_loss', decision: { kind: 'drift' } });
    expect(store.getActiveTrade(trade.id)?.driftCount).toBe(1);

    await supervisor.poll();
    expect(drifts).toHaveLength(0);
    await supervisor.poll();

    expect(drifts).toHaveLength(1);
    expect(drifts[0]).toMatchObject({ tradeId: trade.id, localStatus: 'active', venueState: 'settled_loss', consecutive: 3 });
    expect(store.getActiveTrade(trade.id)).toMatchObject({ frozen: true, driftCount: 3 });
    expect(store.requireTrade(trade.id).status).toBe('active');
    expect(store.listAlerts({ unresolvedOnly: true })).toHaveLength(1);

    expect(await supervisor.poll()).toEqual([{ tradeId: trade.id, kind: 'skipped', reason: 'frozen' }]);
    expect(drifts).toHaveLength(1);
  });

  it('resets the drift count when the venue agrees again', async () => {
    const { supervisor, executor, store, trade } = setup();
    await executor.submit(trade.id);
    store.recordDrift(trade.id, 'active:no_order');

    await supervisor.poll();

    expect(store.getActiveTrade(trade.id)?.driftCount).toBe(0);
  });

  it('promotes a pending trade whose fill was missed', async () => {
    const { supervisor, executor, paper, store, trade } = setup({ fillMode: 'rest' });
    await executor.submit(trade.id);
    paper.fillOrder('paper-1');

    const [result] = await supervisor.poll();

    expect(result).toMatchObject({ kind: 'reconciled', decision: { kind: 'promote' } });
    expect(store.requireTrade(trade.id)).toMatchObject({ status: 'active', entryPrice: 0.9, fees: 0.01 });
  });

  it('cancels a pending order left unfilled past the window', async () => {
    const { supervisor, executor, paper, store, clock, trade } = setup({ fillMode: 'rest' });
    await executor.submit(trade.id);

    await supervisor.poll();
    expect(store.requireTrade(trade.id).status).toBe('pending');

    clock.advance(30_001);
    await supervisor.poll();

    expect(store.requireTrade(trade.id)).toMatchObject({ status: 'error', orderOutcome: 'cancelled' });
    expect((await paper.getOrder('paper-1'))?.status).toBe('canceled');
  });

  it('expires a pending trade whose market settled before a fill', async () => {
    const { supervisor, executor, paper, store, trade } = setup({ fillMode: 'rest' });
    await executor.submit(trade.id);
    paper.settleMarket(MARKET_TICKER, 'yes');

    await supervisor.poll();

    expect(store.requireTrade(trade.id)).toMatchObject({
      status: 'expired',
      errorReason: 'market_settled_before_fill',
    });
  });

  it('holds into the last minute and books the settlement', async () => {
    const { supervisor, executor, paper, store, clock, trade } = setup();
    await executor.submit(trade.id);

    clock.now = SETTLEMENT_MS - 60_000;
    await supervisor.poll();
    expect(store.requireTrade(trade.id)).toMatchObject({ status: 'closing', closeReason: 'expiry' });

    await supervisor.poll();
    expect(store.requireTrade(trade.id).status).toBe('closing');

    paper.settleMarket(MARKET_TICKER, 'yes');
    clock.now = SETTLEMENT_MS + 5_000;
    await supervisor.poll();

    expect(store.requireTrade(trade.id)).toMatchObject({
      status: 'closed',
      exitPrice: 1,
      fees: 0.01,
      pnl: 0.09,
      outcome: 'win',
    });
    expect(store.listActiveTrades()).toHaveLength(0);
  });

  it('expires an active trade the venue never settles within the grace period', async () => {
    const { supervisor, executor, store, clock, trade } = setup();
    await executor.submit(trade.id);

    clock.now = SETTLEMENT_MS + 15 * 60_000 + 1;
    await supervisor.poll();

    expect(store.requireTrade(trade.id)).toMatchObject({ status: 'expired', errorReason: 'expiry_unacknowledged' });
  });

  it('stops out when the model probability collapses', async () => {
    const signals: SupervisorSignals = { currentProbabilityBps: () => 2000, currentMomentum: () => null };
    const { supervisor, executor, store, clock, trade } = setup({
      config: { supervisor: { autoStop: { enabled: true, thresholdBps: 2500, minSecondsSinceEntry: 60 } } },
      signals,
    });
    await executor.submit(trade.id);

    clock.advance(59_000);
    await supervisor.poll();
    expect(store.requireTrade(trade.id).status).toBe('active');

    clock.advance(1_000);
    await supervisor.poll();
    expect(store.requireTrade(trade.id)).toMatchObject({
      status: 'closed',
      closeReason: 'auto_stop',
      exitPrice: 0.88,
      pnl: -0.04,
      outcome: 'loss',
    });
  });

  it('exits on a momentum spike against the held side only', async () => {
    let momentum = 0.5;
    const signals: SupervisorSignals = { currentProbabilityBps: () => null, currentMomentum: () => momentum };
    const { supervisor, executor, store, trade } = setup({
      config: { supervisor: { momentumSpike: { enabled: true, threshold: 0.35 } } },
      signals,
    });
    await executor.submit(trade.id);

    await supervisor.poll();
    expect(store.requireTrade(trade.id).status).toBe('active');

    momentum = -0.35;
    await supervisor.poll();
    expect(store.requireTrade(trade.id)).toMatchObject({ status: 'closed', closeReason: 'momentum_spike' });
  });

  it('skips a trade locked by another worker', async () => {
    const { supervisor, store, trade } = setup();
    store.acquireLock(trade.id, 'executor-test', 10_000);
    expect(await supervisor.poll()).toEqual([{ tradeId: trade.id, kind: 'skipped', reason: 'locked' }]);
  });
});
