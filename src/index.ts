/**
 * strikewatch - trade lifecycle coordinator for hourly binary options
 *
 * Main entry point for the library.
 */

export { loadConfig, parseConfig, type StrikewatchConfig } from './core/config.js';
export * from './core/errors.js';
export { Logger, type LogLevel } from './core/logger.js';
export { eventTickerFor, marketTickerFor, nextSettlementMs } from './core/time.js';

export { PriceFeedAdapter, parseTickerMessage } from './feed/stream.js';
export { TickStore } from './feed/tick_store.js';
export type { PriceTick } from './feed/types.js';

export { MomentumEngine, MOMENTUM_WEIGHTS_BPS, type MomentumResult, type MomentumSample } from './signals/momentum.js';
export {
  ENTRY_PROBABILITY_THRESHOLD_BPS,
  ProbabilityModel,
  adjustProbability,
  loadBaseTable,
} from './signals/probability.js';

export type { ExchangeAdapter, MarketQuote, VenueFill, VenueOrder } from './execution/exchange.js';
export { KalshiExchange } from './execution/modes/live.js';
export { PaperExchange } from './execution/modes/paper.js';

export { openDatabase } from './memory/db.js';
export { TradeStore } from './trade-management/db.js';
export { AutoEntryEngine, checkEntry } from './trade-management/entry.js';
export { TradeExecutor } from './trade-management/executor.js';
export { ActiveTradeSupervisor } from './trade-management/supervisor.js';
export { TradeLifecycleService } from './trade-management/service.js';
export type * from './trade-management/types.js';

// Version
export const VERSION = '0.1.0';
