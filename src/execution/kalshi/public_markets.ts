import type { StrikewatchConfig } from '../../core/config.js';
import type { MarketQuote, MarketSource } from '../exchange.js';
import { KalshiClient } from './client.js';
import { toMarketQuote } from './markets.js';

/** Unauthenticated Kalshi market reads; quotes for the paper venue. */
export class KalshiPublicMarkets implements MarketSource {
  private client: KalshiClient;

  constructor(config: StrikewatchConfig, client?: KalshiClient) {
    this.client = client ?? new KalshiClient(config, null);
  }

  async getMarket(marketTicker: string): Promise<MarketQuote | null> {
    const market = await this.client.getMarket(marketTicker);
    return market ? toMarketQuote(market) : null;
  }

  async getEventMarkets(eventTicker: string): Promise<MarketQuote[]> {
    return (await this.client.getEventMarkets(eventTicker)).map(toMarketQuote);
  }
}
