import { constants, generateKeyPairSync, verify } from 'node:crypto';

import { Response } from 'node-fetch';
import type fetch from 'node-fetch';
import { describe, it, expect, vi } from 'vitest';

import { OrderRejectedError, TransientExchangeError } from '../../src/core/errors.js';
import { KalshiClient } from '../../src/execution/kalshi/client.js';
import { KalshiPublicMarkets } from '../../src/execution/kalshi/public_markets.js';
import { KalshiExchange } from '../../src/execution/modes/live.js';
import { strikeFromTicker, toMarketQuote, toVenueFill, toVenueOrder } from '../../src/execution/kalshi/markets.js';
import { TokenBucket } from '../../src/execution/kalshi/rate_limit.js';
import {
  HEADER_KEY,
  HEADER_SIGNATURE,
  HEADER_TIMESTAMP,
  KalshiSigner,
  signingMessage,
} from '../../src/execution/kalshi/signer.js';
import { parseKalshiMessage } from '../../src/execution/kalshi/stream.js';
import { testConfig } from '../fixtures.js';

const { privateKey, publicKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });
const pem = privateKey.export({ type: 'pkcs8', format: 'pem' }).toString();

function verifies(message: string, signature: string): boolean {
  return verify(
    'sha256',
    Buffer.from(message, 'utf-8'),
    { key: publicKey, padding: constants.RSA_PKCS1_PSS_PADDING, saltLength: constants.RSA_PSS_SALTLEN_DIGEST },
    Buffer.from(signature, 'base64')
  );
}

describe('request signing', () => {
  it('signs timestamp, method and path without the query', () => {
    expect(signingMessage('1700000000000', 'get', '/trade-api/v2/portfolio/orders?limit=5')).toBe(
      '1700000000000GET/trade-api/v2/portfolio/orders'
    );
  });

  it('produces headers whose signature verifies with the public key', () => {
    const signer = KalshiSigner.fromPem('test-key', pem);
    const headers = signer.headers('POST', '/trade-api/v2/portfolio/orders', 1_700_000_000_000);
    expect(headers[HEADER_KEY]).toBe('test-key');
    expect(headers[HEADER_TIMESTAMP]).toBe('1700000000000');
    expect(verifies('1700000000000POST/trade-api/v2/portfolio/orders', headers[HEADER_SIGNATURE] ?? '')).toBe(true);
  });

  it('requires both credentials', () => {
    expect(() => KalshiSigner.fromFile(undefined, '/tmp/key.pem')).toThrow(/credentials not configured/);
  });
});

describe('TokenBucket', () => {
  it('waits for a refill once the burst is spent', async () => {
    let now = 0;
    const sleeps: number[] = [];
    const bucket = new TokenBucket(2, 60, {
      clock: () => now,
      sleep: async (ms) => {
        sleeps.push(ms);
        now += ms;
      },
    });
    await bucket.acquire();
    await bucket.acquire();
    expect(sleeps).toEqual([]);
    await bucket.acquire();
    expect(sleeps).toEqual([1000]);
  });
});

describe('KalshiClient', () => {
  const orderBody = {
    order: {
      order_id: 'ord-1',
      client_order_id: 'sw-1',
      ticker: 'KXBTCD-26OCT1917-T67000.00',
      side: 'yes',
      action: 'buy',
      status: 'executed',
      yes_price: 90,
      no_price: 10,
      initial_count: 1,
      remaining_count: 0,
      fill_count: 1,
    },
  };

  function clientFor(status: number, body: unknown) {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(JSON.stringify(body), { status }));
    const client = new KalshiClient(testConfig(), KalshiSigner.fromPem('test-key', pem), {
      fetchImpl,
      bucket: new TokenBucket(100, 6000),
    });
    return { client, fetchImpl };
  }

  it('posts signed orders to the venue', async () => {
    const { client, fetchImpl } = clientFor(201, orderBody);
    const order = await client.createOrder({
      ticker: 'KXBTCD-26OCT1917-T67000.00',
      client_order_id: 'sw-1',
      side: 'yes',
      action: 'buy',
      count: 1,
      type: 'limit',
      yes_price: 90,
      time_in_force: 'fill_or_kill',
    });

    expect(order.order_id).toBe('ord-1');
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://demo-api.kalshi.co/trade-api/v2/portfolio/orders');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toMatchObject({ client_order_id: 'sw-1', yes_price: 90 });

    const headers = new Map(Object.entries(init?.headers ?? {}));
    expect(headers.get(HEADER_KEY)).toBe('test-key');
    const timestamp = String(headers.get(HEADER_TIMESTAMP));
    expect(verifies(`${timestamp}POST/trade-api/v2/portfolio/orders`, String(headers.get(HEADER_SIGNATURE)))).toBe(
      true
    );
  });

  it('treats 5xx as transient', async () => {
    const { client } = clientFor(503, { error: { code: 'unavailable', message: 'try later' } });
    await expect(client.getBalanceCents()).rejects.toBeInstanceOf(TransientExchangeError);
  });

  it('treats other 4xx as rejections with the venue code', async () => {
    const { client } = clientFor(400, { error: { code: 'insufficient_balance', message: 'Insufficient balance' } });
    const failure = client.getBalanceCents();
    await expect(failure).rejects.toBeInstanceOf(OrderRejectedError);
    await expect(failure).rejects.toMatchObject({ statusCode: 400, venueCode: 'insufficient_balance' });
  });

  it('maps a missing order to null', async () => {
    const { client } = clientFor(404, { error: { code: 'not_found', message: 'order not found' } });
    await expect(client.getOrder('ord-x')).resolves.toBeNull();
  });
});

describe('KalshiPublicMarkets', () => {
  it('reads event markets without credentials', async () => {
    const market = {
      ticker: 'KXBTCD-26OCT1917-T67000.00',
      event_ticker: 'KXBTCD-26OCT1917',
      status: 'active',
      close_time: '2026-10-19T21:00:00Z',
      yes_bid: 88,
      yes_ask: 90,
      no_bid: 10,
      no_ask: 12,
    };
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(JSON.stringify({ markets: [market] }), { status: 200 }));
    const config = testConfig();
    const markets = new KalshiPublicMarkets(config, new KalshiClient(config, null, { fetchImpl, bucket: new TokenBucket(100, 6000) }));

    expect(await markets.getEventMarkets('KXBTCD-26OCT1917')).toMatchObject([
      { marketTicker: 'KXBTCD-26OCT1917-T67000.00', strike: 67000, status: 'open', yesAskCents: 90, noAskCents: 12 },
    ]);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://demo-api.kalshi.co/trade-api/v2/events/KXBTCD-26OCT1917?with_nested_markets=true');
    expect(init?.headers).toEqual({ Accept: 'application/json' });
  });
});

describe('KalshiExchange', () => {
  function exchangeWith(route: (url: string, method: string) => { status: number; body: unknown }) {
    const fetchImpl = vi.fn<typeof fetch>(async (url, init) => {
      const { status, body } = route(String(url), init?.method ?? 'GET');
      return new Response(JSON.stringify(body), { status });
    });
    const config = testConfig();
    const client = new KalshiClient(config, KalshiSigner.fromPem('test-key', pem), {
      fetchImpl,
      bucket: new TokenBucket(100, 6000),
    });
    return { exchange: new KalshiExchange({ config, client, stream: null }), fetchImpl };
  }

  it('returns the original order when a client order id is resubmitted', async () => {
    const { exchange } = exchangeWith((url, method) => {
      if (method === 'POST') return { status: 409, body: { error: { code: 'order_already_exists', message: 'duplicate' } } };
      if (url.includes('/portfolio/orders?ticker=')) return { status: 200, body: { orders: [orderFixture()] } };
      return { status: 404, body: {} };
    });
    const order = await exchange.placeOrder({
      marketTicker: 'KXBTCD-26OCT1917-T67000.00',
      side: 'yes',
      action: 'buy',
      count: 3,
      priceCents: 90,
      timeInForce: 'fill_or_kill',
      clientOrderId: 'sw-3',
    });
    expect(order).toMatchObject({ orderId: 'ord-3', clientOrderId: 'sw-3', status: 'resting' });
  });

  it('does not cancel an order that already executed', async () => {
    const { exchange, fetchImpl } = exchangeWith(() => ({
      status: 200,
      body: { order: { ...orderFixture(), status: 'executed', remaining_count: 0, fill_count: 3 } },
    }));
    const order = await exchange.cancelOrder('ord-3');
    expect(order?.status).toBe('executed');
    expect(fetchImpl.mock.calls.map(([, init]) => init?.method)).toEqual(['GET']);
  });
});

describe('venue mapping', () => {
  it('reads the strike from the market ticker', () => {
    expect(strikeFromTicker('KXBTCD-26OCT1917-T67249.99')).toBe(67249.99);
    expect(strikeFromTicker('KXBTCD-26OCT1917')).toBeNull();
  });

  it('normalises market quotes', () => {
    expect(
      toMarketQuote({
        ticker: 'KXBTCD-26OCT1917-T67000.00',
        event_ticker: 'KXBTCD-26OCT1917',
        status: 'active',
        close_time: '2026-10-19T21:00:00Z',
        yes_bid: 88,
        yes_ask: 90,
        no_bid: 0,
        no_ask: 12,
        result: '',
      })
    ).toEqual({
      marketTicker: 'KXBTCD-26OCT1917-T67000.00',
      eventTicker: 'KXBTCD-26OCT1917',
      strike: 67000,
      status: 'open',
      closeTime: Date.parse('2026-10-19T21:00:00Z'),
      yesBidCents: 88,
      yesAskCents: 90,
      noBidCents: null,
      noAskCents: 12,
      result: null,
    });
  });

  it('treats a market with a result as settled', () => {
    const quote = toMarketQuote({
      ticker: 'KXBTCD-26OCT1917-T67000.00',
      event_ticker: 'KXBTCD-26OCT1917',
      status: 'closed',
      result: 'no',
    });
    expect(quote.status).toBe('settled');
    expect(quote.result).toBe('no');
  });

  it('counts filled contracts on orders', () => {
    expect(toVenueOrder({ ...orderFixture(), status: 'canceled', fill_count: null })).toMatchObject({
      status: 'canceled',
      count: 3,
      filledCount: 1,
      priceCents: 90,
    });
  });

  it('prefers the reported fee and falls back to the schedule', () => {
    const fill = {
      trade_id: 'f-1',
      order_id: 'ord-1',
      ticker: 'KXBTCD-26OCT1917-T67000.00',
      side: 'no' as const,
      action: 'buy' as const,
      count: 10,
      yes_price: 10,
      no_price: 90,
      created_time: '2026-10-19T20:30:00Z',
    };
    expect(toVenueFill({ ...fill, fee_cost: '0.08' }).feeCents).toBe(8);
    expect(toVenueFill(fill)).toMatchObject({ priceCents: 90, feeCents: 7 });
  });

  it('parses fill messages from the stream', () => {
    const message = JSON.stringify({
      type: 'fill',
      sid: 1,
      msg: {
        trade_id: 'f-2',
        order_id: 'ord-2',
        market_ticker: 'KXBTCD-26OCT1917-T67000.00',
        side: 'yes',
        action: 'buy',
        count: 1,
        yes_price: 50,
        ts: 1_790_000_000,
      },
    });
    expect(parseKalshiMessage(message)).toEqual({
      type: 'fill',
      fill: {
        fillId: 'f-2',
        orderId: 'ord-2',
        marketTicker: 'KXBTCD-26OCT1917-T67000.00',
        side: 'yes',
        action: 'buy',
        count: 1,
        priceCents: 50,
        feeCents: 2,
        createdAt: 1_790_000_000_000,
      },
    });
    expect(parseKalshiMessage('{"type":"subscribed","msg":{}}')).toBeNull();
  });
});

function orderFixture() {
  return {
    order_id: 'ord-3',
    client_order_id: 'sw-3',
    ticker: 'KXBTCD-26OCT1917-T67000.00',
    side: 'yes' as const,
    action: 'buy' as const,
    status: 'resting',
    yes_price: 90,
    no_price: 10,
    initial_count: 3,
    remaining_count: 2,
    fill_count: 1,
  };
}
