import fetch from 'node-fetch';
import { z } from 'zod';

import type { TradeBridgeConfig } from '../../core/config.js';
import {
  PriceOracleError,
  type OrderBook,
  type PriceLevel,
  type PriceOracle,
  type Ticker,
} from '../price-oracle.js';

const DEPTH_LIMITS = [5, 10, 20, 50, 100, 500, 1000, 5000];

const NumericString = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a number: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

const Ticker24hSchema = z.object({
  lastPrice: NumericString,
  bidPrice: NumericString,
  askPrice: NumericString,
  highPrice: NumericString,
  lowPrice: NumericString,
  volume: NumericString,
});

const DepthSchema = z.object({
  bids: z.array(z.tuple([NumericString, NumericString]).rest(z.unknown())),
  asks: z.array(z.tuple([NumericString, NumericString]).rest(z.unknown())),
});

const ErrorBodySchema = z.object({ code: z.number().optional(), msg: z.string() });

export type FetchLike = typeof fetch;

export interface BinanceOracleOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

/** `BTC/USDT` → `BTCUSDT`. */
export function toExchangeSymbol(symbol: string): string {
  return symbol.replace('/', '').toUpperCase();
}

export function toDepthLimit(depth: number): number {
  return DEPTH_LIMITS.find((limit) => limit >= depth) ?? DEPTH_LIMITS[DEPTH_LIMITS.length - 1];
}

/**
 * Public Binance spot market data. No API key required.
 */
export class BinancePriceOracle implements PriceOracle {
  readonly source = 'binance';
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(options: BinanceOracleOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://api.binance.com').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  static fromConfig(config: TradeBridgeConfig, fetchImpl?: FetchLike): BinancePriceOracle {
    return new BinancePriceOracle({
      baseUrl: config.exchange.baseUrl,
      timeoutMs: config.exchange.timeoutMs,
      fetchImpl,
    });
  }

  async getTicker(symbol: string): Promise<Ticker> {
    const raw = await this.request('/api/v3/ticker/24hr', { symbol: toExchangeSymbol(symbol) });
    const parsed = Ticker24hSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PriceOracleError(`Unexpected ticker payload for ${symbol}`);
    }
    return {
      symbol,
      last: parsed.data.lastPrice,
      bid: parsed.data.bidPrice,
      ask: parsed.data.askPrice,
      high: parsed.data.highPrice,
      low: parsed.data.lowPrice,
      volume: parsed.data.volume,
    };
  }

  async getOrderBook(symbol: string, depth: number): Promise<OrderBook> {
    const raw = await this.request('/api/v3/depth', {
      symbol: toExchangeSymbol(symbol),
      limit: String(toDepthLimit(depth)),
    });
    const parsed = DepthSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PriceOracleError(`Unexpected order book payload for ${symbol}`);
    }
    const toLevel = ([price, quantity]: [number, number, ...unknown[]]): PriceLevel => [price, quantity];
    return {
      symbol,
      bids: parsed.data.bids.map(toLevel),
      asks: parsed.data.asks.map(toLevel),
    };
  }

  private async request(path: string, query: Record<string, string>): Promise<unknown> {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchImpl(url.toString(), { signal: controller.signal });
      const body: unknown = await response.json().catch(() => null);
      if (!response.ok) {
        const detail = ErrorBodySchema.safeParse(body);
        const reason = detail.success ? detail.data.msg : response.statusText;
        throw new PriceOracleError(
          `Binance request ${path} failed (${response.status}): ${reason}`,
          response.status
        );
      }
      return body;
    } catch (error) {
      if (error instanceof PriceOracleError) throw error;
      if (controller.signal.aborted) {
        throw new PriceOracleError(`Binance request ${path} timed out after ${this.timeoutMs}ms`);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new PriceOracleError(`Binance request ${path} failed: ${message}`);
    } finally {
      clearTimeout(timer);
    }
  }
}
