/**
 * Market Tools Adapter
 *
 * Oracle-backed price and order book lookups.
 */

import { z } from 'zod';

import type { ToolDefinition } from '../types.js';
import { defineTool } from '../registry.js';
import { createSuccessOutcome, outcomeFromError } from '../outcome.js';
import { normalizeSymbol } from '../validate.js';

export const DEFAULT_ORDERBOOK_LIMIT = 5;

export interface PriceData {
  symbol: string;
  last: number;
  bid: number;
  ask: number;
  high: number;
  low: number;
  volume: number;
}

export interface OrderBookLevel {
  price: number;
  quantity: number;
}

export interface OrderBookData {
  symbol: string;
  bids: OrderBookLevel[];
  asks: OrderBookLevel[];
}

/**
 * Crypto price tool - latest ticker for a pair.
 */
export const getCryptoPriceTool: ToolDefinition = defineTool({
  name: 'get_crypto_price',
  description:
    'Get the current real-time market price for a cryptocurrency in USD. ' +
    'Input: symbol like BTC, ETH, SOL, or BTC/USDT.',
  category: 'market',
  schema: z.object({
    symbol: z.string().describe('Cryptocurrency symbol, e.g. BTC, ETH, BTC/USDT'),
  }),
  rateLimited: true,
  execute: async ({ symbol }, ctx) => {
    try {
      const pair = normalizeSymbol(symbol, ctx.defaultQuote);
      const ticker = await ctx.oracle.getTicker(pair);
      const data: PriceData = {
        symbol: ticker.symbol,
        last: ticker.last,
        bid: ticker.bid,
        ask: ticker.ask,
        high: ticker.high,
        low: ticker.low,
        volume: ticker.volume,
      };
      return createSuccessOutcome(data, { source: ctx.oracle.source, endpoint: 'ticker' });
    } catch (error) {
      return outcomeFromError(error, 'exchange_error');
    }
  },
});

/**
 * Order book tool - bid/ask depth for a pair, best price first.
 */
export const getOrderBookTool: ToolDefinition = defineTool({
  name: 'get_orderbook',
  description: 'Get the order book (buy/sell depth) for a trading pair.',
  category: 'market',
  schema: z.object({
    symbol: z.string().describe('Trading pair symbol, e.g. BTC/USDT'),
    limit: z
      .number()
      .int()
      .min(1)
      .default(DEFAULT_ORDERBOOK_LIMIT)
      .describe('Number of orders to return'),
  }),
  rateLimited: true,
  execute: async ({ symbol, limit }, ctx) => {
    try {
      const pair = normalizeSymbol(symbol, ctx.defaultQuote);
      const book = await ctx.oracle.getOrderBook(pair, limit);
      const toLevel = ([price, quantity]: [number, number]): OrderBookLevel => ({ price, quantity });
      const data: OrderBookData = {
        symbol: book.symbol,
        bids: book.bids.slice(0, limit).map(toLevel),
        asks: book.asks.slice(0, limit).map(toLevel),
      };
      return createSuccessOutcome(data, {
        source: ctx.oracle.source,
        endpoint: 'orderbook',
        limit,
      });
    } catch (error) {
      return outcomeFromError(error, 'exchange_error');
    }
  },
});

export const marketTools: ToolDefinition[] = [getCryptoPriceTool, getOrderBookTool];
