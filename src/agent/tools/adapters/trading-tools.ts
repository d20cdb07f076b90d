/**
 * Trading Tools Adapter
 *
 * Paper buys settled against the ledger at the oracle's last price.
 */

import { z } from 'zod';

import type { ToolContext, ToolDefinition, ToolOutcome } from '../types.js';
import { defineTool } from '../registry.js';
import { createErrorOutcome, createSuccessOutcome, outcomeFromError } from '../outcome.js';
import { baseAsset, normalizeSymbol, validatePositiveAmount } from '../validate.js';

export interface BuyData {
  action: 'buy';
  symbol: string;
  crypto_amount: number;
  usd_spent: number;
  price: number;
}

/**
 * Buy tool - spend USD on a crypto asset. Simulated; no order is sent.
 */
export const buyCryptoTool: ToolDefinition = defineTool({
  name: 'buy_crypto',
  description:
    'Simulate buying cryptocurrency with USD. Uses real market price. ' +
    'This is a simulation - no real money is spent.',
  category: 'trading',
  schema: z.object({
    symbol: z.string().describe('Cryptocurrency symbol to buy, e.g. BTC, ETH'),
    amount: z.number().describe('Amount in USD to spend'),
  }),
  rateLimited: true,
  execute: async ({ symbol, amount }, ctx) => {
    try {
      const usdAmount = validatePositiveAmount(amount, 'amount');
      const pair = normalizeSymbol(symbol, ctx.defaultQuote);
      const ticker = await ctx.oracle.getTicker(pair);
      if (!Number.isFinite(ticker.last) || ticker.last <= 0) {
        return createErrorOutcome('exchange_error', `No valid price available for ${pair}`);
      }
      return await settleBuy(ctx, baseAsset(pair), usdAmount, ticker.last);
    } catch (error) {
      return outcomeFromError(error, 'exchange_error');
    }
  },
});

async function settleBuy(
  ctx: ToolContext,
  asset: string,
  usdAmount: number,
  price: number
): Promise<ToolOutcome> {
  const cryptoAmount = usdAmount / price;
  try {
    const result = await ctx.ledger.applyBuy({
      userId: ctx.userId,
      asset,
      cryptoAmount,
      usdAmount,
      price,
    });
    if (!result.ok) {
      return createErrorOutcome('insufficient_balance', result.message);
    }

    const data: BuyData = {
      action: 'buy',
      symbol: asset,
      crypto_amount: cryptoAmount,
      usd_spent: usdAmount,
      price,
    };
    return createSuccessOutcome(data, {
      simulated: true,
      transaction_id: result.transaction.id,
    });
  } catch (error) {
    return outcomeFromError(error);
  }
}

export const tradingTools: ToolDefinition[] = [buyCryptoTool];
