/**
 * Account Tools Adapter
 *
 * Wallet valuation and trade history for the bridge's user.
 */

import { z } from 'zod';

import { USD } from '../../../memory/ledger.js';
import type { ToolDefinition } from '../types.js';
import { defineTool } from '../registry.js';
import { createSuccessOutcome, outcomeFromError } from '../outcome.js';

export const DEFAULT_HISTORY_LIMIT = 10;

export interface BalanceAsset {
  asset: string;
  balance: number;
  price?: number;
  /** `null` when the asset could not be priced. */
  usd_value: number | null;
}

export interface BalanceData {
  assets: BalanceAsset[];
  total_usd: number;
}

export interface HistoryEntry {
  type: string;
  symbol: string;
  amount: number;
  price: number;
  usd_value: number;
  timestamp: string;
}

export interface HistoryData {
  transactions: HistoryEntry[];
  count: number;
}

/**
 * Balance tool - holdings with USD valuations.
 */
export const checkBalanceTool: ToolDefinition = defineTool({
  name: 'check_balance',
  description: "Get the user's wallet balance with current USD values.",
  category: 'account',
  schema: z.object({}),
  rateLimited: false,
  execute: async (_input, ctx) => {
    try {
      const balances = await ctx.ledger.ensureWallet(ctx.userId);
      const held = Object.keys(balances)
        .filter((asset) => balances[asset] > 0)
        .sort((a, b) => (a === USD ? -1 : b === USD ? 1 : a.localeCompare(b)));

      const assets: BalanceAsset[] = [];
      let totalUsd = 0;
      for (const asset of held) {
        const balance = balances[asset];
        if (asset === USD) {
          assets.push({ asset, balance, usd_value: balance });
          totalUsd += balance;
          continue;
        }
        try {
          const ticker = await ctx.oracle.getTicker(`${asset}/${ctx.defaultQuote}`);
          const usdValue = balance * ticker.last;
          assets.push({ asset, balance, price: ticker.last, usd_value: usdValue });
          totalUsd += usdValue;
        } catch {
          // Unpriced holdings are still reported.
          assets.push({ asset, balance, usd_value: null });
        }
      }

      const data: BalanceData = { assets, total_usd: totalUsd };
      return createSuccessOutcome(data);
    } catch (error) {
      return outcomeFromError(error);
    }
  },
});

/**
 * History tool - most recent trades, newest first.
 */
export const transactionHistoryTool: ToolDefinition = defineTool({
  name: 'transaction_history',
  description: "Get the user's recent transaction history.",
  category: 'account',
  schema: z.object({
    limit: z
      .number()
      .int()
      .min(1)
      .default(DEFAULT_HISTORY_LIMIT)
      .describe('Number of transactions to return'),
  }),
  rateLimited: false,
  execute: async ({ limit }, ctx) => {
    try {
      const records = await ctx.ledger.listTransactions(ctx.userId, limit);
      const transactions: HistoryEntry[] = records.map((record) => ({
        type: record.type,
        symbol: record.symbol,
        amount: record.amount,
        price: record.price,
        usd_value: record.usdValue,
        timestamp: record.timestamp,
      }));
      const data: HistoryData = { transactions, count: transactions.length };
      return createSuccessOutcome(data);
    } catch (error) {
      return outcomeFromError(error);
    }
  },
});

export const accountTools: ToolDefinition[] = [checkBalanceTool, transactionHistoryTool];
