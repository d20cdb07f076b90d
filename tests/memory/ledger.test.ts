import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { SqliteLedgerStore, formatUsd } from '../../src/memory/ledger.js';
import { createTempDatabase, steppingClock, type TempDatabase } from '../helpers/fakes.js';

describe('SqliteLedgerStore', () => {
  let temp: TempDatabase;
  let ledger: SqliteLedgerStore;

  beforeEach(() => {
    temp = createTempDatabase();
    ledger = new SqliteLedgerStore({ db: temp.db, now: steppingClock() });
  });

  afterEach(() => {
    temp.cleanup();
  });

  it('seeds a wallet with the initial USD balance once', async () => {
    expect(await ledger.ensureWallet('user-1')).toEqual({ USD: 10000 });
    expect(await ledger.ensureWallet('user-1')).toEqual({ USD: 10000 });
    expect(await ledger.readBalances('user-1')).toEqual({ USD: 10000 });
  });

  it('honours a configured seed balance', async () => {
    const small = new SqliteLedgerStore({ db: temp.db, initialUsd: 250 });
    expect(await small.ensureWallet('user-2')).toEqual({ USD: 250 });
  });

  it('debits USD, credits the asset and records one transaction', async () => {
    const result = await ledger.applyBuy({
      userId: 'user-1',
      asset: 'ETH',
      cryptoAmount: 0.05,
      usdAmount: 100,
      price: 2000,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.balances).toEqual({ ETH: 0.05, USD: 9900 });
    expect(result.transaction).toMatchObject({
      userId: 'user-1',
      type: 'BUY',
      symbol: 'ETH',
      amount: 0.05,
      price: 2000,
      usdValue: 100,
    });

    const history = await ledger.listTransactions('user-1', 10);
    expect(history).toHaveLength(1);
    expect(history[0]).toEqual(result.transaction);
  });

  it('accumulates repeated buys of the same asset', async () => {
    const buy = { userId: 'user-1', asset: 'ETH', cryptoAmount: 0.05, usdAmount: 100, price: 2000 };
    await ledger.applyBuy(buy);
    await ledger.applyBuy(buy);

    expect(await ledger.readBalances('user-1')).toEqual({ ETH: 0.1, USD: 9800 });
    expect(await ledger.listTransactions('user-1', 10)).toHaveLength(2);
  });

  it('rejects an overdraw without touching balances or history', async () => {
    const result = await ledger.applyBuy({
      userId: 'user-1',
      asset: 'BTC',
      cryptoAmount: 1,
      usdAmount: 50000,
      price: 50000,
    });

    expect(result).toEqual({
      ok: false,
      reason: 'insufficient',
      required: 50000,
      available: 10000,
      message: 'Insufficient balance. Need $50,000.00, have $10,000.00',
    });
    expect(await ledger.readBalances('user-1')).toEqual({ USD: 10000 });
    expect(await ledger.listTransactions('user-1', 10)).toEqual([]);
  });

  it('allows spending the exact balance and nothing more', async () => {
    const all = await ledger.applyBuy({
      userId: 'user-1',
      asset: 'SOL',
      cryptoAmount: 100,
      usdAmount: 10000,
      price: 100,
    });
    expect(all.ok).toBe(true);

    const more = await ledger.applyBuy({
      userId: 'user-1',
      asset: 'SOL',
      cryptoAmount: 0.01,
      usdAmount: 1,
      price: 100,
    });
    expect(more.ok).toBe(false);
    if (more.ok) return;
    expect(more.message).toBe('Insufficient balance. Need $1.00, have $0.00');
    expect(await ledger.readBalances('user-1')).toEqual({ SOL: 100, USD: 0 });
  });

  it('never lets concurrent buys jointly overdraw', async () => {
    const buy = { userId: 'user-1', asset: 'BTC', cryptoAmount: 0.1, usdAmount: 4000, price: 40000 };
    const results = await Promise.all([ledger.applyBuy(buy), ledger.applyBuy(buy), ledger.applyBuy(buy)]);

    expect(results.filter((result) => result.ok)).toHaveLength(2);
    expect(results.filter((result) => !result.ok)).toHaveLength(1);
    const balances = await ledger.readBalances('user-1');
    expect(balances.USD).toBe(2000);
    expect(await ledger.listTransactions('user-1', 10)).toHaveLength(2);
  });

  it('keeps wallets separate per user key', async () => {
    await ledger.applyBuy({ userId: 'alice', asset: 'ETH', cryptoAmount: 0.05, usdAmount: 100, price: 2000 });

    expect(await ledger.readBalances('bob')).toEqual({});
    expect(await ledger.ensureWallet('bob')).toEqual({ USD: 10000 });
    expect(await ledger.listTransactions('bob', 10)).toEqual([]);
  });

  it('reads balances without seeding a wallet', async () => {
    expect(await ledger.readBalances('user-9')).toEqual({});
    expect(await ledger.readBalances('user-9')).toEqual({});
    expect(await ledger.ensureWallet('user-9')).toEqual({ USD: 10000 });
    expect(await ledger.readBalances('user-9')).toEqual({ USD: 10000 });
  });

  it('lists transactions newest first up to the limit', async () => {
    for (const [asset, usd] of [
      ['BTC', 100],
      ['ETH', 200],
      ['SOL', 300],
    ] as const) {
      await ledger.applyBuy({ userId: 'user-1', asset, cryptoAmount: 1, usdAmount: usd, price: usd });
    }

    const latestTwo = await ledger.listTransactions('user-1', 2);
    expect(latestTwo.map((tx) => tx.symbol)).toEqual(['SOL', 'ETH']);
  });

  it('appends standalone transaction records', async () => {
    const record = await ledger.appendTransaction({
      userId: 'user-1',
      type: 'BUY',
      symbol: 'ADA',
      amount: 10,
      price: 0.5,
      usdValue: 5,
      timestamp: '2026-02-01T00:00:00.000Z',
    });

    expect(record.id).toBeGreaterThan(0);
    expect(await ledger.listTransactions('user-1', 1)).toEqual([record]);
  });
});

describe('formatUsd', () => {
  it('renders two decimals with thousands separators', () => {
    expect(formatUsd(1234567.891)).toBe('$1,234,567.89');
    expect(formatUsd(0)).toBe('$0.00');
  });
});
