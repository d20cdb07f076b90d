import type Database from 'better-sqlite3';

import { openDatabase } from './db.js';

export const USD = 'USD';
export const DEFAULT_INITIAL_USD = 10_000;

/** Asset symbol → balance. Always carries a `USD` entry once seeded. */
export type WalletBalances = Record<string, number>;

export type TransactionType = 'BUY';

export interface TransactionInput {
  userId: string;
  type: TransactionType;
  /** Base asset, e.g. `BTC`. */
  symbol: string;
  /** Crypto amount credited. */
  amount: number;
  price: number;
  usdValue: number;
  timestamp: string;
}

export interface TransactionRecord extends TransactionInput {
  id: number;
}

export interface BuyRequest {
  userId: string;
  asset: string;
  cryptoAmount: number;
  usdAmount: number;
  price: number;
}

export type BuyResult =
  | { ok: true; transaction: TransactionRecord; balances: WalletBalances }
  | {
      ok: false;
      reason: 'insufficient';
      required: number;
      available: number;
      message: string;
    };

/**
 * Storage boundary for paper wallets and their trade history.
 *
 * `applyBuy` must decide sufficiency and mutate balances as one atomic step;
 * on rejection nothing is written.
 */
export interface LedgerStore {
  ensureWallet(userId: string): Promise<WalletBalances>;
  readBalances(userId: string): Promise<WalletBalances>;
  applyBuy(request: BuyRequest): Promise<BuyResult>;
  appendTransaction(record: TransactionInput): Promise<TransactionRecord>;
  listTransactions(userId: string, limit: number): Promise<TransactionRecord[]>;
}

export function formatUsd(value: number): string {
  return `$${value.toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  })}`;
}

export function insufficientBalanceMessage(required: number, available: number): string {
  return `Insufficient balance. Need ${formatUsd(required)}, have ${formatUsd(available)}`;
}

interface AssetRow {
  asset: string;
  balance: number;
}

interface TransactionRow {
  id: number;
  user_id: string;
  type: string;
  symbol: string;
  amount: number;
  price: number;
  usd_value: number;
  timestamp: string;
}

function toTransactionRecord(row: TransactionRow): TransactionRecord {
  return {
    id: row.id,
    userId: row.user_id,
    type: 'BUY',
    symbol: row.symbol,
    amount: row.amount,
    price: row.price,
    usdValue: row.usd_value,
    timestamp: row.timestamp,
  };
}

export interface SqliteLedgerStoreOptions {
  /** Database file; defaults to the shared handle from `openDatabase()`. */
  dbPath?: string;
  db?: Database.Database;
  initialUsd?: number;
  now?: () => Date;
}

export class SqliteLedgerStore implements LedgerStore {
  private db: Database.Database;
  private initialUsd: number;
  private now: () => Date;

  constructor(options: SqliteLedgerStoreOptions = {}) {
    this.db = options.db ?? openDatabase(options.dbPath);
    this.initialUsd = options.initialUsd ?? DEFAULT_INITIAL_USD;
    this.now = options.now ?? (() => new Date());
  }

  async ensureWallet(userId: string): Promise<WalletBalances> {
    this.seedWallet(userId);
    return this.selectBalances(userId);
  }

  /** Plain read; an unknown user has no balances until seeded. */
  async readBalances(userId: string): Promise<WalletBalances> {
    return this.selectBalances(userId);
  }

  async applyBuy(request: BuyRequest): Promise<BuyResult> {
    const run = this.db.transaction((req: BuyRequest): BuyResult => {
      this.seedWallet(req.userId);

      // Sufficiency check and debit in one statement: no stale snapshot.
      const debit = this.db
        .prepare<{ userId: string; usd: number }>(
          `
            UPDATE wallet_assets
            SET balance = balance - @usd
            WHERE user_id = @userId AND asset = 'USD' AND balance >= @usd
          `
        )
        .run({ userId: req.userId, usd: req.usdAmount });

      if (debit.changes === 0) {
        const available = this.selectBalances(req.userId)[USD] ?? 0;
        return {
          ok: false,
          reason: 'insufficient',
          required: req.usdAmount,
          available,
          message: insufficientBalanceMessage(req.usdAmount, available),
        };
      }

      const timestamp = this.now().toISOString();
      this.db
        .prepare<{ userId: string; asset: string; amount: number }>(
          `
            INSERT INTO wallet_assets (user_id, asset, balance)
            VALUES (@userId, @asset, @amount)
            ON CONFLICT(user_id, asset) DO UPDATE SET balance = balance + excluded.balance
          `
        )
        .run({ userId: req.userId, asset: req.asset, amount: req.cryptoAmount });
      this.db
        .prepare<[string, string]>('UPDATE wallets SET updated_at = ? WHERE user_id = ?')
        .run(timestamp, req.userId);

      const transaction = this.insertTransaction({
        userId: req.userId,
        type: 'BUY',
        symbol: req.asset,
        amount: req.cryptoAmount,
        price: req.price,
        usdValue: req.usdAmount,
        timestamp,
      });

      return { ok: true, transaction, balances: this.selectBalances(req.userId) };
    });

    return run.immediate(request);
  }

  async appendTransaction(record: TransactionInput): Promise<TransactionRecord> {
    return this.insertTransaction(record);
  }

  async listTransactions(userId: string, limit: number): Promise<TransactionRecord[]> {
    const rows = this.db
      .prepare<[string, number], TransactionRow>(
        `
          SELECT id, user_id, type, symbol, amount, price, usd_value, timestamp
          FROM transactions
          WHERE user_id = ?
          ORDER BY timestamp DESC, id DESC
          LIMIT ?
        `
      )
      .all(userId, Math.max(0, Math.floor(limit)));
    return rows.map(toTransactionRecord);
  }

  private seedWallet(userId: string): void {
    const seed = this.db.transaction((id: string) => {
      const timestamp = this.now().toISOString();
      const inserted = this.db
        .prepare<[string, string, string]>(
          'INSERT OR IGNORE INTO wallets (user_id, created_at, updated_at) VALUES (?, ?, ?)'
        )
        .run(id, timestamp, timestamp);
      if (inserted.changes > 0) {
        this.db
          .prepare<[string, number]>(
            "INSERT INTO wallet_assets (user_id, asset, balance) VALUES (?, 'USD', ?)"
          )
          .run(id, this.initialUsd);
      }
    });
    seed(userId);
  }

  private selectBalances(userId: string): WalletBalances {
    const rows = this.db
      .prepare<[string], AssetRow>(
        'SELECT asset, balance FROM wallet_assets WHERE user_id = ? ORDER BY asset'
      )
      .all(userId);
    const balances: WalletBalances = {};
    for (const row of rows) {
      balances[row.asset] = row.balance;
    }
    return balances;
  }

  private insertTransaction(record: TransactionInput): TransactionRecord {
    const result = this.db
      .prepare<TransactionInput>(
        `
          INSERT INTO transactions (user_id, type, symbol, amount, price, usd_value, timestamp)
          VALUES (@userId, @type, @symbol, @amount, @price, @usdValue, @timestamp)
        `
      )
      .run(record);
    return { ...record, id: Number(result.lastInsertRowid) };
  }
}
