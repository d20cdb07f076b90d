import type Database from 'better-sqlite3';

import { ToolCallBridge } from '../agent/bridge.js';
import { createToolRegistry } from '../agent/tools/adapters/index.js';
import type { ToolRegistry } from '../agent/tools/registry.js';
import type { PersistToolCallLog } from '../agent/tools/types.js';
import { BinancePriceOracle } from '../execution/binance/oracle.js';
import { NullPriceOracle, type PriceOracle } from '../execution/price-oracle.js';
import { SlidingWindowRateLimiter, type RateLimiter } from '../execution/rate-limiter.js';
import { openDatabase } from '../memory/db.js';
import { SqliteLedgerStore, type LedgerStore } from '../memory/ledger.js';
import { insertToolCallLog } from '../memory/tool_call_logs.js';
import type { TradeBridgeConfig } from './config.js';
import { Logger } from './logger.js';

export const DEFAULT_USER_ID = 'user_default';

export interface RuntimeOverrides {
  db?: Database.Database;
  oracle?: PriceOracle;
  ledger?: LedgerStore;
  rateLimiter?: RateLimiter;
  persist?: PersistToolCallLog;
  logger?: Logger;
}

export function createToolCallLogSink(db: Database.Database): PersistToolCallLog {
  return (userId, entry) => insertToolCallLog(userId, entry, db);
}

export function createPriceOracle(config: TradeBridgeConfig): PriceOracle {
  if (config.exchange.provider === 'binance') {
    return BinancePriceOracle.fromConfig(config);
  }
  return new NullPriceOracle();
}

/**
 * Process-wide collaborators plus one cached bridge per user key. The rate
 * limiter is shared by every bridge this runtime hands out.
 */
export class TradeBridgeRuntime {
  readonly logger: Logger;
  readonly oracle: PriceOracle;
  readonly ledger: LedgerStore;
  readonly rateLimiter: RateLimiter;
  readonly registry: ToolRegistry;
  private persist: PersistToolCallLog;
  private bridges = new Map<string, ToolCallBridge>();

  constructor(
    readonly config: TradeBridgeConfig,
    overrides: RuntimeOverrides = {}
  ) {
    this.logger = overrides.logger ?? new Logger(config.logging.level);
    this.oracle = overrides.oracle ?? createPriceOracle(config);
    this.rateLimiter =
      overrides.rateLimiter ??
      new SlidingWindowRateLimiter({
        maxCalls: config.rateLimit.maxCalls,
        windowMs: config.rateLimit.windowMs,
      });
    this.registry = createToolRegistry();

    const db = (): Database.Database => overrides.db ?? openDatabase(config.ledger.dbPath);
    this.ledger =
      overrides.ledger ?? new SqliteLedgerStore({ db: db(), initialUsd: config.ledger.initialUsd });
    this.persist = overrides.persist ?? createToolCallLogSink(db());
  }

  /**
   * Bridge for a user session, created on first use.
   */
  bridgeFor(userId: string = DEFAULT_USER_ID): ToolCallBridge {
    const existing = this.bridges.get(userId);
    if (existing) return existing;

    const bridge = new ToolCallBridge({
      userId,
      registry: this.registry,
      oracle: this.oracle,
      ledger: this.ledger,
      rateLimiter: this.rateLimiter,
      defaultQuote: this.config.exchange.defaultQuote,
      persist: this.persist,
      logger: this.logger.child(`bridge:${userId}`),
    });
    this.bridges.set(userId, bridge);
    return bridge;
  }

  /**
   * Wait for every bridge's pending audit writes.
   */
  async flush(): Promise<void> {
    await Promise.all(Array.from(this.bridges.values(), (bridge) => bridge.flush()));
  }
}

export function createRuntime(config: TradeBridgeConfig, overrides?: RuntimeOverrides): TradeBridgeRuntime {
  return new TradeBridgeRuntime(config, overrides);
}
