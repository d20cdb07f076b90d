/**
 * tradebridge - tool-call bridge for a paper spot-trading agent
 *
 * Main entry point for the library.
 */

export const VERSION = '0.1.0';

export { loadConfig, parseConfig, type TradeBridgeConfig } from './core/config.js';
export { Logger, parseLogLevel, type LogLevel } from './core/logger.js';
export {
  TradeBridgeRuntime,
  createRuntime,
  createPriceOracle,
  createToolCallLogSink,
  DEFAULT_USER_ID,
  type RuntimeOverrides,
} from './core/runtime.js';

export {
  ToolCallBridge,
  RATE_LIMIT_MESSAGE,
  type ToolCallBridgeOptions,
  type ToolCallBridgeStats,
} from './agent/bridge.js';
export { ToolRegistry, defineTool, zodToInputSchema } from './agent/tools/registry.js';
export { ALL_TOOLS, createToolRegistry } from './agent/tools/adapters/index.js';
export {
  createSuccessOutcome,
  createErrorOutcome,
  formatOutcomeForDisplay,
} from './agent/tools/outcome.js';
export {
  normalizeSymbol,
  baseAsset,
  validatePositiveAmount,
  ValidationError,
  DEFAULT_QUOTE,
} from './agent/tools/validate.js';
export type * from './agent/tools/types.js';
export { JSONRPC_VERSION, METHOD_NOT_FOUND } from './agent/tools/types.js';

export {
  SlidingWindowRateLimiter,
  type RateLimiter,
  type RateLimiterOptions,
  type RateLimiterState,
} from './execution/rate-limiter.js';
export {
  NullPriceOracle,
  PriceOracleError,
  type OrderBook,
  type PriceLevel,
  type PriceOracle,
  type Ticker,
} from './execution/price-oracle.js';
export { BinancePriceOracle } from './execution/binance/oracle.js';

export {
  SqliteLedgerStore,
  formatUsd,
  USD,
  DEFAULT_INITIAL_USD,
  type BuyRequest,
  type BuyResult,
  type LedgerStore,
  type TransactionInput,
  type TransactionRecord,
  type WalletBalances,
} from './memory/ledger.js';
export { openDatabase, closeDatabase } from './memory/db.js';
export {
  insertToolCallLog,
  listToolCallLogs,
  clearToolCallLogs,
  type StoredToolCallLog,
} from './memory/tool_call_logs.js';
