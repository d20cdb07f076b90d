/**
 * Tool Types
 *
 * Tool definitions, the normalized outcome every handler returns, and the
 * JSON-RPC 2.0 shaped envelopes the bridge records for each call.
 */

import type { z } from 'zod';

import type { PriceOracle } from '../../execution/price-oracle.js';
import type { LedgerStore } from '../../memory/ledger.js';

/**
 * Tool categories for organization and filtering.
 */
export type ToolCategory =
  | 'market'    // Oracle lookups
  | 'trading'   // Paper order execution
  | 'account';  // Wallet and history

/**
 * Closed failure taxonomy surfaced by handlers.
 */
export type ToolErrorType =
  | 'validation_error'
  | 'exchange_error'
  | 'insufficient_balance'
  | 'rate_limit_exceeded'
  | 'tool_error';

export interface ToolSuccess<T = unknown> {
  success: true;
  data: T;
  /** Epoch milliseconds. */
  timestamp: number;
  metadata?: Record<string, unknown>;
}

export interface ToolFailure {
  success: false;
  error: {
    type: ToolErrorType;
    message: string;
    timestamp: number;
  };
}

/**
 * Result of a tool execution.
 */
export type ToolOutcome<T = unknown> = ToolSuccess<T> | ToolFailure;

/**
 * Context passed to tool execution.
 */
export interface ToolContext {
  /** User key scoping the wallet and history */
  userId: string;
  oracle: PriceOracle;
  ledger: LedgerStore;
  /** Quote asset appended to bare symbols */
  defaultQuote: string;
}

/**
 * Definition of a tool that the agent can use.
 */
export interface ToolDefinition {
  /** Unique tool name */
  name: string;

  /** Human-readable description */
  description: string;

  /** Category for filtering */
  category: ToolCategory;

  /** Zod schema for input validation */
  schema: z.AnyZodObject;

  /** Whether calls count against the shared exchange rate limit */
  rateLimited: boolean;

  /** Execute the tool; `input` has already passed `schema` */
  execute: (input: unknown, ctx: ToolContext) => Promise<ToolOutcome>;
}

/**
 * JSON-schema view of a tool input, as advertised by `tools/list`.
 */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, ToolInputProperty>;
  required?: string[];
}

export interface ToolInputProperty {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  description?: string;
  default?: unknown;
}

export interface ToolSchemaView {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export const JSONRPC_VERSION = '2.0';
export const METHOD_NOT_FOUND = -32601;

export type ToolMethod = 'tools/list' | 'tools/call';

export interface JsonRpcRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  method: ToolMethod;
  params?: { name: string; arguments: Record<string, unknown> };
  id: number;
}

export interface JsonRpcSuccess<TResult> {
  jsonrpc: typeof JSONRPC_VERSION;
  result: TResult;
  id: number;
}

export interface JsonRpcError {
  jsonrpc: typeof JSONRPC_VERSION;
  error: { code: number; message: string };
  id: number;
}

export interface ToolListResult {
  tools: ToolSchemaView[];
}

export interface ToolCallResult {
  content: Array<{ type: 'text'; text: string }>;
  isError: boolean;
  structuredResult: ToolOutcome;
}

export interface ToolListLogEntry {
  type: 'tools/list';
  request: JsonRpcRequest;
  response: JsonRpcSuccess<ToolListResult>;
  /** Epoch milliseconds when the response was built. */
  timestamp: number;
}

export interface ToolInvocationLogEntry {
  type: 'tools/call';
  request: JsonRpcRequest;
  response: JsonRpcSuccess<ToolCallResult> | JsonRpcError;
  timestamp: number;
}

/**
 * One logged request/response pair.
 */
export type ToolCallLogEntry = ToolListLogEntry | ToolInvocationLogEntry;

/**
 * Receives every envelope once; failures never affect the call.
 */
export type PersistToolCallLog = (userId: string, entry: ToolCallLogEntry) => void | Promise<void>;
