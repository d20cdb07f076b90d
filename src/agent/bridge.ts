/**
 * Tool Call Bridge
 *
 * Dispatches tool calls for one user and records each one as a JSON-RPC 2.0
 * request/response pair for audit and inspector replay.
 */

import type { ZodError } from 'zod';

import { Logger } from '../core/logger.js';
import type { RateLimiter } from '../execution/rate-limiter.js';
import type { PriceOracle } from '../execution/price-oracle.js';
import type { LedgerStore } from '../memory/ledger.js';
import type { ToolRegistry } from './tools/registry.js';
import {
  createErrorOutcome,
  errorMessage,
  formatOutcomeForDisplay,
} from './tools/outcome.js';
import {
  JSONRPC_VERSION,
  METHOD_NOT_FOUND,
  type JsonRpcRequest,
  type PersistToolCallLog,
  type ToolCallLogEntry,
  type ToolContext,
  type ToolDefinition,
  type ToolInvocationLogEntry,
  type ToolListLogEntry,
  type ToolOutcome,
} from './tools/types.js';
import { DEFAULT_QUOTE } from './tools/validate.js';

export const RATE_LIMIT_MESSAGE = 'API rate limit exceeded. Please try again later.';

export interface ToolCallBridgeOptions {
  userId: string;
  registry: ToolRegistry;
  oracle: PriceOracle;
  ledger: LedgerStore;
  /** Shared across bridges; gates `rateLimited` tools only. */
  rateLimiter: RateLimiter;
  defaultQuote?: string;
  persist?: PersistToolCallLog;
  logger?: Logger;
  now?: () => number;
}

export interface ToolCallBridgeStats {
  calls: number;
  errors: number;
  persisted: number;
  persistFailures: number;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'arguments'}: ${issue.message}`)
    .join('; ');
}

export class ToolCallBridge {
  readonly userId: string;
  private registry: ToolRegistry;
  private rateLimiter: RateLimiter;
  private context: ToolContext;
  private persist?: PersistToolCallLog;
  private logger: Logger;
  private now: () => number;

  private callLog: ToolCallLogEntry[] = [];
  private nextId = 1;
  private queue: Promise<void> = Promise.resolve();
  private pending = new Set<Promise<void>>();
  private stats: ToolCallBridgeStats = { calls: 0, errors: 0, persisted: 0, persistFailures: 0 };

  constructor(options: ToolCallBridgeOptions) {
    this.userId = options.userId;
    this.registry = options.registry;
    this.rateLimiter = options.rateLimiter;
    this.persist = options.persist;
    this.logger = options.logger ?? new Logger('info');
    this.now = options.now ?? Date.now;
    this.context = {
      userId: options.userId,
      oracle: options.oracle,
      ledger: options.ledger,
      defaultQuote: options.defaultQuote ?? DEFAULT_QUOTE,
    };
  }

  /**
   * `tools/list`: advertise every registered tool. Always succeeds.
   */
  listTools(): Promise<ToolListLogEntry> {
    return this.serialize(async () => {
      const id = this.nextId++;
      const request: JsonRpcRequest = { jsonrpc: JSONRPC_VERSION, method: 'tools/list', id };
      const entry: ToolListLogEntry = {
        type: 'tools/list',
        request,
        response: {
          jsonrpc: JSONRPC_VERSION,
          result: { tools: this.registry.listSchemas() },
          id,
        },
        timestamp: this.now(),
      };
      this.record(entry);
      return entry;
    });
  }

  /**
   * `tools/call`: run one tool. Never rejects on handler faults; the fault
   * is folded into the recorded response.
   */
  callTool(name: string, args: Record<string, unknown> = {}): Promise<ToolInvocationLogEntry> {
    return this.serialize(async () => {
      const id = this.nextId++;
      const request: JsonRpcRequest = {
        jsonrpc: JSONRPC_VERSION,
        method: 'tools/call',
        params: { name, arguments: args },
        id,
      };

      const tool = this.registry.resolve(name);
      if (!tool) {
        this.logger.warn(`tools/call #${id}: unknown tool ${name}`);
        const notFound: ToolInvocationLogEntry = {
          type: 'tools/call',
          request,
          response: {
            jsonrpc: JSONRPC_VERSION,
            error: { code: METHOD_NOT_FOUND, message: `Tool not found: ${name}` },
            id,
          },
          timestamp: this.now(),
        };
        this.record(notFound);
        return notFound;
      }

      const outcome = await this.invoke(tool, args);
      if (outcome.success) {
        this.logger.debug(`tools/call #${id}: ${name} ok`);
      } else {
        this.logger.warn(
          `tools/call #${id}: ${name} failed (${outcome.error.type}): ${outcome.error.message}`
        );
      }

      const entry: ToolInvocationLogEntry = {
        type: 'tools/call',
        request,
        response: {
          jsonrpc: JSONRPC_VERSION,
          result: {
            content: [{ type: 'text', text: formatOutcomeForDisplay(outcome) }],
            isError: !outcome.success,
            structuredResult: outcome,
          },
          id,
        },
        timestamp: this.now(),
      };
      this.record(entry);
      return entry;
    });
  }

  /**
   * Text an agent consumes: the rendered outcome, or the JSON-RPC error.
   */
  async callToolText(name: string, args: Record<string, unknown> = {}): Promise<string> {
    const entry = await this.callTool(name, args);
    if ('error' in entry.response) {
      return `Error: ${entry.response.error.message}`;
    }
    return entry.response.result.content[0]?.text ?? '';
  }

  /**
   * Deep copy of the call log in append order.
   */
  getLog(): ToolCallLogEntry[] {
    return this.callLog.map((entry) => structuredClone(entry));
  }

  /**
   * Drop the log and restart ids at 1.
   */
  clearLog(): void {
    this.callLog = [];
    this.nextId = 1;
  }

  getStats(): ToolCallBridgeStats {
    return { ...this.stats };
  }

  /**
   * Wait for outstanding persistence callbacks.
   */
  async flush(): Promise<void> {
    await Promise.all(Array.from(this.pending));
  }

  private async invoke(tool: ToolDefinition, args: Record<string, unknown>): Promise<ToolOutcome> {
    const parsed = tool.schema.safeParse(args);
    if (!parsed.success) {
      return createErrorOutcome(
        'validation_error',
        `Invalid arguments for ${tool.name}: ${formatIssues(parsed.error)}`
      );
    }

    if (tool.rateLimited && !this.rateLimiter.admit()) {
      return createErrorOutcome('rate_limit_exceeded', RATE_LIMIT_MESSAGE);
    }

    try {
      return await tool.execute(parsed.data, this.context);
    } catch (error) {
      this.logger.error(`Tool ${tool.name} threw`, error);
      return createErrorOutcome('tool_error', errorMessage(error));
    }
  }

  // Stored and persisted entries are private copies; callers keep theirs.
  private record(entry: ToolCallLogEntry): void {
    this.callLog.push(structuredClone(entry));
    this.stats.calls += 1;
    if (entry.type === 'tools/call' && ('error' in entry.response || entry.response.result.isError)) {
      this.stats.errors += 1;
    }
    this.persistEntry(structuredClone(entry));
  }

  private persistEntry(entry: ToolCallLogEntry): void {
    const persist = this.persist;
    if (!persist) return;

    const task: Promise<void> = Promise.resolve()
      .then(() => persist(this.userId, entry))
      .then(() => {
        this.stats.persisted += 1;
      })
      .catch((error: unknown) => {
        // The call already succeeded; only the audit copy is lost.
        this.stats.persistFailures += 1;
        this.logger.warn(
          `Failed to persist ${entry.type} #${entry.request.id} for ${this.userId}: ${errorMessage(error)}`
        );
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  /**
   * Run dispatches one at a time so ids and log order agree.
   */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
