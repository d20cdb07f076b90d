#!/usr/bin/env node
import 'dotenv/config';
/**
 * tradebridge CLI
 *
 * Drives the tool bridge by hand: the same calls an agent makes, plus
 * access to the persisted call log.
 */

import { Command } from 'commander';

import { VERSION } from '../index.js';
import { loadConfig } from '../core/config.js';
import { createRuntime, DEFAULT_USER_ID, type TradeBridgeRuntime } from '../core/runtime.js';
import { openDatabase } from '../memory/db.js';
import { clearToolCallLogs, listToolCallLogs } from '../memory/tool_call_logs.js';
import type { ToolInvocationLogEntry } from '../agent/tools/types.js';

interface GlobalOptions {
  config?: string;
  user: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseToolArgs(raw: string | undefined): Record<string, unknown> {
  if (!raw) return {};
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error('--args must be a JSON object');
  }
  return parsed;
}

function parsePositiveInt(raw: string, name: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
  return value;
}

const program = new Command();

program
  .name('tradebridge')
  .description('Paper trading tool bridge')
  .version(VERSION)
  .option('-c, --config <path>', 'Config file (YAML)')
  .option('-u, --user <id>', 'User key', DEFAULT_USER_ID);

let runtime: TradeBridgeRuntime | null = null;

function getRuntime(): TradeBridgeRuntime {
  if (!runtime) {
    const options = program.opts<GlobalOptions>();
    runtime = createRuntime(loadConfig(options.config));
  }
  return runtime;
}

function userId(): string {
  return program.opts<GlobalOptions>().user;
}

async function printCall(name: string, args: Record<string, unknown>): Promise<void> {
  const active = getRuntime();
  const entry: ToolInvocationLogEntry = await active.bridgeFor(userId()).callTool(name, args);
  await active.flush();
  if ('error' in entry.response) {
    console.error(`Error ${entry.response.error.code}: ${entry.response.error.message}`);
    process.exitCode = 1;
    return;
  }
  console.log(entry.response.result.content[0]?.text ?? '');
  if (entry.response.result.isError) {
    process.exitCode = 1;
  }
}

// ============================================================================
// Tool Commands
// ============================================================================

const tools = program.command('tools').description('Tool registry');

tools
  .command('list')
  .description('List available tools')
  .option('--json', 'Print the raw tools/list response', false)
  .action(async (options: { json: boolean }) => {
    const active = getRuntime();
    const entry = await active.bridgeFor(userId()).listTools();
    await active.flush();
    if (options.json) {
      console.log(JSON.stringify(entry.response, null, 2));
      return;
    }
    console.log('Tools');
    console.log('─'.repeat(60));
    for (const tool of entry.response.result.tools) {
      const required = tool.inputSchema.required?.join(', ') ?? '';
      console.log(`${tool.name} (${required || 'no required args'})`);
      console.log(`  ${tool.description}`);
    }
  });

tools
  .command('call <name>')
  .description('Call a tool by name')
  .option('-a, --args <json>', 'Tool arguments as a JSON object')
  .action(async (name: string, options: { args?: string }) => {
    await printCall(name, parseToolArgs(options.args));
  });

// ============================================================================
// Trading Shortcuts
// ============================================================================

program
  .command('price <symbol>')
  .description('Current price for a symbol')
  .action(async (symbol: string) => {
    await printCall('get_crypto_price', { symbol });
  });

program
  .command('orderbook <symbol>')
  .description('Order book depth for a symbol')
  .option('-l, --limit <number>', 'Levels per side', '5')
  .action(async (symbol: string, options: { limit: string }) => {
    await printCall('get_orderbook', { symbol, limit: parsePositiveInt(options.limit, 'limit') });
  });

program
  .command('buy <symbol> <amount>')
  .description('Simulate buying <amount> USD of <symbol>')
  .action(async (symbol: string, amount: string) => {
    await printCall('buy_crypto', { symbol, amount: Number(amount) });
  });

program
  .command('balance')
  .description('Wallet balance with USD values')
  .action(async () => {
    await printCall('check_balance', {});
  });

program
  .command('history')
  .description('Recent transactions')
  .option('-l, --limit <number>', 'Number of transactions', '10')
  .action(async (options: { limit: string }) => {
    await printCall('transaction_history', { limit: parsePositiveInt(options.limit, 'limit') });
  });

// ============================================================================
// Call Log
// ============================================================================

program
  .command('logs')
  .description('Persisted tool call log, newest first')
  .option('-l, --limit <number>', 'Entries to show', '20')
  .option('-o, --offset <number>', 'Entries to skip', '0')
  .option('--clear', 'Delete the persisted log for the user', false)
  .action(async (options: { limit: string; offset: string; clear: boolean }) => {
    const db = openDatabase(loadConfig(program.opts<GlobalOptions>().config).ledger.dbPath);
    if (options.clear) {
      const deleted = clearToolCallLogs(userId(), db);
      console.log(`Deleted ${deleted} log entr${deleted === 1 ? 'y' : 'ies'}.`);
      return;
    }
    const entries = listToolCallLogs(
      userId(),
      { limit: parsePositiveInt(options.limit, 'limit'), offset: Number(options.offset) || 0 },
      db
    );
    if (entries.length === 0) {
      console.log('No logged calls.');
      return;
    }
    for (const entry of entries) {
      console.log(`${new Date(entry.timestamp).toISOString()} ${entry.type}`);
      console.log(`  request:  ${JSON.stringify(entry.request)}`);
      console.log(`  response: ${JSON.stringify(entry.response)}`);
    }
  });

// ============================================================================
// Parse and Run
// ============================================================================

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
