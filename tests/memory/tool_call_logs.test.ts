import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  clearToolCallLogs,
  insertToolCallLog,
  listToolCallLogs,
} from '../../src/memory/tool_call_logs.js';
import type { ToolCallLogEntry } from '../../src/agent/tools/types.js';
import { createTempDatabase, type TempDatabase } from '../helpers/fakes.js';

function listEntry(id: number, timestamp: number): ToolCallLogEntry {
  return {
    type: 'tools/list',
    request: { jsonrpc: '2.0', method: 'tools/list', id },
    response: { jsonrpc: '2.0', result: { tools: [] }, id },
    timestamp,
  };
}

function notFoundEntry(id: number, timestamp: number): ToolCallLogEntry {
  return {
    type: 'tools/call',
    request: {
      jsonrpc: '2.0',
      method: 'tools/call',
      params: { name: 'sell_crypto', arguments: { symbol: 'BTC' } },
      id,
    },
    response: { jsonrpc: '2.0', error: { code: -32601, message: 'Tool not found: sell_crypto' }, id },
    timestamp,
  };
}

describe('tool_call_logs', () => {
  let temp: TempDatabase;

  beforeEach(() => {
    temp = createTempDatabase();
  });

  afterEach(() => {
    temp.cleanup();
  });

  it('stores envelopes and returns them newest first', () => {
    insertToolCallLog('user-1', listEntry(1, 1_000), temp.db);
    insertToolCallLog('user-1', notFoundEntry(2, 2_000), temp.db);

    const logs = listToolCallLogs('user-1', undefined, temp.db);
    expect(logs.map((log) => log.type)).toEqual(['tools/call', 'tools/list']);
    expect(logs[0].timestamp).toBe(2_000);
    expect(logs[0].request).toEqual({
      jsonrpc: '2.0',
      method: 'tools/call',
      params: { name: 'sell_crypto', arguments: { symbol: 'BTC' } },
      id: 2,
    });
    expect(logs[0].response).toEqual({
      jsonrpc: '2.0',
      error: { code: -32601, message: 'Tool not found: sell_crypto' },
      id: 2,
    });
  });

  it('pages with limit and offset', () => {
    for (let i = 1; i <= 5; i += 1) {
      insertToolCallLog('user-1', listEntry(i, i * 1_000), temp.db);
    }

    const page = listToolCallLogs('user-1', { limit: 2, offset: 1 }, temp.db);
    expect(page.map((log) => log.timestamp)).toEqual([4_000, 3_000]);
  });

  it('clears only the requested user', () => {
    insertToolCallLog('user-1', listEntry(1, 1_000), temp.db);
    insertToolCallLog('user-1', listEntry(2, 2_000), temp.db);
    insertToolCallLog('user-2', listEntry(1, 3_000), temp.db);

    expect(clearToolCallLogs('user-1', temp.db)).toBe(2);
    expect(listToolCallLogs('user-1', undefined, temp.db)).toEqual([]);
    expect(listToolCallLogs('user-2', undefined, temp.db)).toHaveLength(1);
  });
});
