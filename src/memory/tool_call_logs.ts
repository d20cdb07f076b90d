import type Database from 'better-sqlite3';

import { openDatabase } from './db.js';
import type { ToolCallLogEntry } from '../agent/tools/types.js';

export interface StoredToolCallLog {
  id: number;
  userId: string;
  type: ToolCallLogEntry['type'];
  request: unknown;
  response: unknown;
  timestamp: number;
  createdAt: string;
}

interface ToolCallLogRow {
  id: number;
  user_id: string;
  type: string;
  request: string;
  response: string;
  timestamp: number;
  created_at: string;
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export function insertToolCallLog(
  userId: string,
  entry: ToolCallLogEntry,
  db: Database.Database = openDatabase()
): void {
  db.prepare<{
    userId: string;
    type: string;
    request: string;
    response: string;
    timestamp: number;
  }>(
    `
      INSERT INTO tool_call_logs (user_id, type, request, response, timestamp)
      VALUES (@userId, @type, @request, @response, @timestamp)
    `
  ).run({
    userId,
    type: entry.type,
    request: JSON.stringify(entry.request),
    response: JSON.stringify(entry.response),
    timestamp: entry.timestamp,
  });
}

export function listToolCallLogs(
  userId: string,
  params?: { limit?: number; offset?: number },
  db: Database.Database = openDatabase()
): StoredToolCallLog[] {
  const limit = Math.min(Math.max(params?.limit ?? 50, 1), 500);
  const offset = Math.max(params?.offset ?? 0, 0);
  const rows = db
    .prepare<[string, number, number], ToolCallLogRow>(
      `
        SELECT id, user_id, type, request, response, timestamp, created_at
        FROM tool_call_logs
        WHERE user_id = ?
        ORDER BY timestamp DESC, id DESC
        LIMIT ? OFFSET ?
      `
    )
    .all(userId, limit, offset);

  return rows.map((row) => ({
    id: row.id,
    userId: row.user_id,
    type: row.type === 'tools/list' ? 'tools/list' : 'tools/call',
    request: parseJson(row.request),
    response: parseJson(row.response),
    timestamp: row.timestamp,
    createdAt: row.created_at,
  }));
}

export function clearToolCallLogs(userId: string, db: Database.Database = openDatabase()): number {
  const result = db.prepare<[string]>('DELETE FROM tool_call_logs WHERE user_id = ?').run(userId);
  return result.changes;
}
