/**
 * Tool Adapters Index
 *
 * The fixed tool table, in advertisement order.
 */

import type { ToolDefinition } from '../types.js';
import { ToolRegistry } from '../registry.js';
import { marketTools } from './market-tools.js';
import { tradingTools } from './trading-tools.js';
import { accountTools } from './account-tools.js';

export { getCryptoPriceTool, getOrderBookTool } from './market-tools.js';
export { buyCryptoTool } from './trading-tools.js';
export { checkBalanceTool, transactionHistoryTool } from './account-tools.js';

export const ALL_TOOLS: readonly ToolDefinition[] = [...marketTools, ...tradingTools, ...accountTools];

export function createToolRegistry(): ToolRegistry {
  return new ToolRegistry(ALL_TOOLS);
}
