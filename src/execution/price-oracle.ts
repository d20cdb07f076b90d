export interface Ticker {
  symbol: string;
  last: number;
  bid: number;
  ask: number;
  high: number;
  low: number;
  volume: number;
}

/** `[price, quantity]`, best price first on each side. */
export type PriceLevel = [number, number];

export interface OrderBook {
  symbol: string;
  bids: PriceLevel[];
  asks: PriceLevel[];
}

/**
 * Market data source consulted by the handlers. Symbols arrive normalized
 * as `BASE/QUOTE`.
 */
export interface PriceOracle {
  readonly source: string;
  getTicker(symbol: string): Promise<Ticker>;
  getOrderBook(symbol: string, depth: number): Promise<OrderBook>;
}

export class PriceOracleError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'PriceOracleError';
  }
}

export class NullPriceOracle implements PriceOracle {
  readonly source = 'none';

  async getTicker(symbol: string): Promise<Ticker> {
    throw new PriceOracleError(`Price oracle is not configured (requested ${symbol}).`);
  }

  async getOrderBook(symbol: string): Promise<OrderBook> {
    throw new PriceOracleError(`Price oracle is not configured (requested ${symbol}).`);
  }
}
