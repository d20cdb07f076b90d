export const DEFAULT_QUOTE = 'USDT';
export const MAX_AMOUNT = 1e15;

const SYMBOL_PATTERN = /^[A-Z0-9]+(\/[A-Z0-9]+)?$/;

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Uppercases and checks a symbol, appending the default quote to bare assets:
 * `btc` → `BTC/USDT`, `eth/btc` → `ETH/BTC`.
 */
export function normalizeSymbol(symbol: unknown, defaultQuote = DEFAULT_QUOTE): string {
  if (typeof symbol !== 'string' || symbol.trim() === '') {
    throw new ValidationError('Symbol must be a non-empty string');
  }

  const normalized = symbol.trim().toUpperCase();
  if (normalized.length < 2) {
    throw new ValidationError('Symbol must be at least 2 characters long');
  }
  if (normalized.length > 20) {
    throw new ValidationError('Symbol must be at most 20 characters long');
  }
  if (!SYMBOL_PATTERN.test(normalized)) {
    throw new ValidationError(`Invalid symbol format: ${normalized}`);
  }

  return normalized.includes('/') ? normalized : `${normalized}/${defaultQuote.toUpperCase()}`;
}

/** Text before the pair separator. */
export function baseAsset(symbol: string): string {
  const separator = symbol.indexOf('/');
  return separator === -1 ? symbol : symbol.slice(0, separator);
}

export function validatePositiveAmount(value: unknown, fieldName: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${fieldName} must be a number`);
  }
  if (value <= 0) {
    throw new ValidationError(`${fieldName} must be greater than 0`);
  }
  if (value > MAX_AMOUNT) {
    throw new ValidationError(`${fieldName} value is unreasonably large`);
  }
  return value;
}
