import { describe, expect, it } from 'vitest';

import {
  ValidationError,
  baseAsset,
  normalizeSymbol,
  validatePositiveAmount,
} from '../../src/agent/tools/validate.js';

describe('normalizeSymbol', () => {
  it('appends the default quote to bare assets', () => {
    for (const symbol of ['btc', 'ETH', ' sol ', 'Pepe', '1INCH']) {
      expect(normalizeSymbol(symbol)).toBe(`${symbol.trim().toUpperCase()}/USDT`);
    }
  });

  it('keeps existing pairs apart from case', () => {
    for (const symbol of ['BTC/USDT', 'eth/btc', 'Sol/Usdc']) {
      expect(normalizeSymbol(symbol)).toBe(symbol.toUpperCase());
    }
  });

  it('uses a configured quote asset', () => {
    expect(normalizeSymbol('btc', 'usdc')).toBe('BTC/USDC');
  });

  it('rejects malformed symbols', () => {
    expect(() => normalizeSymbol('')).toThrow('Symbol must be a non-empty string');
    expect(() => normalizeSymbol(42)).toThrow(ValidationError);
    expect(() => normalizeSymbol('B')).toThrow('Symbol must be at least 2 characters long');
    expect(() => normalizeSymbol('A'.repeat(21))).toThrow('Symbol must be at most 20 characters long');
    expect(() => normalizeSymbol('BTC-USDT')).toThrow('Invalid symbol format: BTC-USDT');
    expect(() => normalizeSymbol('/BTC')).toThrow('Invalid symbol format: /BTC');
    expect(() => normalizeSymbol('BTC/')).toThrow('Invalid symbol format: BTC/');
    expect(() => normalizeSymbol('A/B/C')).toThrow('Invalid symbol format: A/B/C');
  });

  it('accepts the length bounds', () => {
    expect(normalizeSymbol('OP')).toBe('OP/USDT');
    expect(normalizeSymbol('A'.repeat(20))).toBe(`${'A'.repeat(20)}/USDT`);
  });
});

describe('baseAsset', () => {
  it('takes the text before the separator', () => {
    expect(baseAsset('ETH/USDT')).toBe('ETH');
    expect(baseAsset('ETH')).toBe('ETH');
  });
});

describe('validatePositiveAmount', () => {
  it('passes positive amounts through', () => {
    expect(validatePositiveAmount(100, 'amount')).toBe(100);
    expect(validatePositiveAmount(1e15, 'amount')).toBe(1e15);
  });

  it('rejects zero, negative and oversized amounts', () => {
    expect(() => validatePositiveAmount(0, 'amount')).toThrow('amount must be greater than 0');
    expect(() => validatePositiveAmount(-5, 'amount')).toThrow('amount must be greater than 0');
    expect(() => validatePositiveAmount(1e16, 'amount')).toThrow('amount value is unreasonably large');
    expect(() => validatePositiveAmount(Number.NaN, 'amount')).toThrow('amount must be a number');
    expect(() => validatePositiveAmount('10', 'amount')).toThrow('amount must be a number');
  });
});
