import { describe, expect, it } from 'vitest';

import {
  createErrorOutcome,
  createSuccessOutcome,
  formatOutcomeForDisplay,
  outcomeFromError,
} from '../../src/agent/tools/outcome.js';
import { ValidationError } from '../../src/agent/tools/validate.js';
import { PriceOracleError } from '../../src/execution/price-oracle.js';

const fixedNow = () => 1_000;

describe('outcomes', () => {
  it('omits empty metadata', () => {
    expect(createSuccessOutcome({ ok: 1 }, {}, fixedNow)).toEqual({
      success: true,
      data: { ok: 1 },
      timestamp: 1_000,
    });
    expect(createSuccessOutcome('done', { source: 'fake' }, fixedNow)).toEqual({
      success: true,
      data: 'done',
      timestamp: 1_000,
      metadata: { source: 'fake' },
    });
  });

  it('classifies thrown faults', () => {
    expect(outcomeFromError(new ValidationError('bad symbol')).error.type).toBe('validation_error');
    expect(outcomeFromError(new PriceOracleError('down')).error.type).toBe('exchange_error');
    expect(outcomeFromError(new Error('oops')).error).toMatchObject({
      type: 'tool_error',
      message: 'oops',
    });
    expect(outcomeFromError('plain', 'exchange_error').error).toMatchObject({
      type: 'exchange_error',
      message: 'plain',
    });
  });

  it('renders outcomes as text', () => {
    expect(formatOutcomeForDisplay(createErrorOutcome('rate_limit_exceeded', 'slow down'))).toBe(
      'Error (rate_limit_exceeded): slow down'
    );
    expect(formatOutcomeForDisplay(createSuccessOutcome('plain text'))).toBe('plain text');
    expect(formatOutcomeForDisplay(createSuccessOutcome({ a: 1 }))).toBe('{\n  "a": 1\n}');
    expect(formatOutcomeForDisplay(createSuccessOutcome(null))).toBe('{}');
  });
});
