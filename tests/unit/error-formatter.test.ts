import { describe, it, expect } from 'vitest';
import { Err } from '../../src/errors/factories.js';
import { formatAppError } from '../../src/errors/formatter.js';

describe('formatAppError', () => {
  it('lists config issues', () => {
    const error = Err.configInvalid([
      { path: 'RESERVOIR_MODE', message: 'bad mode' },
      { path: 'RESERVOIR_OFFLINE', message: 'bad flag' },
    ]);

    expect(formatAppError(error)).toBe(
      'Invalid configuration\n\n  - RESERVOIR_MODE: bad mode\n  - RESERVOIR_OFFLINE: bad flag'
    );
  });

  it('shows the cause of a startup failure', () => {
    const error = Err.startupFailed('reservoir', 'could not key the tap', new Error('inner'));

    expect(formatAppError(error)).toBe('Startup failed during reservoir: could not key the tap\nCause: Error: inner');
  });

  it('suggests feeding the pool after a depletion timeout', () => {
    expect(formatAppError(Err.depletionTimeout(64, 8, 100))).toBe(
      'Pool credit stayed below 64 bits for 100ms (available: 8)\n' +
        'Feed the pool (or start the collector) before strict extractions.'
    );
  });

  it('serializes non-Error causes', () => {
    expect(formatAppError(Err.unexpected('Command failed', { code: 7 }))).toBe('Command failed\nCause: {"code":7}');
  });

  it('uses the plain message for tap errors', () => {
    expect(formatAppError(Err.emptyInput('shuffle'))).toBe('shuffle: cannot operate on an empty collection');
  });
});
