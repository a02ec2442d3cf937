import { describe, it, expect } from 'vitest';
import { createLogger, formatError } from '../../../src/utils/logger.js';
import { getConfig } from '../../../src/config/config.js';

describe('createLogger', () => {
  it('names the logger and takes its level from the config', () => {
    const log = createLogger('crm:test');

    expect(log.level).toBe(getConfig().logging.level);
    expect(log.bindings()).toMatchObject({ name: 'crm:test' });
  });
});

describe('formatError', () => {
  it('keeps message, name and a string code', () => {
    const error = Object.assign(new Error('disk full'), { code: 'ENOSPC' });

    expect(formatError(error)).toMatchObject({ message: 'disk full', name: 'Error', code: 'ENOSPC' });
  });

  it('stringifies anything that is not an Error', () => {
    expect(formatError(42)).toEqual({ message: '42' });
  });
});
