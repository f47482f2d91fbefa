import { describe, expect, it, afterEach } from 'vitest';

import { applyLogLevel, logger } from './logger.js';

describe('logger', () => {
  afterEach(() => {
    applyLogLevel('silent');
  });

  it('is a named pino logger', () => {
    expect(logger.bindings()).toEqual({ name: 'tool-mocks' });
  });

  it('switches level and keeps the same level as a no-op', () => {
    applyLogLevel('debug');
    const debug = logger.debug;
    applyLogLevel('debug');

    expect(logger.level).toBe('debug');
    expect(logger.debug).toBe(debug);
  });
});
