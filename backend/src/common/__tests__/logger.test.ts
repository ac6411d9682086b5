/**
 * Logger Tests
 */

import { describe, expect, it } from 'vitest';
import { createLogger, resolveLogLevel } from '../logger.js';

describe('resolveLogLevel', () => {
  it('defaults to info when unset', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
  });

  it('accepts the known levels', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('rejects an unknown level', () => {
    expect(() => resolveLogLevel('loud')).toThrow('[Config] Invalid LOG_LEVEL: loud');
  });
});

describe('createLogger', () => {
  it('uses the given level', () => {
    expect(createLogger('warn').level).toBe('warn');
  });
});
