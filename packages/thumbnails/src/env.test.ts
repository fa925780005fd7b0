/**
 * Tests for CLI environment parsing
 */

import { describe, it, expect } from 'vitest';
import { InvalidConfigError } from '@spindle/sdk';
import { readEnv } from './env';

describe('readEnv', () => {
  it('applies defaults', () => {
    expect(readEnv({})).toEqual({ SPINDLE_LOG_LEVEL: 'warn' });
  });

  it('reads every setting', () => {
    expect(
      readEnv({
        SPINDLE_LOG_LEVEL: 'debug',
        SPINDLE_MANIFEST: '/etc/spindle/renderers.json',
        SPINDLE_THUMBNAIL_SIZE: '64'
      })
    ).toEqual({
      SPINDLE_LOG_LEVEL: 'debug',
      SPINDLE_MANIFEST: '/etc/spindle/renderers.json',
      SPINDLE_THUMBNAIL_SIZE: 64
    });
  });

  it('rejects an unknown log level', () => {
    expect(() => readEnv({ SPINDLE_LOG_LEVEL: 'loud' })).toThrow(InvalidConfigError);
    expect(() => readEnv({ SPINDLE_LOG_LEVEL: 'loud' })).toThrow('Invalid environment: SPINDLE_LOG_LEVEL');
  });
});
