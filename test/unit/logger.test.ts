/**
 * Unit Tests for logger setup
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createLogger, isLogLevel, resolveLogLevel } from '@ipscout/core';

describe('Logger', () => {
  let saved: string | undefined;

  beforeEach(() => {
    saved = process.env['IPSCOUT_LOG_LEVEL'];
  });

  afterEach(() => {
    if (saved === undefined) delete process.env['IPSCOUT_LOG_LEVEL'];
    else process.env['IPSCOUT_LOG_LEVEL'] = saved;
  });

  // ---------------------------------------------------------------------------
  // Level resolution
  // ---------------------------------------------------------------------------
  describe('resolveLogLevel', () => {
    it('defaults to warn', () => {
      delete process.env['IPSCOUT_LOG_LEVEL'];
      expect(resolveLogLevel()).toBe('warn');
    });

    it('accepts pino levels in any case', () => {
      process.env['IPSCOUT_LOG_LEVEL'] = ' DEBUG ';
      expect(resolveLogLevel()).toBe('debug');
    });

    it('falls back to warn for an unknown level', () => {
      process.env['IPSCOUT_LOG_LEVEL'] = 'verbose';
      expect(resolveLogLevel()).toBe('warn');
    });

    it('knows silent and the pino levels only', () => {
      expect(isLogLevel('silent')).toBe(true);
      expect(isLogLevel('trace')).toBe(true);
      expect(isLogLevel('verbose')).toBe(false);
      expect(isLogLevel('toString')).toBe(false);
    });
  });

  // ---------------------------------------------------------------------------
  // createLogger
  // ---------------------------------------------------------------------------
  describe('createLogger', () => {
    it('uses warn when given an unknown level', () => {
      expect(createLogger('test', 'loud').level).toBe('warn');
    });

    it('loading the engine survives a mistyped IPSCOUT_LOG_LEVEL', async () => {
      process.env['IPSCOUT_LOG_LEVEL'] = 'verbose';
      vi.resetModules();

      const engine = await import('@ipscout/fallback');

      expect(typeof engine.fallbackStream).toBe('function');
    });
  });
});
