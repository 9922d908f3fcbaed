/**
 * Tests for Configuration Module
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

describe('Config Module', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    // Reset module cache to test fresh config
    vi.resetModules();
    process.env = { ...originalEnv };
    delete process.env.HTML_DELTAGS_PARSER;
    delete process.env.HTML_DELTAGS_KW_SCOPE;
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_DIR;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should use default values when env vars not set', async () => {
    const { getConfig, getRunDefaults } = await import('./config');
    const config = getConfig();

    expect(config.HTML_DELTAGS_PARSER).toBe('jsdom');
    expect(config.HTML_DELTAGS_KW_SCOPE).toBe('text');
    expect(config.LOG_LEVEL).toBe('warn');
    expect(config.LOG_DIR).toBeUndefined();
    expect(getRunDefaults()).toEqual({ parser: 'jsdom', keywordScope: 'text' });
  });

  it('should parse environment variables correctly', async () => {
    process.env.HTML_DELTAGS_PARSER = ' lxml ';
    process.env.HTML_DELTAGS_KW_SCOPE = 'class';
    process.env.LOG_LEVEL = 'debug';

    const { getRunDefaults, getConfig } = await import('./config');

    expect(getRunDefaults()).toEqual({ parser: 'lxml', keywordScope: 'class' });
    expect(getConfig().LOG_LEVEL).toBe('debug');
  });

  it('should turn LOG_TO_CONSOLE into a boolean', async () => {
    process.env.LOG_TO_CONSOLE = 'false';

    const { getConfig } = await import('./config');

    expect(getConfig().LOG_TO_CONSOLE).toBe(false);
  });

  it('should reject an unknown keyword scope', async () => {
    process.env.HTML_DELTAGS_KW_SCOPE = 'href';

    const { getConfig } = await import('./config');

    expect(() => getConfig()).toThrow(/Invalid configuration:\n {2}- HTML_DELTAGS_KW_SCOPE:/);
  });

  it('should reject an invalid log level', async () => {
    process.env.LOG_LEVEL = 'loud';

    const { getConfig } = await import('./config');
    const { ConfigError } = await import('./errors');

    expect(() => getConfig()).toThrow(ConfigError);
    expect(() => getConfig()).toThrow(/LOG_LEVEL/);
  });

  it('should cache the validated configuration', async () => {
    const { getConfig } = await import('./config');
    const first = getConfig();
    process.env.HTML_DELTAGS_PARSER = 'parse5';

    expect(getConfig()).toBe(first);
  });
});
