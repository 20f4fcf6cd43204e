/**
 * Catalog Configuration Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { DEFAULT_DATABASE_NAME, resolveCatalogConfig } from '../config.js';
import { ConfigError } from '../errors/index.js';
import { createLogger, NoOpSink } from '../logging/index.js';

describe('resolveCatalogConfig', () => {
  const originalLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  it('should apply defaults', () => {
    delete process.env.LOG_LEVEL;

    const resolved = resolveCatalogConfig();

    expect(resolved.databaseName).toBe(DEFAULT_DATABASE_NAME);
    expect(resolved.logger.getLevel()).toBe('warn');
  });

  it('should read the level from LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'error';

    expect(resolveCatalogConfig().logger.getLevel()).toBe('error');
  });

  it('should trim the database name', () => {
    expect(resolveCatalogConfig({ databaseName: '  Archive ' }).databaseName).toBe('Archive');
  });

  it('should apply logLevel to a supplied logger', () => {
    const logger = createLogger({ sink: new NoOpSink(), level: 'info' });

    const resolved = resolveCatalogConfig({ logger, logLevel: 'debug' });

    expect(resolved.logger).toBe(logger);
    expect(logger.getLevel()).toBe('debug');
  });

  it('should reject a blank database name', () => {
    expect(() => resolveCatalogConfig({ databaseName: '   ' })).toThrow(ConfigError);
  });
});
