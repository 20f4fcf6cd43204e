/**
 * Catalog Configuration
 *
 * Validates the options accepted by createCatalog() and fills in defaults.
 *
 * @module config
 */

import { z } from 'zod';
import { createConfigError } from './errors/index.js';
import {
  createLogger,
  getLogLevelFromEnv,
  type LogLevel,
  type StructuredLogger,
} from './logging/index.js';

// =============================================================================
// Defaults
// =============================================================================

/**
 * Name reported by currentDatabase() unless configured otherwise
 */
export const DEFAULT_DATABASE_NAME = 'MovieDB';

// =============================================================================
// Schema
// =============================================================================

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Options accepted by createCatalog()
 */
export interface CatalogConfig {
  /** Name reported by currentDatabase() (default: "MovieDB") */
  databaseName?: string;
  /** Logger to use; a console JSON logger is created when omitted */
  logger?: StructuredLogger;
  /**
   * Level for the catalog's logger. Applied to `logger` when both are given;
   * the default logger otherwise reads LOG_LEVEL, then falls back to "warn".
   */
  logLevel?: LogLevel;
}

const CatalogConfigSchema = z.object({
  databaseName: z.string().trim().min(1).optional(),
  logLevel: LogLevelSchema.optional(),
});

/**
 * Configuration with defaults applied
 */
export interface ResolvedCatalogConfig {
  databaseName: string;
  logger: StructuredLogger;
}

/**
 * Validate a catalog configuration and apply defaults
 *
 * @throws ConfigError if a field has the wrong shape
 */
export function resolveCatalogConfig(config: CatalogConfig = {}): ResolvedCatalogConfig {
  const result = CatalogConfigSchema.safeParse({
    databaseName: config.databaseName,
    logLevel: config.logLevel,
  });

  if (!result.success) {
    throw createConfigError(result.error);
  }

  const { logLevel } = result.data;
  let logger: StructuredLogger;
  if (config.logger) {
    logger = config.logger;
    if (logLevel) {
      logger.setLevel(logLevel);
    }
  } else {
    logger = createLogger({ level: logLevel ?? getLogLevelFromEnv() });
  }

  return {
    databaseName: result.data.databaseName ?? DEFAULT_DATABASE_NAME,
    logger,
  };
}
