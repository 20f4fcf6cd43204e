/**
 * Catalog Error Module
 *
 * @packageDocumentation
 */

export {
  CatalogError,
  ErrorCategory,
  type CatalogErrorOptions,
  type ErrorContext,
} from './base.js';

export { CatalogErrorCode, ConfigErrorCode, type MovieDbErrorCode } from './codes.js';

export {
  ValidationError,
  NotFoundError,
  DuplicateError,
  ConfigError,
  createNotFoundError,
  createDuplicateRoleError,
  createValidationError,
  createConfigError,
} from './catalog-errors.js';
