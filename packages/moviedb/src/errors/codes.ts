/**
 * Catalog Error Codes
 *
 * Codes follow the pattern PREFIX_SPECIFIC.
 */

/**
 * Error codes for catalog writes and lookups
 */
export enum CatalogErrorCode {
  /** Required field missing or empty, or a value of the wrong shape */
  VALIDATION = 'CATALOG_VALIDATION',
  /** Lookup, delete or link by an id that does not exist */
  NOT_FOUND = 'CATALOG_NOT_FOUND',
  /** Linking a movie/actor pair that is already linked */
  DUPLICATE = 'CATALOG_DUPLICATE',
}

/**
 * Error codes for catalog configuration
 */
export enum ConfigErrorCode {
  INVALID = 'CONFIG_INVALID',
}

export type MovieDbErrorCode = CatalogErrorCode | ConfigErrorCode;
