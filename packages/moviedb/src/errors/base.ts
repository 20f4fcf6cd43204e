/**
 * Catalog Error Hierarchy
 *
 * Every error the catalog raises extends CatalogError. Callers branch on
 * `code` or `category`; the catalog's own logger reads `toLogContext()`
 * when a write is rejected.
 *
 * @packageDocumentation
 */

import type { EntityKind } from '@moviedb/shared-types';

/**
 * What the failing operation was working on
 */
export interface ErrorContext {
  /** Kind of record involved (`role` for the movie/actor relation) */
  entity?: EntityKind | 'role';
  id?: number;
  /** Input field that failed validation */
  field?: string;
  metadata?: Record<string, unknown>;
}

/**
 * High-level error categories for consistent handling by callers
 */
export enum ErrorCategory {
  /** Rejected input */
  VALIDATION = 'VALIDATION',
  /** Missing record */
  RESOURCE = 'RESOURCE',
  /** Duplicate key */
  CONFLICT = 'CONFLICT',
}

export interface CatalogErrorOptions {
  cause?: Error;
  context?: ErrorContext;
}

/**
 * Base error class for all catalog errors
 *
 * @example
 * ```typescript
 * try {
 *   catalog.link(movieId, actorId);
 * } catch (error) {
 *   if (error instanceof CatalogError) {
 *     console.log(error.code); // 'CATALOG_DUPLICATE'
 *     console.log(error.toUserMessage());
 *   }
 * }
 * ```
 */
export abstract class CatalogError extends Error {
  abstract readonly code: string;
  abstract readonly category: ErrorCategory;

  readonly context?: ErrorContext;

  /** What the caller can do about it, where there is something to do */
  readonly recoveryHint?: string;

  constructor(message: string, options: CatalogErrorOptions = {}, recoveryHint?: string) {
    super(message, { cause: options.cause });
    this.context = options.context;
    this.recoveryHint = recoveryHint;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Message suitable for an end user. Subclasses phrase it from context.
   */
  toUserMessage(): string {
    return this.message;
  }

  /**
   * Flat fields for a log entry: code, category, hint and the context
   * entries that are set
   */
  toLogContext(): Record<string, unknown> {
    const fields: Record<string, unknown> = { code: this.code, category: this.category };
    if (this.recoveryHint) fields.recoveryHint = this.recoveryHint;
    if (this.context?.entity) fields.entity = this.context.entity;
    if (this.context?.id !== undefined) fields.id = this.context.id;
    if (this.context?.field) fields.field = this.context.field;
    return fields;
  }
}
