/**
 * Collector error taxonomy.
 *
 * Every error carries a stable `code` for logs and stats. Only
 * PreconditionError (and ConfigError in the CLI) ends a run; the rest are
 * isolated per page and tallied.
 */

import type { PromptSchemaId } from './types.js'

export const ERROR_CODES = {
  FETCH_FAILED: 'FETCH_FAILED',
  EXTRACTION_FAILED: 'EXTRACTION_FAILED',
  EXTRACTION_SERVICE_ERROR: 'EXTRACTION_SERVICE_ERROR',
  PRECONDITION_FAILED: 'PRECONDITION_FAILED',
  CONFIG_INVALID: 'CONFIG_INVALID',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export class CollectorError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/** A seed URL could not be fetched. */
export class FetchError extends CollectorError {
  readonly url: string
  readonly statusCode?: number

  constructor(url: string, message: string, options?: { statusCode?: number; cause?: unknown }) {
    super(ERROR_CODES.FETCH_FAILED, message, { cause: options?.cause })
    this.url = url
    this.statusCode = options?.statusCode
  }
}

/**
 * Raised by extraction-service adapters: transport failure, API error or a
 * reply that is not JSON. Retryable inside the extractor.
 */
export class ExtractionServiceError extends CollectorError {
  readonly kind: 'unavailable' | 'malformed'
  readonly statusCode?: number

  constructor(
    kind: 'unavailable' | 'malformed',
    message: string,
    options?: { statusCode?: number; cause?: unknown }
  ) {
    super(ERROR_CODES.EXTRACTION_SERVICE_ERROR, message, { cause: options?.cause })
    this.kind = kind
    this.statusCode = options?.statusCode
  }
}

/** Extraction for one page failed after every retry. */
export class ExtractionError extends CollectorError {
  readonly url: string
  readonly schema: PromptSchemaId
  readonly attempts: number

  constructor(url: string, schema: PromptSchemaId, attempts: number, message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.EXTRACTION_FAILED, message, options)
    this.url = url
    this.schema = schema
    this.attempts = attempts
  }
}

/** The fetcher or extraction service is unreachable at run start. */
export class PreconditionError extends CollectorError {
  readonly collaborator: 'fetcher' | 'extraction-service'

  constructor(collaborator: 'fetcher' | 'extraction-service', message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.PRECONDITION_FAILED, message, options)
    this.collaborator = collaborator
  }
}

/** Environment or competitor configuration is invalid. */
export class ConfigError extends CollectorError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(ERROR_CODES.CONFIG_INVALID, message, options)
    this.issues = issues
  }
}

/**
 * Stable code for any thrown value, for stats and logs.
 */
export function errorCodeOf(error: unknown): string {
  if (error instanceof CollectorError) {
    return error.code
  }
  return ERROR_CODES.UNEXPECTED_ERROR
}

export function errorMessageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
