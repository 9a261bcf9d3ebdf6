/**
 * Custom error classes for kinesis-source
 * Provides structured error handling with error codes
 */

/**
 * Base error class for all kinesis-source errors
 */
export class ConnectorError extends Error {
  readonly code: string
  readonly cause?: unknown

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message)
    this.name = 'ConnectorError'
    this.code = code
    this.cause = options?.cause

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if ('captureStackTrace' in Error) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a raw stream record cannot be converted
 */
export class ConversionError extends ConnectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MALFORMED_RECORD', message, options)
    this.name = 'ConversionError'
  }
}

/**
 * Error thrown for missing or invalid configuration values
 */
export class ConfigurationError extends ConnectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_CONFIG', message, options)
    this.name = 'ConfigurationError'
  }
}

/**
 * Error thrown while declaring an inconsistent schema
 */
export class SchemaDefinitionError extends ConnectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SCHEMA_DEFINITION', message, options)
    this.name = 'SchemaDefinitionError'
  }
}

/**
 * Error thrown when a struct value does not match its schema
 */
export class SchemaViolationError extends ConnectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SCHEMA_VIOLATION', message, options)
    this.name = 'SchemaViolationError'
  }
}

/**
 * Error thrown when sequence numbers within a batch do not strictly increase
 */
export class SequenceOrderError extends ConnectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('OUT_OF_ORDER', message, options)
    this.name = 'SequenceOrderError'
  }
}

/**
 * Error thrown for request bodies that fail validation
 */
export class InvalidRequestError extends ConnectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_REQUEST', message, options)
    this.name = 'InvalidRequestError'
  }
}
