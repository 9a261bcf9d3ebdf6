import { describe, it, expect } from 'vitest'
import {
  ConfigurationError,
  ConnectorError,
  ConversionError,
  InvalidRequestError,
  SchemaDefinitionError,
  SchemaViolationError,
  SequenceOrderError,
} from './errors'

const cases: Array<{ ErrorClass: new (message: string) => ConnectorError; name: string; code: string }> = [
  { ErrorClass: ConversionError, name: 'ConversionError', code: 'MALFORMED_RECORD' },
  { ErrorClass: ConfigurationError, name: 'ConfigurationError', code: 'INVALID_CONFIG' },
  { ErrorClass: SchemaDefinitionError, name: 'SchemaDefinitionError', code: 'SCHEMA_DEFINITION' },
  { ErrorClass: SchemaViolationError, name: 'SchemaViolationError', code: 'SCHEMA_VIOLATION' },
  { ErrorClass: SequenceOrderError, name: 'SequenceOrderError', code: 'OUT_OF_ORDER' },
  { ErrorClass: InvalidRequestError, name: 'InvalidRequestError', code: 'INVALID_REQUEST' },
]

describe('Errors', () => {
  it.each(cases)('$name carries code $code', ({ ErrorClass, name, code }) => {
    const error = new ErrorClass('boom')
    expect(error).toBeInstanceOf(ConnectorError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe(name)
    expect(error.code).toBe(code)
    expect(error.message).toBe('boom')
  })

  it('keeps the cause', () => {
    const cause = new RangeError('out of bounds')
    const error = new ConversionError('Unable to read payload', { cause })
    expect(error.cause).toBe(cause)
  })

  it('captures a stack trace', () => {
    expect(new ConnectorError('TEST', 'boom').stack).toContain('boom')
  })
})
