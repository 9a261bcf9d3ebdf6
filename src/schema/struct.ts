/**
 * Struct values populated against a StructSchema
 */

import { SchemaViolationError } from '../errors'
import type { PrimitiveSchema, StructSchema } from './builder'

/**
 * Runtime value of a primitive field
 */
export type FieldValue = string | number | Uint8Array | null

export type StructValues = { readonly [field: string]: FieldValue }

/**
 * Key record: the record's partition key
 */
export type PartitionKeyStruct = {
  readonly partitionKey: string | null
}

/**
 * Value record: every piece of record metadata plus the payload
 */
export type StreamEventStruct = {
  readonly sequenceNumber: string | null
  /** Epoch milliseconds */
  readonly approximateArrivalTimestamp: number | null
  readonly data: Uint8Array | null
  readonly partitionKey: string | null
  readonly shardId: string | null
  readonly streamName: string | null
}

function matchesType(schema: PrimitiveSchema, value: string | number | Uint8Array): boolean {
  switch (schema.type) {
    case 'string':
      return typeof value === 'string'
    case 'bytes':
      return value instanceof Uint8Array
    case 'int64':
      return typeof value === 'number' && Number.isSafeInteger(value)
  }
}

function describeValue(value: unknown): string {
  if (value instanceof Uint8Array) return 'Uint8Array'
  if (typeof value === 'number' && !Number.isSafeInteger(value)) return `number ${value}`
  return typeof value
}

/**
 * Validate values against a schema and return them as a frozen struct.
 *
 * Every field the schema declares must be present; null is accepted only for
 * optional fields. Fields the schema does not declare are rejected.
 */
export function createStruct<T extends StructValues>(schema: StructSchema, values: T): Readonly<T> {
  const declared = new Set(schema.fields.map((f) => f.name))
  for (const name of Object.keys(values)) {
    if (!declared.has(name)) {
      throw new SchemaViolationError(`${name} is not a valid field name for schema ${schema.name}`)
    }
  }

  for (const f of schema.fields) {
    const value: FieldValue | undefined = values[f.name]
    if (value === undefined) {
      throw new SchemaViolationError(`Field ${f.name} of schema ${schema.name} is not set`)
    }
    if (value === null) {
      if (!f.schema.optional) {
        throw new SchemaViolationError(`Field ${f.name} of schema ${schema.name} is required`)
      }
      continue
    }
    if (!matchesType(f.schema, value)) {
      throw new SchemaViolationError(
        `Field ${f.name} of schema ${schema.name} expects ${f.schema.type}, got ${describeValue(value)}`
      )
    }
  }

  return Object.freeze({ ...values })
}
