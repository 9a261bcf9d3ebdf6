/**
 * Structural schema declarations
 *
 * Schemas describe the wire contract of the records handed to the messaging
 * system. They are declared once at module load and frozen; any change to a
 * field's name, type or position is a breaking change and must come with a
 * new schema version.
 */

import { SchemaDefinitionError } from '../errors'

/**
 * Primitive field types
 * - 'string': UTF-16 JavaScript string
 * - 'bytes': Uint8Array
 * - 'int64': integral number (epoch milliseconds for timestamps)
 */
export type PrimitiveType = 'string' | 'bytes' | 'int64'

/**
 * Logical types layered on top of a primitive type
 */
export type LogicalName = 'timestamp'

/**
 * Schema of a single struct field
 */
export interface PrimitiveSchema {
  readonly type: PrimitiveType
  /** Logical interpretation of the primitive value */
  readonly logicalName?: LogicalName
  /** Whether the field may hold null */
  readonly optional: boolean
  /** Human-readable description of the field's meaning and provenance */
  readonly doc: string
}

/**
 * A named field at a fixed position within a struct schema
 */
export interface Field {
  readonly name: string
  readonly index: number
  readonly schema: PrimitiveSchema
}

/**
 * Named, versioned struct schema
 */
export interface StructSchema {
  readonly type: 'struct'
  /** Fully qualified schema name */
  readonly name: string
  /** Schema version, bumped on any breaking change */
  readonly version: number
  readonly doc: string
  readonly fields: readonly Field[]
}

/**
 * Options shared by the primitive schema builders
 */
export interface PrimitiveSchemaOptions {
  doc: string
  /** Defaults to false */
  optional?: boolean
}

function primitive(
  type: PrimitiveType,
  options: PrimitiveSchemaOptions,
  logicalName?: LogicalName
): PrimitiveSchema {
  const schema: PrimitiveSchema = {
    type,
    optional: options.optional ?? false,
    doc: options.doc,
    ...(logicalName ? { logicalName } : {}),
  }
  return Object.freeze(schema)
}

export function stringSchema(options: PrimitiveSchemaOptions): PrimitiveSchema {
  return primitive('string', options)
}

export function bytesSchema(options: PrimitiveSchemaOptions): PrimitiveSchema {
  return primitive('bytes', options)
}

/**
 * Instant in time, carried as epoch milliseconds
 */
export function timestampSchema(options: PrimitiveSchemaOptions): PrimitiveSchema {
  return primitive('int64', options, 'timestamp')
}

/**
 * Declaration of a struct schema
 */
export interface StructSchemaDefinition {
  name: string
  version: number
  doc: string
  fields: ReadonlyArray<{ name: string; schema: PrimitiveSchema }>
}

/**
 * Build a frozen struct schema.
 *
 * Fields keep their declaration order. Throws SchemaDefinitionError for an
 * empty schema name, a version that is not a positive integer, or empty or
 * duplicate field names.
 */
export function structSchema(definition: StructSchemaDefinition): StructSchema {
  if (definition.name.trim() === '') {
    throw new SchemaDefinitionError('Struct schema name must not be empty')
  }
  if (!Number.isInteger(definition.version) || definition.version < 1) {
    throw new SchemaDefinitionError(
      `Schema ${definition.name} has invalid version ${definition.version}`
    )
  }

  const seen = new Set<string>()
  const fields = definition.fields.map((declared, index): Field => {
    if (declared.name === '') {
      throw new SchemaDefinitionError(`Schema ${definition.name} declares a field with an empty name`)
    }
    if (seen.has(declared.name)) {
      throw new SchemaDefinitionError(
        `Schema ${definition.name} declares field '${declared.name}' more than once`
      )
    }
    seen.add(declared.name)
    return Object.freeze({ name: declared.name, index, schema: declared.schema })
  })

  const schema: StructSchema = {
    type: 'struct',
    name: definition.name,
    version: definition.version,
    doc: definition.doc,
    fields: Object.freeze(fields),
  }
  return Object.freeze(schema)
}

/**
 * Look up a field by name
 */
export function field(schema: StructSchema, name: string): Field | undefined {
  return schema.fields.find((f) => f.name === name)
}
