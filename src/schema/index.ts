/**
 * Schema Registry
 *
 * Structural key/value schemas and struct population.
 */

export * from './builder'
export * from './schema'
export * from './struct'
