/**
 * kinesis-source Types
 *
 * Core type definitions for stream record conversion
 */

export * from './records'
