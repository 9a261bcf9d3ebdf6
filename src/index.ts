/**
 * kinesis-source
 *
 * Converts records read from stream shards into structured, schema-described
 * topic records plus the checkpoint tuple needed to resume after them.
 *
 * @example
 * ```typescript
 * import { RecordConverter, fromSdkRecord } from 'kinesis-source'
 *
 * const converter = new RecordConverter({ topic: 'orders-topic', shardId: 'shardId-000000000000' })
 * const { records, checkpoint } = converter.convertBatch(
 *   'orders',
 *   'shardId-000000000000',
 *   response.Records.map(fromSdkRecord)
 * )
 * ```
 */

export * from './types'
export * from './schema'
export * from './converter'
export * from './errors'
export { createApp, type AppOptions } from './app'
export { loadConfig, type ConnectorConfig, type LogLevel } from './config'
export { logger, createModuleLogger, setLogLevel, type Logger } from './logger'
