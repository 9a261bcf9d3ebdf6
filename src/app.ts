import { Hono } from 'hono'
import type { ConnectorConfig } from './config'
import { sourceRecordToJson } from './converter/json'
import { parseGetRecordsResponse } from './converter/kinesis'
import { RecordConverter } from './converter/record-converter'
import { ConnectorError, InvalidRequestError } from './errors'
import { createModuleLogger, type Logger } from './logger'
import { KEY_SCHEMA, VALUE_SCHEMA } from './schema/schema'

const CLIENT_ERROR_CODES = new Set(['INVALID_REQUEST', 'MALFORMED_RECORD', 'OUT_OF_ORDER'])

export interface AppOptions {
  logger?: Logger
}

/**
 * HTTP surface over the converter for one shard
 */
export function createApp(
  config: Pick<ConnectorConfig, 'topic' | 'streamName' | 'shardId'>,
  options: AppOptions = {}
): Hono {
  const log = options.logger ?? createModuleLogger('http')
  const converter = new RecordConverter({ topic: config.topic, shardId: config.shardId })
  const app = new Hono()

  // Health and info endpoints
  app.get('/', (c) => {
    return c.json({
      name: 'kinesis-source',
      description: 'Converts stream shard records into structured topic records',
      version: '0.1.0',
      status: 'ok',
    })
  })

  app.get('/health', (c) => {
    return c.json({ status: 'healthy', timestamp: Date.now() })
  })

  /**
   * GET /schemas
   * Key and value schema descriptors
   */
  app.get('/schemas', (c) => {
    return c.json({ key: KEY_SCHEMA, value: VALUE_SCHEMA })
  })

  /**
   * POST /convert
   * Convert a GetRecords response body read from the configured shard
   */
  app.post('/convert', async (c) => {
    let body: unknown
    try {
      body = await c.req.json()
    } catch (error) {
      throw new InvalidRequestError('Request body must be valid JSON', { cause: error })
    }

    const records = parseGetRecordsResponse(body)
    const batch = converter.convertBatch(config.streamName, config.shardId, records)

    return c.json({
      records: batch.records.map(sourceRecordToJson),
      checkpoint: batch.checkpoint,
    })
  })

  app.onError((err, c) => {
    if (err instanceof ConnectorError && CLIENT_ERROR_CODES.has(err.code)) {
      log.warn({ err, code: err.code }, 'Rejected request')
      return c.json({ error: err.message, code: err.code }, 400)
    }
    log.error({ err }, 'Request error')
    return c.json(
      {
        error: err.message || 'Internal server error',
        code: 'INTERNAL_ERROR',
      },
      500
    )
  })

  app.notFound((c) => {
    return c.json(
      {
        error: 'Not found',
        code: 'NOT_FOUND',
      },
      404
    )
  })

  return app
}
