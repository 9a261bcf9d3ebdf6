/**
 * Connector configuration loaded from the environment
 */

import { z } from 'zod'
import { ConfigurationError } from './errors'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface ConnectorConfig {
  /** Destination topic for converted records */
  topic: string
  /** Name of the source stream */
  streamName: string
  /** Shard this process converts records for */
  shardId: string
  /** HTTP port */
  port: number
  logLevel: LogLevel
}

const envSchema = z.object({
  KAFKA_TOPIC: z.string().trim().min(1),
  KINESIS_STREAM_NAME: z.string().trim().min(1),
  KINESIS_SHARD_ID: z.string().trim().min(1),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

/**
 * Validate and load configuration.
 * Throws ConfigurationError naming every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ConnectorConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, {
      cause: parsed.error,
    })
  }

  return {
    topic: parsed.data.KAFKA_TOPIC,
    streamName: parsed.data.KINESIS_STREAM_NAME,
    shardId: parsed.data.KINESIS_SHARD_ID,
    port: parsed.data.PORT,
    logLevel: parsed.data.LOG_LEVEL,
  }
}
