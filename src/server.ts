import { serve } from '@hono/node-server'
import { createApp } from './app'
import { loadConfig } from './config'
import { logger, setLogLevel } from './logger'

const config = loadConfig()
setLogLevel(config.logLevel)

const app = createApp(config)

serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    logger.info(
      {
        streamName: config.streamName,
        shardId: config.shardId,
        topic: config.topic,
        logLevel: config.logLevel,
      },
      `Server is running on http://localhost:${info.port}`
    )
  }
)
