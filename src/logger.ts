import pino from 'pino'

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined

export type Logger = pino.Logger

export const logger: Logger = pino({
  level: isTest ? 'silent' : 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => {
      return { level: label }
    },
  },
  base: {
    service: 'kinesis-source',
  },
})

// pino children keep the level they were created with
const moduleLoggers = new Set<Logger>()

export const createModuleLogger = (module: string): Logger => {
  const child = logger.child({ module })
  moduleLoggers.add(child)
  return child
}

/**
 * Apply a level to the root logger and every module logger
 */
export const setLogLevel = (level: pino.LevelWithSilent): void => {
  logger.level = level
  for (const child of moduleLoggers) {
    child.level = level
  }
}
