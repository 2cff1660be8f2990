export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogMeta = Record<string, unknown>

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === 'string' && Object.hasOwn(levelOrder, value)

const resolveLogLevel = (): LogLevel => {
  const rawLevel = process.env.LOG_LEVEL?.toLowerCase()
  if (isLogLevel(rawLevel)) {
    return rawLevel
  }

  return process.env.NODE_ENV === 'development' ? 'debug' : 'info'
}

const serializeError = (error: unknown): Record<string, unknown> => {
  if (error instanceof Error) {
    const serialized: Record<string, unknown> = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
    // Причина (cause) у InfrastructureError несёт исходную ошибку драйвера
    if (error.cause !== undefined) {
      serialized.cause = serializeError(error.cause)
    }
    return serialized
  }

  if (typeof error === 'object' && error !== null) {
    return {
      message: 'Non-Error exception',
      details: error,
    }
  }

  return { message: String(error) }
}

const sanitizeMeta = (meta: LogMeta = {}): LogMeta => {
  return Object.entries(meta).reduce<LogMeta>((acc, [key, value]) => {
    if (value === undefined) {
      return acc
    }
    return { ...acc, [key]: value }
  }, {})
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
  /** Логгер с полями, которые добавляются в каждую запись (например, requestId) */
  child(bindings: LogMeta): Logger
  readonly level: LogLevel
}

const createLogger = (level: LogLevel, bindings: LogMeta = {}): Logger => {
  const write = (entryLevel: LogLevel, message: string, meta: LogMeta = {}): void => {
    if (levelOrder[entryLevel] < levelOrder[level]) {
      return
    }

    const payload = {
      ts: new Date().toISOString(),
      level: entryLevel,
      msg: message,
      pid: process.pid,
      ...sanitizeMeta(bindings),
      ...sanitizeMeta(meta),
    }

    if (entryLevel === 'error') {
      console.error(JSON.stringify(payload))
      return
    }

    if (entryLevel === 'warn') {
      console.warn(JSON.stringify(payload))
      return
    }

    console.log(JSON.stringify(payload))
  }

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => {
      const normalizedMeta = meta ?? {}
      const errorValue = normalizedMeta.error
      const payload = errorValue
        ? { ...normalizedMeta, error: serializeError(errorValue) }
        : normalizedMeta
      write('error', message, payload)
    },
    child: (childBindings) => createLogger(level, { ...bindings, ...childBindings }),
    level,
  }
}

export const logger = createLogger(resolveLogLevel())

export { serializeError }
