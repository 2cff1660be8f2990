import { loadConfig } from './utils/config'
import { initDatabase } from './db/schema'
import { createApiServer } from './api/server'
import { logger } from './utils/logger'

async function main() {
  const config = loadConfig()

  logger.info('Запуск API сервера заказов', {
    nodeEnv: config.nodeEnv,
    port: config.port,
    host: config.host,
    logLevel: config.logLevel ?? logger.level,
    webappOrigins: config.webappOrigins.length > 0 ? config.webappOrigins : '*',
    initDataMaxAgeSeconds: config.initDataMaxAgeSeconds,
  })

  // Соединение с БД создаётся один раз на процесс и передаётся в сервер
  const db = initDatabase(config.databaseUrl)

  const apiServer = createApiServer(db, config)
  const server = apiServer.listen(config.port, config.host, () => {
    logger.info('API сервер запущен', { port: config.port, host: config.host })
  })
  server.on('error', (error) => {
    logger.error('Ошибка запуска HTTP сервера', { error })
    db.close()
    process.exit(1)
  })

  // Graceful shutdown
  let shuttingDown = false
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return
    }
    shuttingDown = true
    logger.warn('Получен сигнал завершения', { signal })
    server.close(() => {
      db.close()
      logger.info('Сервер остановлен')
      process.exit(0)
    })
  }
  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch((error) => {
  logger.error('Критическая ошибка', { error })
  process.exit(1)
})

process.on('unhandledRejection', (reason) => {
  logger.error('UnhandledPromiseRejection', { error: reason })
})

process.on('uncaughtException', (error) => {
  logger.error('UncaughtException', { error })
  process.exit(1)
})
