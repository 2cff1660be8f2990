import express, { Express, Request, Response, NextFunction } from 'express'
import cors from 'cors'
import Database from 'better-sqlite3'
import { randomUUID } from 'crypto'
import { OrderRepository, Clock } from '../db/repository'
import { Order, OwnerOrderView } from '../types'
import { AppError, AuthError, ValidationError } from '../utils/errors'
import { logger } from '../utils/logger'
import { AppConfig } from '../utils/config'
import { getTelegramUser, requireTelegramAuth } from './middleware/telegram-auth'
import { requireAdminToken } from './middleware/admin-auth'
import { parseOrderUpsert } from './validation'

export type ApiServerConfig = Pick<
  AppConfig,
  'botToken' | 'adminApiToken' | 'webappOrigins' | 'initDataMaxAgeSeconds'
>

export interface ApiContext {
  config: ApiServerConfig
  repos: {
    order: OrderRepository
  }
}

export type ApiServerOptions = {
  /** Источник времени для created_at/updated_at; в тестах подменяется */
  clock?: Clock
}

const getRequestId = (res: Response): string => {
  const requestId: unknown = res.locals.requestId
  return typeof requestId === 'string' ? requestId : 'unknown'
}

const toIsoTimestamp = (value: string): string => {
  const date = new Date(value)
  return Number.isNaN(date.getTime()) ? value : date.toISOString()
}

const toOwnerView = (order: Order): OwnerOrderView => ({
  public_no: order.public_no,
  item: order.item,
  services: order.services,
  status: order.status,
  price: order.price,
  comment: order.comment,
  created_at: toIsoTimestamp(order.created_at),
  updated_at: toIsoTimestamp(order.updated_at),
})

const isMalformedJsonError = (err: unknown): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed'

type ExposedClientError = { status: number; type: string }

/** Ошибки body-parser (http-errors): 413 entity.too.large, 415 charset.unsupported и т.п. */
const isExposedClientError = (err: unknown): err is ExposedClientError =>
  err instanceof Error &&
  'status' in err &&
  typeof err.status === 'number' &&
  err.status >= 400 &&
  err.status < 500 &&
  'expose' in err &&
  err.expose === true &&
  'type' in err &&
  typeof err.type === 'string'

/**
 * Создаёт Express API сервер. Соединение с БД и конфиг приходят снаружи:
 * их жизненным циклом управляет точка входа.
 */
export function createApiServer(
  db: Database.Database,
  config: ApiServerConfig,
  options: ApiServerOptions = {},
): Express {
  const app = express()

  const context: ApiContext = {
    config,
    repos: {
      order: new OrderRepository(db, options.clock),
    },
  }

  // Middleware
  app.use((req, res, next) => {
    const requestId = randomUUID()
    res.locals.requestId = requestId
    res.setHeader('x-request-id', requestId)
    const requestLogger = logger.child({ requestId })

    const start = process.hrtime.bigint()
    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1e6
      const status = res.statusCode
      const logFn =
        status >= 500 ? requestLogger.error : status >= 400 ? requestLogger.warn : requestLogger.info
      logFn('HTTP запрос завершен', {
        method: req.method,
        path: req.originalUrl || req.url,
        status,
        durationMs: Math.round(durationMs),
        ip: req.ip,
        userAgent: req.get('user-agent'),
      })
    })
    next()
  })
  app.use(
    cors({
      origin: (origin, callback) => {
        // Пустой WEBAPP_ORIGINS — разрешаем всех
        if (!origin || config.webappOrigins.length === 0) {
          callback(null, true)
          return
        }

        if (config.webappOrigins.includes(origin)) {
          callback(null, true)
          return
        }

        logger.warn('CORS: origin запрещен', { origin })
        callback(null, false)
      },
      credentials: true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Telegram-InitData', 'X-Admin-Token'],
    }),
  )
  app.use(express.json({ limit: '1mb' }))

  // Health check
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ ok: true, status: 'ok', timestamp: new Date().toISOString() })
  })

  // GET /api/me/orders - заказы пользователя Mini App
  app.get(
    '/api/me/orders',
    requireTelegramAuth({
      botToken: context.config.botToken,
      maxAgeSeconds: context.config.initDataMaxAgeSeconds,
    }),
    (_req: Request, res: Response) => {
      const { tgId } = getTelegramUser(res)
      const orders = context.repos.order.listByOwner(tgId)
      res.json({ ok: true, orders: orders.map(toOwnerView) })
    },
  )

  // POST /api/admin/order/upsert - создать или обновить заказ по public_no
  app.post(
    '/api/admin/order/upsert',
    requireAdminToken(context.config.adminApiToken),
    (req: Request, res: Response) => {
      const input = parseOrderUpsert(req.body)
      context.repos.order.upsert(input)
      logger.info('Заказ сохранён', { requestId: getRequestId(res), publicNo: input.public_no })
      res.json({ ok: true })
    },
  )

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ ok: false, error: 'not found' })
  })

  // Error handling middleware
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const requestLogger = logger.child({ requestId: getRequestId(res) })

    if (err instanceof AuthError) {
      requestLogger.warn('Отказ в доступе', { reason: err.reason })
      res.status(err.status).json({ ok: false, error: err.publicMessage })
      return
    }

    if (err instanceof ValidationError) {
      requestLogger.warn('Невалидное тело запроса', { field: err.field, reason: err.message })
      res.status(err.status).json({ ok: false, error: err.publicMessage, field: err.field })
      return
    }

    if (err instanceof AppError) {
      requestLogger.error('Ошибка обработки запроса', { error: err })
      res.status(err.status).json({ ok: false, error: err.publicMessage })
      return
    }

    if (isMalformedJsonError(err)) {
      res.status(400).json({ ok: false, error: 'invalid json' })
      return
    }

    if (isExposedClientError(err)) {
      requestLogger.warn('Тело запроса отклонено', { status: err.status, type: err.type })
      res.status(err.status).json({ ok: false, error: err.type })
      return
    }

    requestLogger.error('Unhandled error', { error: err })
    res.status(500).json({ ok: false, error: 'internal server error' })
  })

  return app
}
