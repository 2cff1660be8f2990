import dotenv from 'dotenv'
import { z } from 'zod'
import { ConfigError } from './errors'
import { LogLevel } from './logger'

// Загружаем переменные окружения из .env
dotenv.config()

const requiredSecret = z.string().trim().min(1)

const envSchema = z.object({
  BOT_TOKEN: requiredSecret,
  ADMIN_API_TOKEN: requiredSecret,
  DATABASE_URL: requiredSecret,
  WEBAPP_ORIGINS: z.string().optional(),
  NODE_ENV: z.string().optional(),
  PORT: z.string().optional(),
  HOST: z.string().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  /** Максимальный возраст initData в секундах. 0 или пусто — не проверяем. */
  INIT_DATA_MAX_AGE_SECONDS: z.string().optional(),
})

export interface AppConfig {
  botToken: string
  adminApiToken: string
  databaseUrl: string
  /** Пустой список означает «разрешены все источники» */
  webappOrigins: string[]
  nodeEnv: string
  port: number
  host: string
  logLevel?: LogLevel
  initDataMaxAgeSeconds: number
}

const parseNonNegativeInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10)
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback
}

/**
 * Читает и валидирует окружение. Без BOT_TOKEN, ADMIN_API_TOKEN или DATABASE_URL
 * бросает ConfigError со списком проблемных переменных.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsedEnv = envSchema.safeParse(source)

  if (!parsedEnv.success) {
    const variables = [...new Set(parsedEnv.error.issues.map((issue) => issue.path.join('.')))]
    throw new ConfigError(variables)
  }

  const env = parsedEnv.data

  return {
    botToken: env.BOT_TOKEN,
    adminApiToken: env.ADMIN_API_TOKEN,
    databaseUrl: env.DATABASE_URL,
    webappOrigins: env.WEBAPP_ORIGINS
      ? env.WEBAPP_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
      : [],
    nodeEnv: env.NODE_ENV || 'development',
    port: parseNonNegativeInt(env.PORT, 8000),
    host: env.HOST?.trim() || '0.0.0.0',
    logLevel: env.LOG_LEVEL,
    initDataMaxAgeSeconds: parseNonNegativeInt(env.INIT_DATA_MAX_AGE_SECONDS, 0),
  }
}
