import { Request, Response, NextFunction, RequestHandler } from 'express'
import {
  resolveTelegramUserId,
  TelegramUser,
  verifyTelegramInitData,
} from '../../utils/telegram-auth'
import { AuthError } from '../../utils/errors'

const HEADER_NAME = 'x-telegram-initdata'

export type TelegramAuthOptions = {
  botToken: string
  /** 0 — возраст auth_date не проверяется */
  maxAgeSeconds: number
}

export type AuthenticatedTelegramUser = {
  tgId: number
  user: TelegramUser
}

/**
 * Middleware: верифицирует Telegram initData из заголовка X-Telegram-InitData.
 * Любой провал проверки уходит в error handler как AuthError (401).
 *
 * При успехе: res.locals.telegramUser = { tgId, user }.
 */
export function requireTelegramAuth(options: TelegramAuthOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers[HEADER_NAME]
    const initData = typeof header === 'string' ? header : ''

    const user = verifyTelegramInitData(initData, options.botToken, options.maxAgeSeconds)
    const tgId = resolveTelegramUserId(user)

    const telegramUser: AuthenticatedTelegramUser = { tgId, user }
    res.locals.telegramUser = telegramUser
    next()
  }
}

const isAuthenticatedTelegramUser = (value: unknown): value is AuthenticatedTelegramUser =>
  typeof value === 'object' &&
  value !== null &&
  'tgId' in value &&
  typeof value.tgId === 'number' &&
  'user' in value

/** Достаёт пользователя, положенного requireTelegramAuth. Без него маршрут не должен работать. */
export function getTelegramUser(res: Response): AuthenticatedTelegramUser {
  const value: unknown = res.locals.telegramUser
  if (!isAuthenticatedTelegramUser(value)) {
    throw new AuthError('missing payload')
  }
  return value
}
