import { createHmac } from 'crypto'
import { AuthError } from './errors'
import { secureCompare } from './secure-compare'

/**
 * Пользователь из поля `user` в initData. Telegram присылает больше полей,
 * поэтому тип открыт; гарантирован только сам факт JSON-объекта.
 */
export type TelegramUser = {
  id?: unknown
  username?: unknown
  first_name?: unknown
  last_name?: unknown
  [key: string]: unknown
}

const isJsonObject = (value: unknown): value is TelegramUser =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/** Сортировка по кодовым единицам, а не по локали: порядок должен совпадать с клиентом. */
const compareKeys = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

/** Разбирает query string; пустые значения сохраняются, при повторе ключа побеждает последнее. */
export function parseInitData(initData: string): Map<string, string> {
  const pairs = new Map<string, string>()
  for (const [key, value] of new URLSearchParams(initData)) {
    pairs.set(key, value)
  }
  return pairs
}

export function buildDataCheckString(pairs: Map<string, string>): string {
  return [...pairs.entries()]
    .sort(([a], [b]) => compareKeys(a, b))
    .map(([k, v]) => `${k}=${v}`)
    .join('\n')
}

/** secret = HMAC-SHA256("WebAppData", botToken), hash = HMAC-SHA256(secret, dataCheckString) */
export function signDataCheckString(dataCheckString: string, botToken: string): string {
  const secretKey = createHmac('sha256', 'WebAppData').update(botToken).digest()
  return createHmac('sha256', secretKey).update(dataCheckString).digest('hex')
}

/**
 * Верифицирует initData из Telegram Mini App по HMAC-SHA256.
 * https://core.telegram.org/bots/webapps#validating-data-received-via-the-mini-app
 *
 * @param maxAgeSeconds - если больше нуля, auth_date старше этого возраста отклоняется
 * @throws AuthError с причиной, по которой проверка не прошла
 */
export function verifyTelegramInitData(
  initData: string,
  botToken: string,
  maxAgeSeconds = 0,
): TelegramUser {
  if (!initData) {
    throw new AuthError('missing payload')
  }

  const pairs = parseInitData(initData)
  const hash = pairs.get('hash')
  if (!hash) {
    throw new AuthError('missing hash')
  }
  pairs.delete('hash')

  const checkHash = signDataCheckString(buildDataCheckString(pairs), botToken)
  if (!secureCompare(hash, checkHash)) {
    throw new AuthError('bad signature')
  }

  if (maxAgeSeconds > 0) {
    const authDate = parseInt(pairs.get('auth_date') ?? '', 10)
    const nowSec = Math.floor(Date.now() / 1000)
    if (!Number.isFinite(authDate) || nowSec - authDate > maxAgeSeconds) {
      throw new AuthError('expired payload')
    }
  }

  const userJson = pairs.get('user')
  if (!userJson) {
    throw new AuthError('missing user')
  }

  let user: unknown
  try {
    user = JSON.parse(userJson)
  } catch {
    throw new AuthError('bad user json')
  }

  if (!isJsonObject(user)) {
    throw new AuthError('bad user json')
  }

  return user
}

/** Telegram id пользователя: целое число или строка из цифр. Иначе — AuthError. */
export function resolveTelegramUserId(user: TelegramUser): number {
  const { id } = user
  if (typeof id === 'number' && Number.isSafeInteger(id)) {
    return id
  }
  if (typeof id === 'string' && /^-?\d+$/.test(id.trim())) {
    const parsed = Number(id.trim())
    if (Number.isSafeInteger(parsed)) {
      return parsed
    }
  }
  throw new AuthError('bad user id')
}
