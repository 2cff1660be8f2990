import { createHmac } from 'crypto'

export const TEST_BOT_TOKEN = 'test-bot-token'

/**
 * Подписывает поля так же, как это делает клиент Telegram, и возвращает initData.
 * Array.prototype.sort без компаратора сортирует по кодовым единицам.
 */
export function signInitData(fields: Record<string, string>, botToken = TEST_BOT_TOKEN): string {
  const dataCheckString = Object.keys(fields)
    .sort()
    .map((key) => `${key}=${fields[key]}`)
    .join('\n')

  const secretKey = createHmac('sha256', 'WebAppData').update(botToken).digest()
  const hash = createHmac('sha256', secretKey).update(dataCheckString).digest('hex')

  const params = new URLSearchParams(fields)
  params.set('hash', hash)
  return params.toString()
}

/** Меняет один hex-символ хэша в initData */
export function flipHashChar(initData: string, index: number): string {
  const params = new URLSearchParams(initData)
  const hash = params.get('hash') ?? ''
  const flipped = hash[index] === '0' ? '1' : '0'
  params.set('hash', hash.slice(0, index) + flipped + hash.slice(index + 1))
  return params.toString()
}
