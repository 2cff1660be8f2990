import { createHash, timingSafeEqual } from 'crypto'

/**
 * Constant-time сравнение строк. Обе стороны сначала хэшируются в SHA-256,
 * так что timingSafeEqual всегда получает буферы одной длины.
 */
export function secureCompare(received: string, expected: string): boolean {
  const receivedDigest = createHash('sha256').update(received, 'utf8').digest()
  const expectedDigest = createHash('sha256').update(expected, 'utf8').digest()
  return timingSafeEqual(receivedDigest, expectedDigest)
}
