import { z } from 'zod'
import { InfrastructureError } from '../utils/errors'

// Колонка orders.services_json: JSON-массив непустых строк
const storedServicesSchema = z.array(z.string())

/** Обрезает пробелы и выбрасывает пустые строки. Порядок и дубликаты сохраняются. */
export function normalizeServices(services: readonly string[]): string[] {
  return services.map((service) => service.trim()).filter((service) => service.length > 0)
}

export function encodeServices(services: readonly string[]): string {
  return JSON.stringify(normalizeServices(services))
}

export function decodeServices(raw: string | null): string[] {
  if (!raw) {
    return []
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new InfrastructureError('orders.services_json is not valid JSON', { cause: error })
  }

  const result = storedServicesSchema.safeParse(parsed)
  if (!result.success) {
    throw new InfrastructureError('orders.services_json is not an array of strings', {
      cause: result.error,
    })
  }
  return result.data
}
