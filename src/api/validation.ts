import { z } from 'zod'
import { OrderInput } from '../types'
import { ValidationError } from '../utils/errors'
import { normalizeServices } from '../db/services-column'

// Строковые поля принимают и числа: номер заказа часто приходит как 1024
const textValue = z.union([z.string(), z.number()]).transform((value) => String(value).trim())

const requiredText = z.preprocess(
  (value) => value ?? '',
  textValue.pipe(z.string().min(1, 'required')),
)

// Необязательные строки сохраняем как есть, без обрезки
const optionalText = z
  .union([z.string(), z.number()])
  .transform(String)
  .nullish()
  .transform((value) => value ?? null)

// safe(): значения за 2^53 SQLite сохранил бы как REAL
const optionalInt = z.number().int().safe().nullish().transform((value) => value ?? null)

export const OrderUpsertSchema = z.object({
  public_no: requiredText,
  item: requiredText,
  status: requiredText,
  owner_tg_id: optionalInt,
  owner_phone: optionalText,
  services: z
    .array(textValue)
    .nullish()
    .transform((value) => normalizeServices(value ?? [])),
  price: optionalInt,
  comment: optionalText,
})

/**
 * Один проход валидации тела POST /api/admin/order/upsert.
 * Возвращает типизированный OrderInput или бросает ValidationError по первому полю с ошибкой.
 */
export function parseOrderUpsert(body: unknown): OrderInput {
  const parsed = OrderUpsertSchema.safeParse(body)
  if (parsed.success) {
    return parsed.data
  }

  const issue = parsed.error.issues[0]
  const field = issue.path.length > 0 ? issue.path.join('.') : 'body'
  const message = issue.message === 'required' ? `${field} required` : `${field}: ${issue.message}`
  throw new ValidationError(field, message)
}
