import Database from 'better-sqlite3'
import { Order, OrderInput, OrderRow } from '../types'
import { AppError, InfrastructureError, ValidationError } from '../utils/errors'
import { decodeServices, encodeServices } from './services-column'

export type Clock = () => Date

type UpsertParams = {
  public_no: string
  owner_tg_id: number | null
  owner_phone: string | null
  item: string
  services_json: string
  status: string
  price: number | null
  comment: string | null
  now: string
}

const UPSERT_SQL = `
  INSERT INTO orders (public_no, owner_tg_id, owner_phone, item, services_json, status, price, comment, created_at, updated_at)
  VALUES (@public_no, @owner_tg_id, @owner_phone, @item, @services_json, @status, @price, @comment, @now, @now)
  ON CONFLICT(public_no) DO UPDATE SET
    owner_tg_id = excluded.owner_tg_id,
    owner_phone = excluded.owner_phone,
    item = excluded.item,
    services_json = excluded.services_json,
    status = excluded.status,
    price = excluded.price,
    comment = excluded.comment,
    updated_at = CASE
      WHEN excluded.updated_at > orders.updated_at THEN excluded.updated_at
      ELSE strftime('%Y-%m-%dT%H:%M:%fZ', orders.updated_at, '+0.001 seconds')
    END
`

const toOrder = (row: OrderRow): Order => ({
  id: row.id,
  public_no: row.public_no,
  owner_tg_id: row.owner_tg_id,
  owner_phone: row.owner_phone,
  item: row.item,
  services: decodeServices(row.services_json),
  status: row.status,
  price: row.price,
  comment: row.comment,
  is_closed: row.is_closed === 1,
  created_at: row.created_at,
  updated_at: row.updated_at,
})

const requireText = (field: keyof OrderInput, value: string): string => {
  const trimmed = value.trim()
  if (!trimmed) {
    throw new ValidationError(field, `${field} required`)
  }
  return trimmed
}

export class OrderRepository {
  constructor(
    private db: Database.Database,
    private now: Clock = () => new Date(),
  ) {}

  /**
   * Заказы владельца, новые первыми. Для владельца без заказов — пустой массив.
   */
  listByOwner(tgId: number): Order[] {
    return this.query('listByOwner', () =>
      this.db
        .prepare<[number], OrderRow>(
          'SELECT * FROM orders WHERE owner_tg_id = ? ORDER BY created_at DESC, id DESC',
        )
        .all(tgId)
        .map(toOrder),
    )
  }

  findByPublicNo(publicNo: string): Order | null {
    return this.query('findByPublicNo', () => {
      const row = this.db
        .prepare<[string], OrderRow>('SELECT * FROM orders WHERE public_no = ?')
        .get(publicNo)
      return row ? toOrder(row) : null
    })
  }

  /**
   * Создаёт заказ или перезаписывает все изменяемые поля заказа с тем же public_no.
   * created_at выставляется только при вставке, updated_at — при каждом вызове:
   * если часы не ушли вперёд (та же миллисекунда), значение сдвигается на 1 мс.
   */
  upsert(input: OrderInput): void {
    const params: UpsertParams = {
      public_no: requireText('public_no', input.public_no),
      item: requireText('item', input.item),
      status: requireText('status', input.status),
      owner_tg_id: input.owner_tg_id ?? null,
      owner_phone: input.owner_phone ?? null,
      services_json: encodeServices(input.services ?? []),
      price: input.price ?? null,
      comment: input.comment ?? null,
      now: this.now().toISOString(),
    }

    this.query('upsert', () => {
      this.db.prepare<UpsertParams>(UPSERT_SQL).run(params)
    })
  }

  private query<T>(operation: string, run: () => T): T {
    try {
      return run()
    } catch (error) {
      if (error instanceof AppError) {
        throw error
      }
      throw new InfrastructureError(`orders.${operation} failed`, { cause: error })
    }
  }
}
