// Типы для API заказов Mini App

/** Строка таблицы orders как её отдаёт SQLite */
export interface OrderRow {
  id: number
  public_no: string
  owner_tg_id: number | null
  owner_phone: string | null
  item: string
  services_json: string
  status: string
  price: number | null
  comment: string | null
  is_closed: number
  created_at: string
  updated_at: string
}

export interface Order {
  id: number
  public_no: string
  owner_tg_id: number | null
  owner_phone: string | null
  item: string
  services: string[]
  status: string
  price: number | null
  comment: string | null
  is_closed: boolean
  created_at: string
  updated_at: string
}

/** Данные для upsert. Строки уже обрезаны, services очищены от пустых значений. */
export interface OrderInput {
  public_no: string
  item: string
  status: string
  owner_tg_id?: number | null
  owner_phone?: string | null
  services?: string[]
  price?: number | null
  comment?: string | null
}

/** Заказ в ответе GET /api/me/orders */
export type OwnerOrderView = Pick<
  Order,
  'public_no' | 'item' | 'services' | 'status' | 'price' | 'comment' | 'created_at' | 'updated_at'
>
