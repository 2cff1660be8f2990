/**
 * Ошибки приложения. Каждая несёт HTTP-статус, по которому общий error handler
 * сервера формирует ответ `{ ok: false, error }`.
 */
export abstract class AppError extends Error {
  abstract readonly status: number

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }

  /** Текст, который уходит клиенту. По умолчанию совпадает с message. */
  get publicMessage(): string {
    return this.message
  }
}

export type AuthFailure =
  | 'missing payload'
  | 'missing hash'
  | 'bad signature'
  | 'missing user'
  | 'bad user json'
  | 'bad user id'
  | 'expired payload'
  | 'bad admin token'

/** Провал проверки initData или admin-токена. Сообщение называет проверку, но не секреты. */
export class AuthError extends AppError {
  readonly status = 401

  constructor(readonly reason: AuthFailure) {
    super(reason)
  }
}

/** Некорректное или неполное тело запроса. field указывает на первое проблемное поле. */
export class ValidationError extends AppError {
  readonly status = 400

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message)
  }
}

/** Хранилище недоступно или запрос к нему упал. Повторов не делаем. */
export class InfrastructureError extends AppError {
  readonly status = 503

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
  }

  get publicMessage(): string {
    return 'database unavailable'
  }
}

/** Невалидная конфигурация окружения: процесс должен завершиться при старте. */
export class ConfigError extends AppError {
  readonly status = 500

  constructor(readonly variables: string[]) {
    super(`Invalid environment: ${variables.join(', ')}`)
  }
}
