import { Request, Response, NextFunction, RequestHandler } from 'express'
import { AuthError } from '../../utils/errors'
import { secureCompare } from '../../utils/secure-compare'

const HEADER_NAME = 'x-admin-token'

/** Пропускает запрос только с X-Admin-Token, в точности равным ADMIN_API_TOKEN. */
export function requireAdminToken(adminApiToken: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const header = req.headers[HEADER_NAME]
    const token = typeof header === 'string' ? header : ''

    if (!token || !secureCompare(token, adminApiToken)) {
      throw new AuthError('bad admin token')
    }
    next()
  }
}
