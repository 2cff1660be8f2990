import { describe, it, expect } from 'vitest'
import { loadConfig } from '../config'
import { ConfigError } from '../errors'

const baseEnv = {
  BOT_TOKEN: 'test-bot-token',
  ADMIN_API_TOKEN: 'test-admin-token',
  DATABASE_URL: 'sqlite:./data/test.db',
}

describe('loadConfig', () => {
  it('применяет значения по умолчанию', () => {
    expect(loadConfig(baseEnv)).toEqual({
      botToken: 'test-bot-token',
      adminApiToken: 'test-admin-token',
      databaseUrl: 'sqlite:./data/test.db',
      webappOrigins: [],
      nodeEnv: 'development',
      port: 8000,
      host: '0.0.0.0',
      logLevel: undefined,
      initDataMaxAgeSeconds: 0,
    })
  })

  it('разбирает список WEBAPP_ORIGINS и числовые параметры', () => {
    const config = loadConfig({
      ...baseEnv,
      WEBAPP_ORIGINS: ' https://a.example , ,https://b.example',
      PORT: '3005',
      INIT_DATA_MAX_AGE_SECONDS: '86400',
      LOG_LEVEL: 'warn',
    })
    expect(config.webappOrigins).toEqual(['https://a.example', 'https://b.example'])
    expect(config.port).toBe(3005)
    expect(config.initDataMaxAgeSeconds).toBe(86400)
    expect(config.logLevel).toBe('warn')
  })

  it('обрезает пробелы вокруг секретов', () => {
    const config = loadConfig({ ...baseEnv, BOT_TOKEN: '  test-bot-token\n' })
    expect(config.botToken).toBe('test-bot-token')
  })

  it('падает с перечнем отсутствующих обязательных переменных', () => {
    let caught: unknown
    try {
      loadConfig({ BOT_TOKEN: 'test-bot-token', ADMIN_API_TOKEN: '   ' })
    } catch (error) {
      caught = error
    }
    expect(caught).toBeInstanceOf(ConfigError)
    expect(caught instanceof ConfigError && caught.variables).toEqual([
      'ADMIN_API_TOKEN',
      'DATABASE_URL',
    ])
  })
})
