import { describe, it, expect } from 'vitest'
import { decodeServices, encodeServices, normalizeServices } from '../services-column'
import { InfrastructureError } from '../../utils/errors'

describe('services column', () => {
  it('выбрасывает пустые и пробельные услуги', () => {
    expect(normalizeServices(['  ', 'wash', '', 'iron'])).toEqual(['wash', 'iron'])
  })

  it('сохраняет порядок и дубликаты, обрезая пробелы', () => {
    expect(encodeServices([' iron', 'wash ', 'iron'])).toBe('["iron","wash","iron"]')
  })

  it('не экранирует кириллицу', () => {
    expect(encodeServices(['химчистка'])).toBe('["химчистка"]')
  })

  it('читает пустую колонку как пустой список', () => {
    expect(decodeServices('')).toEqual([])
    expect(decodeServices(null)).toEqual([])
    expect(decodeServices('[]')).toEqual([])
  })

  it('считает повреждённую колонку ошибкой хранилища', () => {
    expect(() => decodeServices('not json')).toThrow(InfrastructureError)
    expect(() => decodeServices('{"wash":true}')).toThrow(InfrastructureError)
    expect(() => decodeServices('[1,2]')).toThrow(InfrastructureError)
  })
})
