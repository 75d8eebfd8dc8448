import { describe, it, expect } from 'vitest'
import { buildTemplateVariables, generateUniqueCode, UNIQUE_CODE_MAX, UNIQUE_CODE_MIN } from './variables'

describe('generateUniqueCode', () => {
  it('stays within [10000, 99999] at the extremes of the generator', () => {
    expect(generateUniqueCode(() => 0)).toBe('10000')
    expect(generateUniqueCode(() => 0.9999999999)).toBe('99999')
    expect(generateUniqueCode(() => 0.5)).toBe('55000')
  })

  it('produces five-digit codes with the default generator', () => {
    for (let i = 0; i < 1000; i++) {
      const code = Number(generateUniqueCode())
      expect(Number.isInteger(code)).toBe(true)
      expect(code).toBeGreaterThanOrEqual(UNIQUE_CODE_MIN)
      expect(code).toBeLessThanOrEqual(UNIQUE_CODE_MAX)
    }
  })
})

describe('buildTemplateVariables', () => {
  const record = { email: 'ada@example.com', full_name: 'Ada Lovelace', paper: 'Notes on the Engine' }

  it('resolves the mapping against the record and adds a code', () => {
    const vars = buildTemplateVariables(record, { name: 'full_name', title: 'paper' }, { random: () => 0 })
    expect(vars).toEqual({ name: 'Ada Lovelace', title: 'Notes on the Engine', unique_code: '10000' })
  })

  it('skips mapped columns the record does not have', () => {
    const vars = buildTemplateVariables(record, { name: 'missing_column' }, { random: () => 0 })
    expect(vars).toEqual({ unique_code: '10000' })
  })

  it('adds the registration link only when configured', () => {
    expect(buildTemplateVariables(record, {}, { registrationLink: 'https://example.com/register', random: () => 0 })).toEqual({
      registration_link: 'https://example.com/register',
      unique_code: '10000',
    })
    expect(buildTemplateVariables(record, {}, { registrationLink: '', random: () => 0 })).toEqual({ unique_code: '10000' })
  })

  it('keeps a unique code supplied by the record', () => {
    const vars = buildTemplateVariables({ email: 'a@example.com', code: '424242' }, { unique_code: 'code' }, { random: () => 0 })
    expect(vars.unique_code).toBe('424242')
  })
})
