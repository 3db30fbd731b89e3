import { describe, test, expect } from 'vitest'
import { quote, quotePlus, unquote, unquotePlus } from './percent.js'

describe('percent', () => {
  test('quote', () => {
    expect(quote('a b/c', '/')).toBe('a%20b/c')
    expect(quote('a b/c')).toBe('a%20b%2Fc')
    expect(quote('_.-~Az09')).toBe('_.-~Az09')
    // UTF-8
    expect(quote('ü')).toBe('%C3%BC')
    // Символ % кодируется всегда, даже если указан в safe
    expect(quote('100%')).toBe('100%25')
    expect(quote('%', '%')).toBe('%25')
  })

  test('quotePlus', () => {
    expect(quotePlus('a b+c')).toBe('a+b%2Bc')
    expect(quotePlus('a/b', '/')).toBe('a/b')
  })

  test('unquote', () => {
    expect(unquote('%C3%BC')).toBe('ü')
    expect(unquote('a%20b')).toBe('a b')
    // Неверные последовательности не изменяются
    expect(unquote('%zz%41')).toBe('%zzA')
    expect(unquote('a%')).toBe('a%')
    expect(unquote('a+b')).toBe('a+b')
  })

  test('unquotePlus', () => {
    expect(unquotePlus('a+b%2B')).toBe('a b+')
  })
})
