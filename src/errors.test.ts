import { test, expect } from 'vitest'
import {
  errorDetails,
  isErrorName,
  UrlPartsError,
  UrlPartsWarning,
  InvalidPortError,
  ConflictWarning
} from './errors.js'

test('error', () => {
  const message = errorDetails.InvalidPortError('port 0')

  // Явное приведение
  const asString = message.toString()
  const expectedString = 'name: UrlParts.InvalidPortError\n' +
    'code: 0\n' +
    'message: port 0'
  expect(asString).toBe(expectedString)

  // Автоматическое приведение
  expect(`${message}`).toBe(expectedString)

  // Реальная ошибка наследуемая от Error
  const realError = new InvalidPortError(errorDetails.InvalidPortError('port 0'))
  expect(realError).toBeInstanceOf(Error)
  expect(realError).toBeInstanceOf(UrlPartsError)
  expect(`${realError}`).toContain(expectedString)
})

test('warning', () => {
  const warning = new ConflictWarning(errorDetails.ConflictWarning('netloc и host'))
  expect(warning).toBeInstanceOf(UrlPartsWarning)
  expect(warning.detail.name).toBe('UrlParts.ConflictWarning')
  expect(warning.detail.message).toBe('netloc и host')
})

test('isErrorName', () => {
  expect(isErrorName('UrlParts.InvalidHostError')).toBe(true)
  expect(isErrorName('InvalidHostError')).toBe(false)
  expect(isErrorName(null)).toBe(false)
})
