import { test, expect } from 'vitest'
import { isIterable, valueToString, safeToJson } from './utils.js'

test('valueToString', () => {
  expect(valueToString('a')).toBe('a')
  expect(valueToString(12)).toBe('12')
  expect(valueToString(false)).toBe('false')
  expect(valueToString(Number.NaN)).toBe('')
  expect(valueToString(null)).toBe('')
})

test('isIterable', () => {
  expect(isIterable([])).toBe(true)
  expect(isIterable(new Map())).toBe(true)
  expect(isIterable({ a: 1 })).toBe(false)
})

test('safeToJson', () => {
  const circular: { self?: unknown } = {}
  circular.self = circular
  expect(safeToJson('a')).toBe('"a"')
  expect(safeToJson(circular)).toBe('')
  expect(safeToJson(undefined)).toBe('')
})
