/**
 * Значение `undefined`.
 */
function isUndefined (value: unknown): value is undefined {
  return typeof value === 'undefined'
}

/**
 * Значение `undefined | null`.
 */
function isNullish (value: unknown): value is (undefined | null) {
  return typeof value === 'undefined' || value === null
}

/**
 * Значение `boolean`.
 */
function isBoolean (value: unknown): value is boolean {
  return typeof value === 'boolean'
}

/**
 * Является ли аргумент `value` строкой.
 */
function isString (value: unknown): value is string {
  return typeof value === 'string'
}

/**
 * Является ли значение `value` конечным числом.
 */
function isFiniteNumber (value: unknown): value is number {
  return Number.isFinite(value)
}

/**
 * Является ли значение `value` массивом.
 */
function isArray (value: unknown): value is readonly unknown[] {
  return Array.isArray(value)
}

/**
 * Реализует ли объект протокол итерации.
 */
function isIterable (value: object): value is Iterable<unknown> {
  return Symbol.iterator in value
}

/**
 * Приводит примитив к строке. Для `null|undefined` и объектов возвращает пустую строку.
 */
function valueToString (value: unknown): string {
  if (isString(value)) {
    return value
  }
  if (isFiniteNumber(value)) {
    return value.toString(10)
  }
  if (isBoolean(value)) {
    return value ? 'true' : 'false'
  }
  return ''
}

/**
 * Пытается привести `value` к Json-строке или возвращает пустую строку.
 */
function safeToJson (value: unknown): string {
  try {
    return JSON.stringify(value) ?? ''
  } catch (_) {
    return ''
  }
}

export {
  isUndefined,
  isNullish,
  isBoolean,
  isString,
  isFiniteNumber,
  isArray,
  isIterable,
  valueToString,
  safeToJson
}
