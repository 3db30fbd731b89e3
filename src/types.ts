type UOptional<T extends object> = { -readonly [K in keyof T]?: undefined | null | T[K] }

/**
 * Ключ параметра строки запроса. Число приводится к строке при сериализации.
 */
type TQueryKey = string | number

/**
 * Значение параметра строки запроса.
 *
 *   + `null` - ключ без знака равенства `?key`.
 *   + `''` - ключ с пустым значением `?key=`.
 */
type TQueryValue = null | string | number | boolean

/**
 * Значение или последовательность значений одного ключа.
 * Последовательность раскрывается в несколько пар с одинаковым ключом.
 */
type TQueryValueOrList = TQueryValue | readonly TQueryValue[]

export {
  type UOptional,
  type TQueryKey,
  type TQueryValue,
  type TQueryValueOrList
}
