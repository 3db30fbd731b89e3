import type { TQueryKey, TQueryValue, TQueryValueOrList } from '../types.js'
import { type TUrlPartsOptions, type TUrlPartsConfig, normalizeUrlPartsOptions, warnEncoding } from '../options.js'
import { isArray, isIterable, isString, valueToString, safeToJson } from '../utils.js'
import { quote, quotePlus, unquotePlus } from '../codec/percent.js'
import { isValidEncodedQueryKey, isValidEncodedQueryValue } from '../codec/validators.js'
import { type TQueryParamsItem, type TQueryParamsInput, QueryParams } from './QueryParams.js'

/**
 * Символы, которые могут остаться незакодированными в ключе.
 */
const SAFE_KEY_CHARS = "/?:@-._~!$'()*+,;"
/**
 * Символы, которые могут остаться незакодированными в значении.
 */
const SAFE_VALUE_CHARS = `${SAFE_KEY_CHARS}=`

/**
 * Источник параметров: закодированная строка `a=1&b`, другой запрос или любой источник {@link QueryParams}.
 */
type TQueryInput = string | Query | TQueryParamsInput

/**
 * Что удалить из запроса:
 *
 *   + `true` - все параметры;
 *   + ключ - все пары ключа;
 *   + массив ключей и/или пар `[key, value]` - пара удаляет одно последнее вхождение значения;
 *   + отображение - удаляет указанные пары.
 */
type TQueryRemoveInput = true | TQueryKey | Query | QueryParams | ReadonlyMap<TQueryKey, TQueryValueOrList> | Iterable<TQueryKey | TQueryParamsItem> | { readonly [key: string]: TQueryValueOrList }

/**
 * Опции кодирования строки запроса.
 */
type TQueryEncodeOptions = {
  /**
   * Разделитель пар. По умолчанию `&`.
   */
  delimiter?: undefined | null | string
  /**
   * Кодировать пробел как `+`, а не `%20`. По умолчанию `true`.
   */
  quotePlus?: undefined | null | boolean
  /**
   * Символы, которые не нужно кодировать: `true` - все допустимые, строка - их подмножество.
   * Символы вне допустимого набора кодируются всегда.
   */
  dontQuote?: undefined | null | boolean | string
}

function _safeChars (allowed: string, dontQuote: boolean | string): string {
  if (dontQuote === true) {
    return allowed
  }
  if (!dontQuote) {
    return ''
  }
  return [...dontQuote].filter((char) => allowed.includes(char)).join('')
}

function _quote (value: string, safe: string, plus: boolean): string {
  return plus ? quotePlus(value, safe) : quote(value, safe)
}

/**
 * Строка запроса `URL` поверх {@link QueryParams}.
 */
class Query {
  protected readonly _config: TUrlPartsConfig
  protected readonly _params = new QueryParams()

  constructor(query?: undefined | null | TQueryInput, options?: undefined | null | TUrlPartsOptions) {
    this._config = normalizeUrlPartsOptions(options)
    this.load(query)
  }

  get strict (): boolean {
    return this._config.strict
  }

  /**
   * Параметры запроса. Изменения объекта сразу отражаются на строке запроса.
   */
  get params (): QueryParams {
    return this._params
  }

  set params (params: undefined | null | TQueryInput) {
    this._params.clear()
    for (const [key, value] of this._items(params)) {
      this._params.add(key, value)
    }
  }

  isEmpty (): boolean {
    return this._params.size === 0
  }

  protected _itemsFromQueryString (query: string): [string, TQueryValue][] {
    const pairs = query.split('&').filter((pair) => pair.length > 0)
    if (this._config.strict) {
      for (const pair of pairs) {
        const index = pair.indexOf('=')
        const key = index < 0 ? pair : pair.slice(0, index)
        const value = index < 0 ? '' : pair.slice(index + 1)
        if (!isValidEncodedQueryKey(key) || !isValidEncodedQueryValue(value)) {
          warnEncoding(this._config, `Неверно закодированная строка запроса ${safeToJson(query)}, пара ${safeToJson(pair)}.`)
          break
        }
      }
    }
    return pairs.map((pair): [string, TQueryValue] => {
      const index = pair.indexOf('=')
      return index < 0
        ? [unquotePlus(pair), null]
        : [unquotePlus(pair.slice(0, index)), unquotePlus(pair.slice(index + 1))]
    })
  }

  /**
   * Приводит источник к списку пар. Значения строки запроса декодируются, остальные передаются как есть.
   */
  protected _items (query: undefined | null | TQueryInput): [string, TQueryValueOrList][] {
    if (!query) {
      return []
    }
    if (isString(query)) {
      return this._itemsFromQueryString(query)
    }
    return QueryParams.itemsOf(query instanceof Query ? query._params : query)
  }

  /**
   * Заменяет все параметры.
   */
  load (query?: undefined | null | TQueryInput): this {
    this._params.load(this._items(query))
    return this
  }

  /**
   * Добавляет параметры в конец, не затрагивая существующие.
   */
  add (args: TQueryInput): this {
    for (const [key, value] of this._items(args)) {
      this._params.add(key, value)
    }
    return this
  }

  /**
   * Принимает все пары, замещая значения существующих ключей на их позициях, см. {@link QueryParams.updateAll}.
   *
   *   + `Query('1').set([[1, null], [2, 2]]) -> '1&2=2'`
   *   + `Query({ 1: null }).set([[1, [1, 11, 111]]]) -> '1=1&1=11&1=111'`
   */
  set (mapping: TQueryInput): this {
    this._params.updateAll(this._items(mapping))
    return this
  }

  remove (query: TQueryRemoveInput): this {
    if (query === true) {
      return this.load('')
    }
    if (isString(query) || typeof query === 'number') {
      this._params.delete(query)
      return this
    }
    if (query instanceof Query || query instanceof QueryParams || !isIterable(query)) {
      for (const [key, value] of QueryParams.itemsOf(query instanceof Query ? query._params : query)) {
        for (const item of isArray(value) ? value : [value]) {
          this._params.popValue(key, item)
        }
      }
      return this
    }
    for (const item of query) {
      if (isArray(item)) {
        const [key, value] = item
        for (const one of isArray(value) ? value : [value]) {
          this._params.popValue(key, one)
        }
      }
      else {
        this._params.delete(item)
      }
    }
    return this
  }

  /**
   * Кодирует параметры в строку запроса без ведущего `?`.
   *
   * Значение `null` дает ключ без знака равенства, пустой ключ - строку `=value`.
   */
  encode (options?: undefined | null | TQueryEncodeOptions): string {
    const delimiter = options?.delimiter ?? '&'
    const plus = options?.quotePlus ?? true
    const dontQuote = options?.dontQuote ?? ''
    const safeKey = _safeChars(SAFE_KEY_CHARS, dontQuote)
    const safeValue = _safeChars(SAFE_VALUE_CHARS, dontQuote)
    const pairs: string[] = []
    for (const [key, value] of this._params.allItems()) {
      const quotedKey = _quote(key, safeKey, plus)
      pairs.push(value === null ? quotedKey : `${quotedKey}=${_quote(valueToString(value), safeValue, plus)}`)
    }
    return pairs.join(delimiter)
  }

  copy (): Query {
    return new Query(this, this._config)
  }

  equals (other: unknown): boolean {
    return other instanceof Query && other._params.equals(this._params)
  }

  toJSON (): [string, TQueryValue][] {
    return this._params.allItems()
  }

  toString (): string {
    return this.encode()
  }
}

export {
  SAFE_KEY_CHARS,
  SAFE_VALUE_CHARS,
  type TQueryInput,
  type TQueryRemoveInput,
  type TQueryEncodeOptions,
  Query
}
