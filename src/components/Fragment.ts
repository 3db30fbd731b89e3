import { type TUrlPartsOptions, type TUrlPartsConfig, normalizeUrlPartsOptions } from '../options.js'
import { isBoolean, isUndefined } from '../utils.js'
import { type TPathInput, Path } from './Path.js'
import type { QueryParams } from './QueryParams.js'
import { type TQueryInput, type TQueryRemoveInput, Query } from './Query.js'

/**
 * Параметры {@link Fragment.add}. Отсутствующее поле не применяется.
 */
type TFragmentAddOptions = {
  path?: undefined | TPathInput
  args?: undefined | TQueryInput
}

/**
 * Параметры {@link Fragment.set}. Отсутствующее поле не применяется, `null` очищает часть.
 */
type TFragmentSetOptions = {
  path?: undefined | null | TPathInput
  args?: undefined | null | TQueryInput
  separator?: undefined | boolean
}

/**
 * Параметры {@link Fragment.remove}.
 */
type TFragmentRemoveOptions = {
  /**
   * Очистить фрагмент целиком.
   */
  fragment?: undefined | boolean
  path?: undefined | true | TPathInput
  args?: undefined | TQueryRemoveInput
}

type TFragmentJson = {
  encoded: string
  path: string
  query: string
  separator: boolean
}

const _encodedQuestion = /%3F/g

/**
 * Фрагмент `URL` из пути и строки запроса: `#path/to?a=1`.
 *
 * Путь фрагмента никогда не становится принудительно абсолютным.
 */
class Fragment {
  protected readonly _config: TUrlPartsConfig
  protected readonly _path: Path
  protected readonly _query: Query
  /**
   * Вставлять `?` между непустыми путем и запросом. Отключение позволяет строить фрагменты вида `#!a=1`.
   */
  separator = true

  constructor(fragment?: undefined | null | string, options?: undefined | null | TUrlPartsOptions) {
    this._config = normalizeUrlPartsOptions(options)
    this._path = new Path(null, this._config)
    this._query = new Query(null, this._config)
    this.load(fragment)
  }

  get strict (): boolean {
    return this._config.strict
  }

  get path (): Path {
    return this._path
  }

  set path (path: undefined | null | TPathInput) {
    this._path.load(path)
  }

  get query (): Query {
    return this._query
  }

  set query (query: undefined | null | TQueryInput) {
    this._query.load(query)
  }

  /**
   * Параметры запроса фрагмента.
   */
  get args (): QueryParams {
    return this._query.params
  }

  isEmpty (): boolean {
    return this._path.isEmpty() && this._query.isEmpty()
  }

  /**
   * Разбирает строку фрагмента по первому `?`.
   *
   * Без `?` строка считается запросом, если содержит `=`, иначе путем. Если после `?` нет `=`, вся строка
   * считается путем: `a?b?` это путь, а `a?b=c` - путь `a` и запрос `b=c`.
   */
  load (fragment?: undefined | null | string): this {
    this._path.load('')
    this._query.load('')
    if (!fragment) {
      return this
    }
    const index = fragment.indexOf('?')
    if (index < 0) {
      if (fragment.includes('=')) {
        this._query.load(fragment)
      }
      else {
        this._path.load(fragment)
      }
    }
    else if (fragment.slice(index + 1).includes('=')) {
      this._path.load(fragment.slice(0, index))
      this._query.load(fragment.slice(index + 1))
    }
    else {
      this._path.load(fragment)
    }
    return this
  }

  add ({ path, args }: TFragmentAddOptions): this {
    if (!isUndefined(path)) {
      this._path.add(path)
    }
    if (!isUndefined(args)) {
      this._query.add(args)
    }
    return this
  }

  set ({ path, args, separator }: TFragmentSetOptions): this {
    if (!isUndefined(path)) {
      this._path.load(path)
    }
    if (!isUndefined(args)) {
      this._query.load(args)
    }
    if (isBoolean(separator)) {
      this.separator = separator
    }
    return this
  }

  remove ({ fragment, path, args }: TFragmentRemoveOptions): this {
    if (fragment === true) {
      this.load('')
    }
    if (!isUndefined(path)) {
      this._path.remove(path)
    }
    if (!isUndefined(args)) {
      this._query.remove(args)
    }
    return this
  }

  copy (): Fragment {
    const fragment = new Fragment(null, this._config)
    fragment._path.load(this._path)
    fragment._query.load(this._query)
    fragment.separator = this.separator
    return fragment
  }

  equals (other: unknown): boolean {
    return other instanceof Fragment &&
      other.separator === this.separator &&
      other._path.equals(this._path) &&
      other._query.equals(this._query)
  }

  toJSON (): TFragmentJson {
    return {
      encoded: this.toString(),
      path: this._path.toString(),
      query: this._query.toString(),
      separator: this.separator
    }
  }

  toString (): string {
    let path = this._path.toString()
    const query = this._query.toString()
    // Символы `?` в пути показываются как есть, если их нельзя спутать с разделителем
    if (path && (!query || !this.separator)) {
      path = path.replace(_encodedQuestion, '?')
    }
    if (path && query) {
      return `${path}${this.separator ? '?' : ''}${query}`
    }
    return `${path}${query}`
  }
}

export {
  type TFragmentAddOptions,
  type TFragmentSetOptions,
  type TFragmentRemoveOptions,
  type TFragmentJson,
  Fragment
}
