import type { TQueryKey, TQueryValue, TQueryValueOrList } from '../types.js'
import { isArray, isIterable, valueToString } from '../utils.js'

/**
 * Пара ключ/значение во входных данных {@link QueryParams}. Массив значений раскрывается в несколько пар.
 */
type TQueryParamsItem = readonly [TQueryKey, TQueryValueOrList]

/**
 * Источник пар для {@link QueryParams.load}, {@link QueryParams.update} и {@link QueryParams.updateAll}.
 */
type TQueryParamsInput = QueryParams | ReadonlyMap<TQueryKey, TQueryValueOrList> | Iterable<TQueryParamsItem> | { readonly [key: string]: TQueryValueOrList }

type _TEntry = { readonly key: string, value: TQueryValue }

function _keyOf (key: TQueryKey): string {
  return typeof key === 'string' ? key : valueToString(key)
}

/**
 * Одномерное правило: массив означает несколько значений одного ключа.
 */
function _toList (value: TQueryValueOrList): readonly TQueryValue[] {
  return isArray(value) ? value : [value]
}

function _isSameValue (a: TQueryValue, b: TQueryValue): boolean {
  return a === b || (a !== null && b !== null && valueToString(a) === valueToString(b))
}

/**
 * Упорядоченное отображение ключей на несколько значений.
 *
 * Сохраняет порядок вставки и повторяющиеся ключи `a=1&a=2`. Значение `null` означает ключ без знака равенства,
 * пустая строка - ключ с пустым значением. Числовые ключи приводятся к строке.
 *
 * Массив, переданный как значение в {@link set}, {@link add}, {@link load}, {@link update} или {@link updateAll},
 * всегда раскрывается в несколько пар с одним ключом.
 */
class QueryParams {
  protected _entries: _TEntry[] = []

  constructor(items?: undefined | null | TQueryParamsInput) {
    if (items) {
      this.updateAll(items)
    }
  }

  /**
   * Приводит допустимые источники к списку пар. Порядок и повторяющиеся ключи сохраняются.
   */
  static itemsOf (items: TQueryParamsInput): [string, TQueryValueOrList][] {
    if (items instanceof QueryParams) {
      return items.allItems()
    }
    const result: [string, TQueryValueOrList][] = []
    if (isIterable(items)) {
      for (const [key, value] of items) {
        result.push([_keyOf(key), value])
      }
    }
    else {
      for (const [key, value] of Object.entries(items)) {
        result.push([key, value])
      }
    }
    return result
  }

  /**
   * Количество уникальных ключей.
   */
  get size (): number {
    return this.keys().length
  }

  has (key: TQueryKey): boolean {
    const k = _keyOf(key)
    return this._entries.some((entry) => entry.key === k)
  }

  /**
   * Первое значение ключа или `undefined`, если ключа нет.
   */
  get (key: TQueryKey): undefined | TQueryValue {
    const k = _keyOf(key)
    return this._entries.find((entry) => entry.key === k)?.value
  }

  getList (key: TQueryKey): TQueryValue[] {
    const k = _keyOf(key)
    return this._entries.filter((entry) => entry.key === k).map((entry) => entry.value)
  }

  /**
   * Заменяет все значения ключа. Массив устанавливает несколько значений.
   */
  set (key: TQueryKey, value: TQueryValueOrList): this {
    return this.setList(key, _toList(value))
  }

  /**
   * Добавляет значение или несколько значений в конец.
   */
  add (key: TQueryKey, value: TQueryValueOrList): this {
    return this.addList(key, _toList(value))
  }

  /**
   * Заменяет значения ключа, сохраняя позиции существующих пар.
   * Лишние новые значения добавляются в конец, лишние старые пары удаляются. Пустой список удаляет ключ.
   */
  setList (key: TQueryKey, values: readonly TQueryValue[]): this {
    const k = _keyOf(key)
    let index = 0
    const entries: _TEntry[] = []
    for (const entry of this._entries) {
      if (entry.key !== k) {
        entries.push(entry)
      }
      else if (index < values.length) {
        entries.push({ key: k, value: values[index] ?? null })
        ++index
      }
    }
    for (; index < values.length; ++index) {
      entries.push({ key: k, value: values[index] ?? null })
    }
    this._entries = entries
    return this
  }

  addList (key: TQueryKey, values: readonly TQueryValue[]): this {
    const k = _keyOf(key)
    for (const value of values) {
      this._entries.push({ key: k, value })
    }
    return this
  }

  /**
   * Удаляет все пары ключа.
   *
   * @returns `true`, если ключ был.
   */
  delete (key: TQueryKey): boolean {
    const k = _keyOf(key)
    const size = this._entries.length
    this._entries = this._entries.filter((entry) => entry.key !== k)
    return size !== this._entries.length
  }

  /**
   * Удаляет все пары ключа и возвращает первое значение или `undefined`.
   */
  pop (key: TQueryKey): undefined | TQueryValue {
    const value = this.get(key)
    this.delete(key)
    return value
  }

  /**
   * Удаляет одну пару ключа.
   *
   * @param key   Ключ.
   * @param value Удалить пару только с этим значением. Если не задано, удаляется любая пара ключа.
   * @param last  Удалить последнюю подходящую пару, иначе первую.
   * @returns Значение удаленной пары или `undefined`.
   */
  popValue (key: TQueryKey, value?: TQueryValue, last: boolean = true): undefined | TQueryValue {
    const k = _keyOf(key)
    const match = (entry: _TEntry): boolean => entry.key === k && (value === undefined || _isSameValue(entry.value, value))
    let index = -1
    if (last) {
      for (let i = this._entries.length - 1; i >= 0 && index < 0; --i) {
        const entry = this._entries[i]
        if (entry && match(entry)) {
          index = i
        }
      }
    }
    else {
      index = this._entries.findIndex(match)
    }
    if (index < 0) {
      return undefined
    }
    const [removed] = this._entries.splice(index, 1)
    return removed?.value
  }

  /**
   * Все пары в порядке вставки.
   */
  allItems (): [string, TQueryValue][] {
    return this._entries.map(({ key, value }) => [key, value])
  }

  /**
   * Первое значение каждого уникального ключа.
   */
  items (): [string, TQueryValue][] {
    const seen = new Set<string>()
    const result: [string, TQueryValue][] = []
    for (const { key, value } of this._entries) {
      if (!seen.has(key)) {
        seen.add(key)
        result.push([key, value])
      }
    }
    return result
  }

  keys (): string[] {
    return [...new Set(this._entries.map((entry) => entry.key))]
  }

  /**
   * Первые значения уникальных ключей.
   */
  values (): TQueryValue[] {
    return this.items().map(([, value]) => value)
  }

  allValues (): TQueryValue[] {
    return this._entries.map((entry) => entry.value)
  }

  clear (): this {
    this._entries = []
    return this
  }

  /**
   * Очищает и загружает пары заново.
   */
  load (items?: undefined | null | TQueryParamsInput): this {
    this.clear()
    if (items) {
      this.updateAll(items)
    }
    return this
  }

  /**
   * Каждый ключ получает значения своей последней пары. Позиция первой существующей пары ключа сохраняется.
   */
  update (items: TQueryParamsInput): this {
    const replacements = new Map<string, readonly TQueryValue[]>()
    for (const [key, value] of QueryParams.itemsOf(items)) {
      replacements.set(key, _toList(value))
    }
    for (const [key, values] of replacements) {
      this.setList(key, values)
    }
    return this
  }

  /**
   * Принимает все пары. Новые значения существующего ключа по порядку замещают его пары на их позициях,
   * а не уместившиеся и новые ключи добавляются в конец. Пустой массив удаляет ключ.
   */
  updateAll (items: TQueryParamsInput): this {
    const replacements = new Map<string, TQueryValue[]>()
    let leftovers: [string, TQueryValue][] = []
    for (const [key, raw] of QueryParams.itemsOf(items)) {
      if (isArray(raw) && raw.length === 0) {
        replacements.set(key, [])
        leftovers = leftovers.filter(([k]) => k !== key)
        continue
      }
      const existing = this.getList(key).length
      for (const value of _toList(raw)) {
        const planned = replacements.get(key)
        if (existing > 0 && (!planned || planned.length === 0)) {
          replacements.set(key, [value])
        }
        else if (existing > 0 && planned && planned.length < existing) {
          planned.push(value)
        }
        else {
          leftovers.push([key, value])
        }
      }
    }
    for (const [key, values] of replacements) {
      this.setList(key, values)
    }
    for (const [key, value] of leftovers) {
      this._entries.push({ key, value })
    }
    return this
  }

  copy (): QueryParams {
    const params = new QueryParams()
    params._entries = this._entries.map((entry) => ({ ...entry }))
    return params
  }

  /**
   * Совпадают ли все пары и их порядок.
   */
  equals (other: unknown): boolean {
    if (!(other instanceof QueryParams) || other._entries.length !== this._entries.length) {
      return false
    }
    return this._entries.every((entry, index) => {
      const item = other._entries[index]
      return !!item && item.key === entry.key && _isSameValue(item.value, entry.value)
    })
  }
}

export {
  type TQueryParamsItem,
  type TQueryParamsInput,
  QueryParams
}
