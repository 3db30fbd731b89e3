import { errorDetails, ImmutableStateError } from '../errors.js'
import { type TUrlPartsOptions, type TUrlPartsConfig, normalizeUrlPartsOptions, warnEncoding } from '../options.js'
import { isArray, isNullish, safeToJson } from '../utils.js'
import { quote, unquote } from '../codec/percent.js'
import { isValidEncodedPathSegment } from '../codec/validators.js'

/**
 * Символы, которые не кодируются в сегменте пути.
 */
const SAFE_SEGMENT_CHARS = ":@-._~!$&'()*+,;="

/**
 * Режим абсолютности пути.
 *
 *   + `mutable` - абсолютность определяется ведущим слешем и может меняться через {@link Path.isAbsolute}.
 *   + `forced` - путь с сегментами всегда абсолютный, запись {@link Path.isAbsolute} запрещена.
 *     Так `URL` с непустым `netloc` не может иметь относительный путь.
 */
type TPathAbsoluteMode = 'mutable' | 'forced'

/**
 * Допустимые значения для загрузки пути: закодированная строка, декодированные сегменты или другой путь.
 */
type TPathInput = string | readonly string[] | Path

/**
 * Сериализованное состояние пути.
 */
type TPathJson = {
  encoded: string
  isDir: boolean
  isFile: boolean
  isAbsolute: boolean
  segments: string[]
}

/**
 * Соединяет списки сегментов, не удваивая и не теряя слеш на стыке:
 *
 *   + `['a'] + ['b'] -> ['a', 'b']`
 *   + `['a', ''] + ['b'] -> ['a', 'b']`
 *   + `['a'] + ['', 'b'] -> ['a', 'b']`
 *   + `['a', ''] + ['', 'b'] -> ['a', '', 'b']`
 *
 * Пустые списки и `['']` пропускаются.
 */
function joinPathSegments (...lists: (readonly string[])[]): string[] {
  const finals: string[] = []
  for (const list of lists) {
    if (list.length === 0 || (list.length === 1 && list[0] === '')) {
      continue
    }
    let segments = list
    if (finals.length > 0) {
      if (finals.at(-1) === '' && (segments[0] !== '' || segments.length > 1)) {
        finals.pop()
      }
      else if (finals.at(-1) !== '' && segments[0] === '' && segments.length > 1) {
        segments = segments.slice(1)
      }
    }
    finals.push(...segments)
  }
  return finals
}

function _isSameSegments (a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index])
}

/**
 * Удаляет `remove` с конца `segments`, если хвост совпадает полностью. Иначе возвращает копию `segments`.
 *
 *   + `['', 'a', 'b', 'c'] - ['b', 'c'] -> ['', 'a', '']`
 *   + `['', 'a', 'b', 'c'] - ['', 'b', 'c'] -> ['', 'a']`
 *
 * Список `['']` означает слеш и приравнивается к `['', '']`.
 */
function removePathSegments (segments: readonly string[], remove: readonly string[]): string[] {
  const source = (segments.length === 1 && segments[0] === '') ? ['', ''] : [...segments]
  const target = (remove.length === 1 && remove[0] === '') ? ['', ''] : [...remove]

  if (_isSameSegments(source, target)) {
    return []
  }
  if (target.length > source.length) {
    return source
  }

  const toRemove = (target.length > 1 && target[0] === '') ? target.slice(1) : target
  if (toRemove.length > 0 && _isSameSegments(toRemove, source.slice(source.length - toRemove.length))) {
    const result = source.slice(0, source.length - toRemove.length)
    if (target[0] !== '' && result.length > 0) {
      result.push('')
    }
    return result
  }
  return source
}

/**
 * Нормализация пути по правилам POSIX: сворачивает `.`, `..` и повторные слеши.
 * Ровно два ведущих слеша сохраняются, пустой результат становится `'.'`.
 */
function normpath (path: string): string {
  if (path === '') {
    return '.'
  }
  const initialSlashes = path.startsWith('//') && !path.startsWith('///') ? 2 : path.startsWith('/') ? 1 : 0
  const components: string[] = []
  for (const component of path.split('/')) {
    if (component === '' || component === '.') {
      continue
    }
    if (component !== '..' || (initialSlashes === 0 && components.length === 0) || components.at(-1) === '..') {
      components.push(component)
    }
    else if (components.length > 0) {
      components.pop()
    }
  }
  const normalized = '/'.repeat(initialSlashes) + components.join('/')
  return normalized || '.'
}

/**
 * Путь `URL` или фрагмента как список декодированных сегментов и признак абсолютности.
 *
 * Сегменты хранятся декодированными и кодируются только при сериализации. Путь `/a/b/` имеет сегменты
 * `['a', 'b', '']` и `isAbsolute === true`, последний пустой сегмент означает завершающий слеш.
 */
class Path {
  protected readonly _config: TUrlPartsConfig
  protected _segments: string[] = []
  protected _isAbsolute = false
  protected _absoluteMode: TPathAbsoluteMode = 'mutable'

  constructor(path?: undefined | null | TPathInput, options?: undefined | null | TUrlPartsOptions) {
    this._config = normalizeUrlPartsOptions(options)
    this.load(path)
  }

  get strict (): boolean {
    return this._config.strict
  }

  get absoluteMode (): TPathAbsoluteMode {
    return this._absoluteMode
  }

  /**
   * Устанавливает режим абсолютности. Вызывается владельцем пути при изменении `netloc`.
   */
  _setAbsoluteMode (mode: TPathAbsoluteMode): void {
    this._absoluteMode = mode
  }

  protected _isForced (): boolean {
    return this._absoluteMode === 'forced' && this._segments.length > 0
  }

  /**
   * Декодированные сегменты. Возвращается копия, изменение массива не влияет на путь.
   */
  get segments (): string[] {
    return [...this._segments]
  }

  /**
   * Заменяет сегменты без пересчета абсолютности.
   */
  set segments (segments: readonly string[]) {
    this._segments = [...segments]
  }

  get isAbsolute (): boolean {
    return this._isForced() || this._isAbsolute
  }

  set isAbsolute (value: boolean) {
    if (this._isForced()) {
      const detail = errorDetails.ImmutableStateError('Путь URL с непустым netloc всегда абсолютный, isAbsolute не может быть изменен.')
      detail.value = value
      throw new ImmutableStateError(detail)
    }
    this._isAbsolute = value
  }

  /**
   * Путь пустой или заканчивается слешем.
   */
  get isDir (): boolean {
    return this._segments.length === 0 || this._segments.at(-1) === ''
  }

  get isFile (): boolean {
    return !this.isDir
  }

  isEmpty (): boolean {
    return this._segments.length === 0
  }

  protected _segmentsFromPath (path: string): string[] {
    const segments: string[] = []
    for (const segment of path.split('/')) {
      if (isValidEncodedPathSegment(segment)) {
        segments.push(unquote(segment))
      }
      else {
        // Неверно закодированный сегмент сохраняется буквально
        segments.push(segment)
        if (this._config.strict) {
          warnEncoding(this._config, `Неверно закодированный сегмент ${safeToJson(segment)} в пути ${safeToJson(path)}, ожидалось ${safeToJson(quote(segment, SAFE_SEGMENT_CHARS))}.`)
        }
      }
    }
    return segments
  }

  protected _segmentsFromInput (path: TPathInput): string[] {
    if (path instanceof Path) {
      return path.isAbsolute ? ['', ...path._segments] : [...path._segments]
    }
    if (isArray(path)) {
      return [...path]
    }
    return path === '' ? [] : this._segmentsFromPath(path)
  }

  /**
   * Заменяет путь целиком. Ведущий пустой сегмент строки `/a/b` удаляется и устанавливает {@link isAbsolute}.
   */
  load (path?: undefined | null | TPathInput): this {
    const segments = isNullish(path) ? [] : this._segmentsFromInput(path)
    this._isAbsolute = this._absoluteMode === 'forced'
      ? segments.length > 0
      : segments[0] === ''
    if (this._isAbsolute && segments.length > 1 && segments[0] === '') {
      segments.shift()
    }
    this._segments = segments
    return this
  }

  /**
   * Добавляет сегменты в конец пути по правилам {@link joinPathSegments}.
   */
  add (path: TPathInput): this {
    const added = this._segmentsFromInput(path)
    // Сохраняем ведущий слеш пути `/`, представленного как `['']`
    if (this._segments.length === 1 && this._segments[0] === '' && added.length > 0 && added[0] !== '') {
      added.unshift('')
    }
    const base = [...this._segments]
    if (this.isAbsolute && base.length > 0 && base[0] !== '') {
      base.unshift('')
    }
    return this.load(joinPathSegments(base, added))
  }

  set (path?: undefined | null | TPathInput): this {
    return this.load(path)
  }

  /**
   * Удаляет путь целиком при `true` или совпадающий хвост по правилам {@link removePathSegments}.
   */
  remove (path: true | TPathInput): this {
    if (path === true) {
      return this.load('')
    }
    const removed = this._segmentsFromInput(path)
    const base = this.isAbsolute ? ['', ...this._segments] : [...this._segments]
    return this.load(removePathSegments(base, removed))
  }

  /**
   * Сворачивает `.`, `..` и повторные слеши, сохраняя завершающий слеш. Ведущий `//` заменяется на `/`.
   */
  normalize (): this {
    const encoded = this.toString()
    if (encoded) {
      let normalized = normpath(encoded) + (this.isDir ? '/' : '')
      if (normalized.startsWith('//')) {
        normalized = `/${normalized.replace(/^\/+/, '')}`
      }
      this.load(normalized)
    }
    return this
  }

  /**
   * Копия пути с теми же опциями и режимом абсолютности.
   */
  copy (): Path {
    const path = new Path(null, this._config)
    path._absoluteMode = this._absoluteMode
    path._segments = [...this._segments]
    path._isAbsolute = this._isAbsolute
    return path
  }

  equals (other: unknown): boolean {
    return other instanceof Path &&
      other.isAbsolute === this.isAbsolute &&
      _isSameSegments(other._segments, this._segments)
  }

  toJSON (): TPathJson {
    return {
      encoded: this.toString(),
      isDir: this.isDir,
      isFile: this.isFile,
      isAbsolute: this.isAbsolute,
      segments: this.segments
    }
  }

  /**
   * Закодированная строка пути.
   */
  toString (): string {
    let segments = this._segments
    if (this.isAbsolute) {
      segments = segments.length === 0 ? ['', ''] : ['', ...segments]
    }
    return segments.map((segment) => quote(segment, SAFE_SEGMENT_CHARS)).join('/')
  }
}

export {
  SAFE_SEGMENT_CHARS,
  type TPathAbsoluteMode,
  type TPathInput,
  type TPathJson,
  joinPathSegments,
  removePathSegments,
  normpath,
  Path
}
