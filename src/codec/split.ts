import { isColonSeparatedScheme } from './schemes.js'
import { isValidScheme } from './validators.js'

const _schemeEnd = /[:/?#]/
const _reference = /^(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#([\s\S]*))?$/
const _firstSegment = /^\/?[^/]*/
const re = Object.freeze({
  get schemeEnd () {
    _schemeEnd.lastIndex = 0
    return _schemeEnd
  },
  get reference () {
    _reference.lastIndex = 0
    return _reference
  },
  get firstSegment () {
    _firstSegment.lastIndex = 0
    return _firstSegment
  }
} as const)

/**
 * Пять синтаксических частей `URL`.
 *
 * Значение `null` означает отсутствие разделителя, пустая строка - разделитель без содержимого:
 * `netloc` равен `null` для `mailto:a` и `''` для `file:///a`, `query` равен `null` для `/a` и `''` для `/a?`.
 */
type TSplitUrl = {
  scheme: null | string
  netloc: null | string
  path: string
  query: null | string
  fragment: null | string
}

/**
 * Извлекает схему без изменения регистра.
 *
 * Схема определяется грамматикой, а не списком известных схем, поэтому `custom://a/b?c#d` разбирается так же, как `http`.
 * Строка с ведущим двоеточием `:a` имеет пустую схему `''`.
 *
 * @returns Схему или `null`, если ее нет.
 */
function getScheme (url: string): null | string {
  if (url.startsWith(':')) {
    return ''
  }
  const match = re.schemeEnd.exec(url)
  if (!match || match[0] !== ':') {
    return null
  }
  const scheme = url.slice(0, match.index)
  return isValidScheme(scheme) ? scheme : null
}

/**
 * Удаляет схему и следующее за ней двоеточие. Двойной слеш `//` остается.
 */
function stripScheme (url: string): string {
  const scheme = getScheme(url)
  return scheme === null ? url : url.slice(scheme.length + 1)
}

/**
 * Заменяет схему строки.
 *
 * Для схем вида `mailto:` ставится одно двоеточие, для остальных `scheme://`, если строка еще не начинается с `//`.
 *
 * @param url    Исходная строка.
 * @param scheme Новая схема или `null` для удаления.
 */
function setScheme (url: string, scheme: null | string): string {
  const rest = stripScheme(url)
  if (scheme === null) {
    return rest
  }
  if (scheme === '' || isColonSeparatedScheme(scheme) || rest.startsWith('//')) {
    return `${scheme}:${rest}`
  }
  return `${scheme}://${rest}`
}

/**
 * Разбивает строку на пять частей одинаково для любой схемы.
 */
function splitUrl (url: string): TSplitUrl {
  const scheme = getScheme(url)
  const rest = scheme === null ? url : url.slice(scheme.length + 1)
  const match = re.reference.exec(rest)
  return {
    scheme,
    netloc: match?.[1] ?? null,
    path: match?.[2] ?? '',
    query: match?.[3] ?? null,
    fragment: match?.[4] ?? null
  }
}

/**
 * Собирает строку из частей, обратная операция {@link splitUrl}.
 */
function unsplitUrl ({ scheme, netloc, path, query, fragment }: TSplitUrl): string {
  let url = ''
  if (scheme !== null) {
    url += `${scheme}:`
  }
  if (netloc !== null) {
    url += `//${netloc}`
  }
  url += path
  if (query !== null) {
    url += `?${query}`
  }
  if (fragment !== null) {
    url += `#${fragment}`
  }
  return url
}

/**
 * Удаляет сегменты `.` и `..` из пути по алгоритму RFC 3986 5.2.4.
 */
function removeDotSegments (path: string): string {
  const output: string[] = []
  let input = path
  while (input.length > 0) {
    if (input.startsWith('../')) {
      input = input.slice(3)
    }
    else if (input.startsWith('./')) {
      input = input.slice(2)
    }
    else if (input.startsWith('/./')) {
      input = input.slice(2)
    }
    else if (input === '/.') {
      input = '/'
    }
    else if (input.startsWith('/../')) {
      input = input.slice(3)
      output.pop()
    }
    else if (input === '/..') {
      input = '/'
      output.pop()
    }
    else if (input === '.' || input === '..') {
      input = ''
    }
    else {
      const segment = re.firstSegment.exec(input)?.[0] ?? input
      output.push(segment)
      input = input.slice(segment.length)
    }
  }
  return output.join('')
}

function _mergePaths (base: TSplitUrl, relPath: string): string {
  if (base.netloc !== null && base.path === '') {
    return `/${relPath}`
  }
  return `${base.path.slice(0, base.path.lastIndexOf('/') + 1)}${relPath}`
}

/**
 * Разрешает относительную ссылку `rel` относительно `base` по алгоритму RFC 3986 5.2.2.
 */
function resolveReference (base: TSplitUrl, rel: TSplitUrl): TSplitUrl {
  if (rel.scheme !== null) {
    return { ...rel, path: removeDotSegments(rel.path) }
  }
  if (rel.netloc !== null) {
    return { ...rel, scheme: base.scheme, path: removeDotSegments(rel.path) }
  }
  if (rel.path === '') {
    return {
      scheme: base.scheme,
      netloc: base.netloc,
      path: base.path,
      query: rel.query ?? base.query,
      fragment: rel.fragment
    }
  }
  return {
    scheme: base.scheme,
    netloc: base.netloc,
    path: removeDotSegments(rel.path.startsWith('/') ? rel.path : _mergePaths(base, rel.path)),
    query: rel.query,
    fragment: rel.fragment
  }
}

/**
 * Объединяет базовый адрес и ссылку: `joinUrl('http://a/b/c', '../d') -> 'http://a/d'`.
 */
function joinUrl (base: string, rel: string): string {
  return unsplitUrl(resolveReference(splitUrl(base), splitUrl(rel)))
}

export {
  type TSplitUrl,
  getScheme,
  stripScheme,
  setScheme,
  splitUrl,
  unsplitUrl,
  removeDotSegments,
  resolveReference,
  joinUrl
}
