const _scheme = /^[a-zA-Z][a-zA-Z0-9+\-.]*$/
const _pathSegment = /^(?:[\w\-.~:@!$&'()*+,;=]|%[\da-fA-F]{2})*$/
const _queryKey = /^(?:[\w\-.~:@!$&'()*+,;/?]|%[\da-fA-F]{2})*$/
const _queryValue = /^(?:[\w\-.~:@!$&'()*+,;/?=]|%[\da-fA-F]{2})*$/
const _invalidHostChars = /[!@#$%^&'"*()+=:;/]/
const _strictHostLabel = /^[\p{L}\p{N}_-]+$/u
const _digits = /^\d+$/
const re = Object.freeze({
  get scheme () {
    _scheme.lastIndex = 0
    return _scheme
  },
  get pathSegment () {
    _pathSegment.lastIndex = 0
    return _pathSegment
  },
  get queryKey () {
    _queryKey.lastIndex = 0
    return _queryKey
  },
  get queryValue () {
    _queryValue.lastIndex = 0
    return _queryValue
  },
  get invalidHostChars () {
    _invalidHostChars.lastIndex = 0
    return _invalidHostChars
  },
  get strictHostLabel () {
    _strictHostLabel.lastIndex = 0
    return _strictHostLabel
  },
  get digits () {
    _digits.lastIndex = 0
    return _digits
  }
} as const)

/**
 * Схема `ALPHA *( ALPHA / DIGIT / "+" / "-" / "." )`.
 */
function isValidScheme (scheme: string): boolean {
  return re.scheme.test(scheme)
}

/**
 * Закодированный сегмент пути: только допустимые символы и корректные `%XX`.
 */
function isValidEncodedPathSegment (segment: string): boolean {
  return re.pathSegment.test(segment)
}

function isValidEncodedQueryKey (key: string): boolean {
  return re.queryKey.test(key)
}

function isValidEncodedQueryValue (value: string): boolean {
  return re.queryValue.test(value)
}

function _hostLabels (host: string): string[] {
  const labels = host.split('.')
  // Завершающая точка полного доменного имени `example.com.`
  if (labels.at(-1) === '') {
    labels.pop()
  }
  return labels
}

/**
 * Базовая проверка хоста, которая действует всегда: нет запрещенных символов `!@#$%^&'"*()+=:;/` и пустых меток.
 * Пустой хост допустим.
 */
function isValidHost (host: string): boolean {
  for (const label of _hostLabels(host)) {
    if (label.length === 0 || re.invalidHostChars.test(label)) {
      return false
    }
  }
  return true
}

/**
 * Строгая проверка хоста: каждая метка состоит из букв, цифр, дефисов и подчеркиваний.
 */
function isStrictValidHost (host: string): boolean {
  for (const label of _hostLabels(host)) {
    if (!re.strictHostLabel.test(label)) {
      return false
    }
  }
  return true
}

/**
 * Целое число или строка из цифр в диапазоне `1-65535`.
 */
function isValidPort (port: unknown): port is (number | string) {
  let value: number
  if (typeof port === 'number') {
    value = port
  }
  else if (typeof port === 'string' && re.digits.test(port)) {
    value = Number.parseInt(port, 10)
  }
  else {
    return false
  }
  return Number.isInteger(value) && value >= 1 && value <= 65535
}

/**
 * Похожа ли строка на литерал IPv6 в квадратных скобках `[::1]`.
 */
function resemblesIpv6Literal (host: string): boolean {
  return host.startsWith('[') && host.endsWith(']') && host.includes(':')
}

export {
  isValidScheme,
  isValidEncodedPathSegment,
  isValidEncodedQueryKey,
  isValidEncodedQueryValue,
  isValidHost,
  isStrictValidHost,
  isValidPort,
  resemblesIpv6Literal
}
