import { domainToASCII, domainToUnicode } from 'node:url'
import { errorDetails, InvalidAuthorityError, InvalidHostError, InvalidPortError } from '../errors.js'
import { type TUrlPartsOptions, type TUrlPartsConfig, normalizeUrlPartsOptions } from '../options.js'
import { safeToJson } from '../utils.js'
import { quote, unquote } from '../codec/percent.js'
import { isValidHost, isStrictValidHost, isValidPort, resemblesIpv6Literal } from '../codec/validators.js'

/**
 * Части строки `netloc` до проверки. Порт остается строкой.
 */
type TNetlocParts = {
  username: null | string
  password: null | string
  host: null | string
  port: null | string
}

type TAuthorityJson = {
  username: null | string
  password: null | string
  host: null | string
  port: null | number
}

const _nonAscii = /[^\x00-\x7F]/
const re = Object.freeze({
  get nonAscii () {
    _nonAscii.lastIndex = 0
    return _nonAscii
  }
} as const)

function _throwInvalidAuthority (message: string, value: string): never {
  const detail = errorDetails.InvalidAuthorityError(message)
  detail.value = value
  throw new InvalidAuthorityError(detail)
}

/**
 * Разбирает `userinfo@host:port` без проверки хоста и порта.
 *
 * Учетные данные отделяются по последнему `@` и декодируются. Для литерала IPv6 `[::1]:80` порт допустим
 * только сразу после `]`, иначе порт отделяется по последнему `:`.
 */
function parseNetloc (netloc: string): TNetlocParts {
  const parts: TNetlocParts = { username: null, password: null, host: null, port: null }
  let rest = netloc
  const at = netloc.lastIndexOf('@')
  if (at >= 0) {
    const userinfo = netloc.slice(0, at)
    rest = netloc.slice(at + 1)
    const colon = userinfo.indexOf(':')
    if (colon < 0) {
      parts.username = unquote(userinfo)
    }
    else {
      parts.username = unquote(userinfo.slice(0, colon))
      parts.password = unquote(userinfo.slice(colon + 1))
    }
  }

  const open = rest.indexOf('[')
  const close = rest.indexOf(']')
  if (open >= 0 || close >= 0) {
    if (open !== 0 || close < 0 || rest.lastIndexOf('[') !== 0 || rest.lastIndexOf(']') !== close) {
      _throwInvalidAuthority(`Неверные скобки литерала IPv6 в netloc ${safeToJson(netloc)}.`, netloc)
    }
    parts.host = rest.slice(0, close + 1)
    const after = rest.slice(close + 1)
    if (after.startsWith(':')) {
      parts.port = after.slice(1)
    }
    else if (after !== '') {
      _throwInvalidAuthority(`После литерала IPv6 допустим только порт, netloc ${safeToJson(netloc)}.`, netloc)
    }
  }
  else {
    const colon = rest.lastIndexOf(':')
    if (colon < 0) {
      parts.host = rest
    }
    else {
      parts.host = rest.slice(0, colon)
      parts.port = rest.slice(colon + 1)
    }
  }
  return parts
}

/**
 * Учетные данные, хост и явный порт `URL`.
 *
 * Хост хранится в нижнем регистре, метки `xn--` декодируются в Unicode. Порт по умолчанию для схемы не хранится
 * здесь: его учитывает владелец при сборке {@link netloc}.
 */
class Authority {
  protected readonly _config: TUrlPartsConfig
  protected _username: null | string = null
  protected _password: null | string = null
  protected _host: null | string = null
  protected _port: null | number = null

  constructor(netloc?: undefined | null | string, options?: undefined | null | TUrlPartsOptions) {
    this._config = normalizeUrlPartsOptions(options)
    this.load(netloc)
  }

  get username (): null | string {
    return this._username
  }

  set username (username: undefined | null | string) {
    this._username = username ?? null
  }

  get password (): null | string {
    return this._password
  }

  set password (password: undefined | null | string) {
    this._password = password ?? null
  }

  get host (): null | string {
    return this._host
  }

  /**
   * @throws {InvalidHostError} Запрещенные символы или пустые метки.
   * @throws {InvalidAuthorityError} Неверные скобки литерала IPv6.
   */
  set host (host: undefined | null | string) {
    this._host = this._normalizeHost(host ?? null)
  }

  /**
   * Явно заданный порт или `null`.
   */
  get port (): null | number {
    return this._port
  }

  /**
   * @throws {InvalidPortError} Порт не является целым числом `1-65535`.
   */
  set port (port: undefined | null | number | string) {
    this._port = this._normalizePort(port ?? null)
  }

  protected _normalizePort (port: null | number | string): null | number {
    if (port === null || port === '') {
      return null
    }
    if (!isValidPort(port)) {
      const detail = errorDetails.InvalidPortError(`Порт ${safeToJson(port)} не является целым числом в диапазоне 1-65535.`)
      detail.value = port
      throw new InvalidPortError(detail)
    }
    return typeof port === 'number' ? port : Number.parseInt(port, 10)
  }

  protected _normalizeHost (host: null | string): null | string {
    if (host === null) {
      return null
    }
    const lower = host.toLowerCase()
    if (lower.includes('[') || lower.includes(']')) {
      if (!resemblesIpv6Literal(lower) || lower.lastIndexOf('[') !== 0 || lower.indexOf(']') !== lower.length - 1) {
        _throwInvalidAuthority(`Неверный литерал IPv6 ${safeToJson(host)}.`, host)
      }
      return lower
    }
    if (!isValidHost(lower) || (this._config.strict && !isStrictValidHost(lower))) {
      const detail = errorDetails.InvalidHostError(`Недопустимый хост ${safeToJson(host)}.`)
      detail.value = host
      throw new InvalidHostError(detail)
    }
    if (lower.split('.').some((label) => label.startsWith('xn--'))) {
      return domainToUnicode(lower) || lower
    }
    return lower
  }

  /**
   * Заменяет все части разбором `netloc`. Значение `null` очищает их.
   *
   * Порт и хост проверяются до присваивания, при ошибке состояние не меняется.
   */
  load (netloc?: undefined | null | string): this {
    if (netloc === undefined || netloc === null) {
      this._username = this._password = this._host = null
      this._port = null
      return this
    }
    const { username, password, host, port } = parseNetloc(netloc)
    const normalizedPort = this._normalizePort(port)
    const normalizedHost = this._normalizeHost(host)
    this._port = normalizedPort
    this._host = normalizedHost
    this._username = username
    this._password = password
    return this
  }

  /**
   * Строка `userinfo@host:port` или `null`, если нет ни хоста, ни учетных данных, ни порта.
   * Пустой хост дает пустую строку.
   *
   * @param defaultPort Порт схемы по умолчанию, который не выводится.
   */
  netloc (defaultPort: null | number = null): null | string {
    let userinfo = ''
    if (this._username !== null || this._password !== null) {
      userinfo = quote(this._username ?? '')
      if (this._password !== null) {
        userinfo += `:${quote(this._password)}`
      }
      userinfo += '@'
    }
    const netloc = `${userinfo}${this.hostPort(defaultPort)}`
    return (netloc || this._host === '') ? netloc : null
  }

  /**
   * Хост в ASCII и порт, если он отличается от `defaultPort`: `example.com:8080`.
   */
  hostPort (defaultPort: null | number = null): string {
    let hostPort = this._host === null ? '' : this._encodedHost(this._host)
    if (this._port !== null && this._port !== defaultPort) {
      hostPort += `:${this._port}`
    }
    return hostPort
  }

  protected _encodedHost (host: string): string {
    if (!re.nonAscii.test(host) || resemblesIpv6Literal(host)) {
      return host
    }
    return domainToASCII(host) || quote(host)
  }

  copy (): Authority {
    const authority = new Authority(null, this._config)
    authority._username = this._username
    authority._password = this._password
    authority._host = this._host
    authority._port = this._port
    return authority
  }

  equals (other: unknown): boolean {
    return other instanceof Authority &&
      other._username === this._username &&
      other._password === this._password &&
      other._host === this._host &&
      other._port === this._port
  }

  toJSON (): TAuthorityJson {
    return {
      username: this._username,
      password: this._password,
      host: this._host,
      port: this._port
    }
  }
}

export {
  type TNetlocParts,
  type TAuthorityJson,
  parseNetloc,
  Authority
}
