import type { UOptional } from './types.js'
import { type UrlPartsWarning, errorDetails, ConflictWarning, EncodingWarning } from './errors.js'

/**
 * Обработчик предупреждений {@link ConflictWarning} и {@link EncodingWarning}.
 */
type TWarningHandler = (warning: UrlPartsWarning) => void

/**
 * Опции компонентов `URL`.
 */
type TUrlPartsConfig = {
  /**
   * Сообщать {@link EncodingWarning} для неверно закодированных сегментов пути, ключей и значений запроса.
   * Дополнительно включает строгую проверку меток хоста. По умолчанию `false`.
   */
  readonly strict: boolean
  /**
   * Получатель предупреждений. По умолчанию {@link consoleWarningHandler}.
   */
  readonly onWarning: TWarningHandler
}

/**
 * Пользовательские опции. Отсутствующие поля получат значения по умолчанию.
 */
type TUrlPartsOptions = UOptional<TUrlPartsConfig>

/**
 * Выводит предупреждение в консоль с префиксом имени: `[UrlParts.ConflictWarning] ...`.
 */
function consoleWarningHandler (warning: UrlPartsWarning): void {
  console.warn(`[${warning.detail.name}] ${warning.detail.message ?? ''}`)
}

/**
 * Нормализует опции, возвращая замороженный объект с пользовательскими или дефолтными значениями.
 *
 * @param options Опции или уже нормализованная конфигурация.
 */
function normalizeUrlPartsOptions (options?: undefined | null | TUrlPartsOptions): TUrlPartsConfig {
  return Object.freeze({
    strict: options?.strict === true,
    onWarning: (typeof options?.onWarning === 'function') ? options.onWarning : consoleWarningHandler
  })
}

function warnConflict (config: TUrlPartsConfig, message: string): void {
  config.onWarning(new ConflictWarning(errorDetails.ConflictWarning(message)))
}

function warnEncoding (config: TUrlPartsConfig, message: string): void {
  config.onWarning(new EncodingWarning(errorDetails.EncodingWarning(message)))
}

export {
  type TWarningHandler,
  type TUrlPartsConfig,
  type TUrlPartsOptions,
  consoleWarningHandler,
  normalizeUrlPartsOptions,
  warnConflict,
  warnEncoding
}
