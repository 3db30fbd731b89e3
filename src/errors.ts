import {
  type IErrorDetail as IErrorDetail_,
  type IErrorLike as IErrorLike_,
  BaseError,
  createErrorLike
} from 'js-base-error'

const _errorNames = [
  'UrlParts.InvalidPortError', 'UrlParts.InvalidAuthorityError', 'UrlParts.InvalidHostError',
  'UrlParts.InvalidSchemeError', 'UrlParts.ImmutableStateError',
  'UrlParts.ConflictWarning', 'UrlParts.EncodingWarning'
] as const

type TErrorName = (typeof _errorNames)[number] // 'UrlParts.InvalidPortError' | 'UrlParts.InvalidAuthorityError' | 'UrlParts.InvalidHostError' | 'UrlParts.InvalidSchemeError' | 'UrlParts.ImmutableStateError' | 'UrlParts.ConflictWarning' | 'UrlParts.EncodingWarning'

/**
 * Проверяет, является ли имя ошибки допустимым.
 *
 * @param name Предполагаемое имя ошибки.
 */
function isErrorName (name: unknown): name is TErrorName {
  return (_errorNames as readonly unknown[]).includes(name)
}

/**
 * Детали ошибки с кодом и описанием.
 */
interface IErrorDetail extends IErrorDetail_ {
  /**
   * Значение, которое не прошло проверку: порт, хост, строка `netloc` или схема.
   */
  value?: unknown
}

/**
 * Базовый интерфейс деталей ошибок.
 */
interface IErrorLike extends IErrorLike_, IErrorDetail {
  value?: unknown
}

/**
 * Предопределенные описания ошибок и предупреждений.
 */
const errorDetails = Object.freeze({
  InvalidPortError (message?: undefined | null | string, cause?: undefined | null | unknown): IErrorLike {
    return createErrorLike({
      name: 'UrlParts.InvalidPortError',
      message,
      cause
    })
  },
  InvalidAuthorityError (message?: undefined | null | string, cause?: undefined | null | unknown): IErrorLike {
    return createErrorLike({
      name: 'UrlParts.InvalidAuthorityError',
      message,
      cause
    })
  },
  InvalidHostError (message?: undefined | null | string, cause?: undefined | null | unknown): IErrorLike {
    return createErrorLike({
      name: 'UrlParts.InvalidHostError',
      message,
      cause
    })
  },
  InvalidSchemeError (message?: undefined | null | string, cause?: undefined | null | unknown): IErrorLike {
    return createErrorLike({
      name: 'UrlParts.InvalidSchemeError',
      message,
      cause
    })
  },
  ImmutableStateError (message?: undefined | null | string, cause?: undefined | null | unknown): IErrorLike {
    return createErrorLike({
      name: 'UrlParts.ImmutableStateError',
      message,
      cause
    })
  },
  ConflictWarning (message?: undefined | null | string): IErrorLike {
    return createErrorLike({
      name: 'UrlParts.ConflictWarning',
      message
    })
  },
  EncodingWarning (message?: undefined | null | string): IErrorLike {
    return createErrorLike({
      name: 'UrlParts.EncodingWarning',
      message
    })
  }
} as const)

/**
 * Базовый класс ошибок.
 */
abstract class UrlPartsError extends BaseError<IErrorLike> { }

/**
 * Порт не является целым числом в диапазоне `1-65535`.
 *
 * Ошибка никогда не оставляет компонент в частично измененном состоянии.
 */
class InvalidPortError extends UrlPartsError { }

/**
 * Неверная структура `netloc`, например незакрытая скобка литерала IPv6 `[::1`.
 */
class InvalidAuthorityError extends UrlPartsError { }

/**
 * Хост содержит недопустимые символы или пустые метки `a..b`.
 */
class InvalidHostError extends UrlPartsError { }

/**
 * Схема не соответствует грамматике `ALPHA *( ALPHA / DIGIT / "+" / "-" / "." )`.
 */
class InvalidSchemeError extends UrlPartsError { }

/**
 * Попытка изменить `Path.isAbsolute`, когда абсолютность пути задана владельцем.
 *
 * Путь `URL` с непустым `netloc` всегда абсолютный.
 */
class ImmutableStateError extends UrlPartsError { }

/**
 * Базовый класс предупреждений.
 *
 * Предупреждения не выбрасываются, а передаются обработчику {@link TUrlPartsOptions.onWarning}.
 */
abstract class UrlPartsWarning extends UrlPartsError { }

/**
 * Пересекающиеся параметры в одном вызове `Url.set()` или `Url.add()`.
 *
 * Операция все равно выполняется: более узкий параметр применяется последним.
 */
class ConflictWarning extends UrlPartsWarning { }

/**
 * Строка сегмента пути, ключа или значения запроса не соответствует ожидаемому процентному кодированию.
 * Выдается только в режиме `strict`.
 */
class EncodingWarning extends UrlPartsWarning { }

export {
  type TErrorName,
  isErrorName,
  type IErrorDetail,
  type IErrorLike,
  errorDetails,
  UrlPartsError,
  // Ошибки
  InvalidPortError,
  InvalidAuthorityError,
  InvalidHostError,
  InvalidSchemeError,
  ImmutableStateError,
  // Предупреждения
  UrlPartsWarning,
  ConflictWarning,
  EncodingWarning
}
