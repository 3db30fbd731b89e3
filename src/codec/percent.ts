const _unreserved = /^[A-Za-z0-9_.\-~]$/
const _escapes = /(?:%[0-9A-Fa-f]{2})+/g
const _plus = /\+/g
const _space = / /g
const re = Object.freeze({
  get unreserved () {
    _unreserved.lastIndex = 0
    return _unreserved
  },
  get escapes () {
    _escapes.lastIndex = 0
    return _escapes
  },
  get plus () {
    _plus.lastIndex = 0
    return _plus
  },
  get space () {
    _space.lastIndex = 0
    return _space
  }
} as const)

const _encoder = new TextEncoder()
const _decoder = new TextDecoder('utf-8')

function _hex (byte: number): string {
  return `%${byte.toString(16).toUpperCase().padStart(2, '0')}`
}

/**
 * Процентное кодирование строки в UTF-8.
 *
 * Буквы, цифры и `_.-~` никогда не кодируются. Символы `safe` остаются как есть, все прочие, включая `%`,
 * заменяются на `%XX` в верхнем регистре.
 *
 * @param value Исходная строка.
 * @param safe  Дополнительные символы, которые не нужно кодировать.
 */
function quote (value: string, safe: string = ''): string {
  let result = ''
  for (const char of value) {
    if (re.unreserved.test(char) || (char !== '%' && safe.includes(char))) {
      result += char
    }
    else {
      for (const byte of _encoder.encode(char)) {
        result += _hex(byte)
      }
    }
  }
  return result
}

/**
 * Как {@link quote}, но пробел кодируется как `+`.
 */
function quotePlus (value: string, safe: string = ''): string {
  if (!value.includes(' ')) {
    return quote(value, safe)
  }
  return quote(value, `${safe} `).replace(re.space, '+')
}

/**
 * Декодирует последовательности `%XX`. Неверные последовательности, например `%zz` или одиночный `%`, остаются без изменений.
 */
function unquote (value: string): string {
  if (!value.includes('%')) {
    return value
  }
  return value.replace(re.escapes, (escaped) => {
    const bytes = new Uint8Array(escaped.length / 3)
    for (let i = 0; i < bytes.length; ++i) {
      bytes[i] = Number.parseInt(escaped.slice(i * 3 + 1, i * 3 + 3), 16)
    }
    return _decoder.decode(bytes)
  })
}

/**
 * Как {@link unquote}, но предварительно заменяет `+` на пробел.
 */
function unquotePlus (value: string): string {
  return unquote(value.replace(re.plus, ' '))
}

export {
  quote,
  quotePlus,
  unquote,
  unquotePlus
}
