import defaultPorts from './defaultPorts.json' with { type: 'json' }

const _defaultPorts: ReadonlyMap<string, number> = new Map(Object.entries(defaultPorts))

/**
 * Схемы, после которых следует только двоеточие `mailto:user@host`, без `//`.
 */
const COLON_SEPARATED_SCHEMES: ReadonlySet<string> = new Set([
  'about', 'bitcoin', 'data', 'geo', 'javascript', 'mailto', 'news',
  'sip', 'sips', 'sms', 'smsto', 'tel', 'urn'
])

/**
 * Зарегистрированный порт по умолчанию для схемы или `null`.
 *
 * @param scheme Схема в любом регистре.
 */
function defaultPortOf (scheme: undefined | null | string): null | number {
  if (!scheme) {
    return null
  }
  return _defaultPorts.get(scheme.toLowerCase()) ?? null
}

/**
 * Является ли схема разделяемой одним двоеточием, как `mailto:` или `tel:`.
 */
function isColonSeparatedScheme (scheme: undefined | null | string): boolean {
  return !!scheme && COLON_SEPARATED_SCHEMES.has(scheme.toLowerCase())
}

export {
  COLON_SEPARATED_SCHEMES,
  defaultPortOf,
  isColonSeparatedScheme
}
