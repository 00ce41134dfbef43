import { PipelineError } from 'shared'
import type { LocaleDuplication } from 'shared'

// Platform qualifier forms: `en`, `en-rUS`, `b+sr+Latn`, `b+es+419`.
const LEGACY_QUALIFIER = /^([a-z]{2,3})(?:-r([A-Z]{2}))?$/
const EXTENDED_QUALIFIER = /^b\+([a-z]{2,3})((?:\+[A-Za-z0-9]+)*)$/

// Canonical tag form: `en`, `en-US`, `sr-Latn`, `es-419`.
const LANGUAGE_TAG = /^([a-z]{2,3})(?:-([A-Z][a-z]{3}))?(?:-([A-Z]{2}|[0-9]{3}))?$/

const SCRIPT_SUBTAG = /^[A-Z][a-z]{3}$/
const REGION_SUBTAG = /^(?:[A-Z]{2}|[0-9]{3})$/

/** Older platform releases only understand the withdrawn ISO 639-1 codes. */
const LEGACY_LANGUAGE_CODES: Record<string, string> = {
  he: 'iw',
  id: 'in',
  yi: 'ji',
}

const LEGACY_LOCALE_EXCEPTIONS: Record<string, string> = {
  'es-419': 'es-rUS',
}

/** `no` is a macrolanguage; resources for it are served as Bokmål. */
const MACROLANGUAGE_PRINCIPALS: Record<string, string> = {
  no: 'nb',
}

const TWO_LETTER_CODES: Record<string, string> = {
  fil: 'tl',
}

const QUALIFIER_LANGUAGE_TO_TAG: Record<string, string> = {
  tl: 'fil',
  in: 'id',
  iw: 'he',
  ji: 'yi',
  no: 'nb',
}

const QUALIFIER_TO_TAG_EXCEPTIONS: Record<string, string> = {
  'es-rUS': 'es-419',
}

export function isLocaleQualifier(value: string): boolean {
  return LEGACY_QUALIFIER.test(value) || EXTENDED_QUALIFIER.test(value)
}

export function isLanguageTag(value: string): boolean {
  return LANGUAGE_TAG.test(value)
}

/**
 * Convert a platform locale qualifier into a language tag.
 * Returns null for qualifiers that have no supported tag equivalent.
 */
export function toLanguageTag(qualifier: string): string | null {
  const exception = QUALIFIER_TO_TAG_EXCEPTIONS[qualifier]
  if (exception) return exception

  const legacy = qualifier.match(LEGACY_QUALIFIER)
  if (legacy) {
    const language = QUALIFIER_LANGUAGE_TO_TAG[legacy[1]] ?? legacy[1]
    return legacy[2] ? `${language}-${legacy[2]}` : language
  }

  const extended = qualifier.match(EXTENDED_QUALIFIER)
  if (!extended) return null

  const language = QUALIFIER_LANGUAGE_TO_TAG[extended[1]] ?? extended[1]
  const subtags = extended[2].split('+').filter(s => s.length > 0)
  let script: string | undefined
  let region: string | undefined
  for (const subtag of subtags) {
    if (!script && !region && SCRIPT_SUBTAG.test(subtag)) {
      script = subtag
    } else if (!region && REGION_SUBTAG.test(subtag)) {
      region = subtag
    } else {
      return null
    }
  }
  return [language, script, region].filter((s): s is string => s !== undefined).join('-')
}

/**
 * Convert a language tag into the platform's canonical locale qualifier.
 *
 * Rules apply in priority order: legacy-code exceptions, the macrolanguage
 * principal, three-letter collapsing, then re-expression of the tag (scripts
 * and numeric regions need the `b+` form).
 */
export function toLocaleQualifier(tag: string): string | null {
  const exception = LEGACY_LOCALE_EXCEPTIONS[tag]
  if (exception) return exception

  const match = tag.match(LANGUAGE_TAG)
  if (!match) return null
  const [, rawLanguage, script, region] = match

  const language =
    LEGACY_LANGUAGE_CODES[rawLanguage] ??
    MACROLANGUAGE_PRINCIPALS[rawLanguage] ??
    TWO_LETTER_CODES[rawLanguage] ??
    rawLanguage

  if (script || (region && /^[0-9]/.test(region))) {
    return ['b', language, script, region].filter((s): s is string => s !== undefined).join('+')
  }
  return region ? `${language}-r${region}` : language
}

/**
 * Canonical form of an observed qualifier, or null when it is unsupported.
 */
export function canonicalQualifier(qualifier: string): string | null {
  const tag = toLanguageTag(qualifier)
  return tag === null ? null : toLocaleQualifier(tag)
}

/**
 * Expand an allow-list (tags or qualifiers) into the platform qualifiers to keep.
 * Every entry also keeps its bare-language fallback. Entries that only have a
 * `b+` qualifier form are not supported.
 */
export function toPlatformLocales(entries: string[], duplication?: LocaleDuplication): Set<string> {
  const locales = new Set<string>()
  for (const entry of entries) {
    const tag = isLanguageTag(entry) ? entry : toLanguageTag(entry)
    const qualifier = tag === null ? null : toLocaleQualifier(tag)
    if (qualifier === null || qualifier.startsWith('b+')) {
      throw new PipelineError('ConfigurationContradiction', `Unsupported locale name: ${entry}`)
    }
    locales.add(qualifier)
    locales.add(qualifier.split('-')[0])
  }

  if (duplication) {
    locales.add(duplication.to)
  }
  return locales
}
