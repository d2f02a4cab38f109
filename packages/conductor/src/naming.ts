/**
 * Model naming derived from a class name, in the shape form builders and
 * routers expect.
 */

export interface ModelName {
  /** The class name as written. */
  readonly name: string
  /** `SignupConductor` → `signup_conductor` */
  readonly singular: string
  /** `signup_conductors` */
  readonly plural: string
  /** Key under which form parameters are nested. */
  readonly paramKey: string
  /** Plural route segment; `_index` is appended when singular and plural coincide. */
  readonly routeKey: string
  /** `Signup conductor` */
  readonly human: string
}

const FALLBACK_NAME = 'Conductor'

const UNCOUNTABLE = new Set(['equipment', 'information', 'rice', 'money', 'species', 'series', 'fish', 'sheep', 'data'])

export function underscore(name: string): string {
  return name
    .replace(/([A-Z\d]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .replace(/-/g, '_')
    .toLowerCase()
}

export function pluralize(word: string): string {
  if (word === '' || UNCOUNTABLE.has(word.slice(word.lastIndexOf('_') + 1))) {
    return word
  }
  if (/(?:s|x|z|ch|sh)$/.test(word)) {
    return `${word}es`
  }
  if (/[^aeiou]y$/.test(word)) {
    return `${word.slice(0, -1)}ies`
  }
  return `${word}s`
}

export function humanize(name: string): string {
  const words = underscore(name).replace(/_id$/, '').replace(/_/g, ' ').trim()
  return words.charAt(0).toUpperCase() + words.slice(1)
}

/**
 * Naming for a conductor class. Anonymous classes are named `Conductor`.
 *
 * @example
 * ```typescript
 * modelNameFor(SignupConductor).paramKey // 'signup_conductor'
 * modelNameFor(SignupConductor).routeKey // 'signup_conductors'
 * ```
 */
export function modelNameFor(type: { readonly name: string }): ModelName {
  const name = type.name || FALLBACK_NAME
  const singular = underscore(name)
  const plural = pluralize(singular)

  return Object.freeze({
    name,
    singular,
    plural,
    paramKey: singular,
    routeKey: singular === plural ? `${plural}_index` : plural,
    human: humanize(name)
  })
}
