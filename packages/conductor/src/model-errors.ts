/**
 * Error collection keyed by field name.
 *
 * Each field maps to its messages in the order they were added. Fields keep
 * their first-insertion order.
 */

import { humanize } from './naming.js'

/**
 * Anything a sub-model may hand back from `errors()`: a {@link ModelErrors},
 * any iterable of `[field, messages]` pairs, or a plain record.
 */
export type ErrorSource =
  | Iterable<readonly [string, readonly string[]]>
  | Readonly<Record<string, readonly string[]>>

/** Field name used for errors that belong to the model as a whole. */
export const BASE_FIELD = 'base'

function isIterableSource(
  source: ErrorSource
): source is Iterable<readonly [string, readonly string[]]> {
  return Symbol.iterator in source
}

/**
 * Visit every `(field, message)` pair of an error source, in order.
 */
export function forEachError(
  source: ErrorSource,
  callback: (field: string, message: string) => void
): void {
  const pairs = isIterableSource(source) ? source : Object.entries(source)
  for (const [field, messages] of pairs) {
    for (const message of messages) {
      callback(field, message)
    }
  }
}

export class ModelErrors implements Iterable<[string, string[]]> {
  private readonly messages = new Map<string, string[]>()

  add(field: string, message: string): this {
    const existing = this.messages.get(field)
    if (existing) {
      existing.push(message)
    } else {
      this.messages.set(field, [message])
    }
    return this
  }

  /**
   * Messages for `field`; an empty array when it has none.
   */
  get(field: string): string[] {
    return [...(this.messages.get(field) ?? [])]
  }

  has(field: string): boolean {
    return this.messages.has(field)
  }

  fields(): string[] {
    return [...this.messages.keys()]
  }

  /** Total number of messages over all fields. */
  get size(): number {
    let total = 0
    for (const list of this.messages.values()) {
      total += list.length
    }
    return total
  }

  isEmpty(): boolean {
    return this.messages.size === 0
  }

  clear(): void {
    this.messages.clear()
  }

  forEach(callback: (field: string, message: string) => void): void {
    forEachError(this, callback)
  }

  /**
   * Append every entry of `source`. Fields already present keep their
   * messages; the new ones are added after them.
   */
  merge(source: ErrorSource): this {
    forEachError(source, (field, message) => {
      this.add(field, message)
    })
    return this
  }

  /**
   * Messages prefixed by the humanized field name, `base` messages as is.
   *
   * @example
   * ```typescript
   * errors.add('firstName', "can't be blank").add('base', 'Signup is closed')
   * errors.fullMessages() // ["First name can't be blank", 'Signup is closed']
   * ```
   */
  fullMessages(): string[] {
    const result: string[] = []
    this.forEach((field, message) => {
      result.push(field === BASE_FIELD ? message : `${humanize(field)} ${message}`)
    })
    return result
  }

  toJSON(): Record<string, string[]> {
    const result: Record<string, string[]> = {}
    for (const [field, list] of this.messages) {
      result[field] = [...list]
    }
    return result
  }

  *[Symbol.iterator](): Iterator<[string, string[]]> {
    for (const [field, list] of this.messages) {
      yield [field, [...list]]
    }
  }
}
