import { DeclarationError, ErrorCodes, MissingCapabilityError } from '@ensemble/core'

/**
 * Attribute registry.
 *
 * Each conductor type owns a list of `(name, slot)` entries; subclasses do
 * not share their parent's list. Every entry is
 * exposed as an accessor on the type's prototype, and all accessors go
 * through the same two functions, {@link readAttribute} and
 * {@link writeAttribute}.
 *
 * A type's list is sealed the first time the type (or a subclass) is
 * instantiated.
 */

export interface ConductedAttribute {
  readonly name: string
  readonly slot: string
}

/**
 * The static side of a conductor class, as far as the registry cares.
 */
export interface ConductorType {
  readonly name: string
  readonly prototype: object
}

interface TypeDeclarations {
  readonly entries: ConductedAttribute[]
  sealed: boolean
}

const declarations = new WeakMap<object, TypeDeclarations>()

// Integer-like keys are reordered by plain objects and `__proto__` is not an
// own key at all, so neither round-trips through getAttributes().
const ARRAY_INDEX_REGEX = /^(?:0|[1-9]\d*)$/
const UNSAFE_NAMES: ReadonlySet<string> = new Set(['__proto__'])

function declarationsOf(type: object): TypeDeclarations {
  let existing = declarations.get(type)
  if (!existing) {
    existing = { entries: [], sealed: false }
    declarations.set(type, existing)
  }
  return existing
}

export function typeLabel(type: { readonly name: string }): string {
  return type.name || 'anonymous conductor'
}

/**
 * The type followed by its ancestors, most derived first.
 * @internal
 */
function lineage(type: object): object[] {
  const chain: object[] = []
  let current: unknown = type
  while (typeof current === 'function' && current !== Function.prototype) {
    chain.push(current)
    current = Object.getPrototypeOf(current)
  }
  return chain
}

/**
 * Entries declared on `type` itself, in declaration order. A subclass starts
 * with an empty list; the accessors of its ancestors still forward through
 * the prototype chain.
 */
export function declaredEntries(type: object): ConductedAttribute[] {
  return [...(declarations.get(type)?.entries ?? [])]
}

/**
 * Mark `type` and its ancestors as instantiated. Later declarations on any
 * of them are rejected.
 */
export function sealDeclarations(type: object): void {
  for (const link of lineage(type)) {
    declarationsOf(link).sealed = true
  }
}

export function isSealed(type: object): boolean {
  return declarations.get(type)?.sealed ?? false
}

/**
 * Resolve the sub-model behind `slot` on a conductor instance.
 *
 * The slot may be a zero-argument method or a getter.
 */
export function resolveSlot(conductor: object, slot: string): object {
  const accessor: unknown = Reflect.get(conductor, slot)
  const subject = `slot "${slot}" of ${typeLabel(conductor.constructor)}`

  if (accessor === undefined) {
    throw new MissingCapabilityError(subject, 'an accessor', 'the slot accessor is not defined')
  }

  const model: unknown =
    typeof accessor === 'function' ? Reflect.apply(accessor, conductor, []) : accessor
  if (typeof model !== 'object' || model === null) {
    throw new MissingCapabilityError(
      subject,
      'a sub-model',
      `the slot accessor returned ${model === null ? 'null' : typeof model}`
    )
  }
  return model
}

export function readAttribute(conductor: object, entry: ConductedAttribute): unknown {
  const value: unknown = Reflect.get(resolveSlot(conductor, entry.slot), entry.name)
  return value
}

export function writeAttribute(conductor: object, entry: ConductedAttribute, value: unknown): void {
  Reflect.set(resolveSlot(conductor, entry.slot), entry.name, value)
}

function validateDeclaration(
  type: ConductorType,
  slot: string,
  names: readonly string[],
  reserved: ReadonlySet<string>
): void {
  const label = typeLabel(type)

  if (isSealed(type)) {
    throw new DeclarationError(
      label,
      'attributes cannot be conducted after the conductor has been instantiated',
      ErrorCodes.CONDUCTOR_SEALED
    )
  }
  if (typeof slot !== 'string' || slot.trim() === '') {
    throw new DeclarationError(label, 'slot name must be a non-empty string')
  }

  for (const name of names) {
    if (typeof name !== 'string' || name.trim() === '') {
      throw new DeclarationError(label, `attribute names for slot "${slot}" must be non-empty strings`)
    }
    if (ARRAY_INDEX_REGEX.test(name) || UNSAFE_NAMES.has(name)) {
      throw new DeclarationError(label, `"${name}" cannot be used as an attribute name`)
    }
    if (name === slot) {
      throw new DeclarationError(label, `attribute "${name}" would shadow its own slot`)
    }
    if (reserved.has(name)) {
      throw new DeclarationError(label, `attribute "${name}" would shadow a conductor member`)
    }
    const own = Object.getOwnPropertyDescriptor(type.prototype, name)
    if (own && typeof own.value === 'function') {
      throw new DeclarationError(label, `attribute "${name}" would replace the method ${name}()`)
    }
  }
}

/**
 * Append `(name, slot)` entries to `type` and define a forwarding accessor
 * for each name. Declaring a name again adds another entry and replaces the
 * accessor.
 *
 * @param reserved - member names the attributes may not take
 */
export function declareAttributes(
  type: ConductorType,
  slot: string,
  names: readonly string[],
  reserved: ReadonlySet<string>
): void {
  validateDeclaration(type, slot, names, reserved)
  const own = declarationsOf(type)

  for (const name of names) {
    const entry: ConductedAttribute = Object.freeze({ name, slot })
    own.entries.push(entry)

    Object.defineProperty(type.prototype, name, {
      configurable: true,
      enumerable: false,
      get(this: object): unknown {
        return readAttribute(this, entry)
      },
      set(this: object, value: unknown): void {
        writeAttribute(this, entry, value)
      }
    })
  }
}

/**
 * True when `key` has a setter somewhere on `target`'s prototype chain below
 * `boundary`.
 */
export function isWritableAttribute(target: object, key: string, boundary: object): boolean {
  let proto: unknown = Object.getPrototypeOf(target)
  while (typeof proto === 'object' && proto !== null && proto !== boundary) {
    const descriptor = Object.getOwnPropertyDescriptor(proto, key)
    if (descriptor) {
      return typeof descriptor.set === 'function'
    }
    proto = Object.getPrototypeOf(proto)
  }
  return false
}
