import { createEnvLogger, type EnsembleLogger } from '@ensemble/core'
import { ModelErrors } from './model-errors.js'
import { modelNameFor, type ModelName } from './naming.js'
import {
  declareAttributes,
  declaredEntries,
  isWritableAttribute,
  sealDeclarations,
  typeLabel,
  type ConductorType
} from './registry.js'
import {
  asJson,
  serializableHash,
  type AttributeMap,
  type JsonOptions,
  type SerializeOptions
} from './serialization.js'
import { assertSubModel, type SubModel } from './sub-model.js'

export type Customizer<T> = (conductor: T) => void

export type ConductorConstructor<T extends Conductor> = new (attributes?: AttributeMap | null) => T

let conductorLogger: EnsembleLogger = createEnvLogger('conductor')

/**
 * Replace the logger used by every conductor.
 */
export function configureConductorLogger(logger: EnsembleLogger): void {
  conductorLogger = logger
}

/**
 * Unifies several sub-models behind one object that reads, writes, validates
 * and saves them as if they were a single record.
 *
 * Subclasses list their sub-models in {@link Conductor.subModels} and expose
 * sub-model attributes with {@link Conductor.conduct}. Conducted attributes
 * are accessors on the prototype, so declare them with `declare` rather than
 * as class fields, which would shadow them.
 *
 * @example Lazily created sub-models
 * ```typescript
 * class SignupConductor extends Conductor {
 *   declare firstName: string | undefined
 *   declare image: string | undefined
 *
 *   private declare userModel: User | undefined
 *   private declare profileModel: Profile | undefined
 *
 *   user(): User {
 *     return (this.userModel ??= new User(store))
 *   }
 *
 *   profile(): Profile {
 *     return (this.profileModel ??= new Profile(store))
 *   }
 *
 *   override subModels(): SubModel[] {
 *     return [this.user(), this.profile()]
 *   }
 * }
 *
 * SignupConductor.conduct('user', 'firstName')
 * SignupConductor.conduct('profile', 'image')
 *
 * const signup = SignupConductor.create({ firstName: 'Ada', image: 'ada.png' })
 * signup.isValid() || console.log(signup.errors().fullMessages())
 * ```
 *
 * Storage for lazily created sub-models is declared with `declare` for the
 * same reason: class field initializers run after this constructor has
 * already assigned the initial attributes. Sub-models built eagerly in a
 * subclass constructor call `super()` without attributes and assign them
 * with {@link Conductor.setAttributes} afterwards.
 */
export class Conductor {
  private errorCollection: ModelErrors | undefined

  constructor(attributes?: AttributeMap | null) {
    sealDeclarations(new.target)
    this.setAttributes(attributes)
  }

  /**
   * Forward `attribute` (and any further names) to the sub-model returned by
   * the `slot` accessor.
   *
   * Whatever the slot reads from must not be an initialized class field: the
   * constructor assigns the initial attributes before field initializers run,
   * and the initializer then replaces the sub-model that received them. Use
   * `declare` for lazily filled storage.
   *
   * @throws DeclarationError when a name is empty, integer-like or `__proto__`,
   * shadows a conductor member or the slot, or when the type has already been
   * instantiated
   */
  static conduct(this: ConductorType, slot: string, attribute: string, ...attributes: string[]): void {
    const reserved = new Set(Object.getOwnPropertyNames(Conductor.prototype))
    declareAttributes(this, slot, [attribute, ...attributes], reserved)
  }

  /**
   * Names conducted on this type, in declaration order. Names declared on a
   * parent type are not included. Names declared more than once appear more
   * than once.
   */
  static declaredAttributes(this: ConductorType): readonly string[] {
    return Object.freeze(declaredEntries(this).map(entry => entry.name))
  }

  static modelName(this: ConductorType): ModelName {
    return modelNameFor(this)
  }

  /**
   * Build a conductor, hand it to `customizer`, then save it.
   *
   * The conductor is returned whether or not the save succeeded; check
   * {@link Conductor.errors} or the sub-models to find out.
   *
   * @example
   * ```typescript
   * const signup = SignupConductor.create(params, conductor => {
   *   conductor.user().isAdmin = true
   * })
   * ```
   */
  static create<T extends Conductor>(
    this: ConductorConstructor<T>,
    attributes?: AttributeMap | null,
    customizer?: Customizer<T>
  ): T {
    const conductor = new this(attributes)
    customizer?.(conductor)
    conductor.save()
    return conductor
  }

  /**
   * The composed sub-models, in the order they are validated and saved.
   */
  subModels(): readonly SubModel[] {
    return []
  }

  get attributes(): AttributeMap {
    return this.getAttributes()
  }

  set attributes(attributes: AttributeMap | null | undefined) {
    this.setAttributes(attributes)
  }

  /**
   * Current value of every conducted attribute, keyed in declaration order.
   */
  getAttributes(): AttributeMap {
    const result: AttributeMap = {}
    for (const { name } of declaredEntries(this.constructor)) {
      result[name] = Reflect.get(this, name)
    }
    return result
  }

  /**
   * Assign every key that has a setter on this conductor; other keys are
   * ignored.
   */
  setAttributes(attributes: AttributeMap | null | undefined): void {
    if (!attributes) {
      return
    }
    for (const [key, value] of Object.entries(attributes)) {
      if (isWritableAttribute(this, key, Conductor.prototype)) {
        Reflect.set(this, key, value)
      } else {
        this.logger.trace(`${this.label} ignored unknown attribute "${key}"`)
      }
    }
  }

  /**
   * True when every sub-model is new. True when there are none.
   */
  isNew(): boolean {
    return this.checkedSubModels().every(model => model.isNew())
  }

  /**
   * Validate every sub-model and collect all of their errors, whatever the
   * outcome of each. True when there are no sub-models.
   */
  isValid(): boolean {
    const errors = this.errors()
    errors.clear()

    let valid = true
    for (const model of this.checkedSubModels()) {
      const modelValid = model.isValid()
      errors.merge(model.errors())
      valid = valid && modelValid
    }
    return valid
  }

  errors(): ModelErrors {
    this.errorCollection ??= new ModelErrors()
    return this.errorCollection
  }

  /**
   * Save the sub-models in order, stopping at the first one that fails.
   * Sub-models saved before the failure stay saved.
   *
   * Nothing is saved when validation fails.
   */
  save(): boolean {
    if (!this.isValid()) {
      this.logger.debug(`${this.label} not saved: validation failed`, this.errors().toJSON())
      return false
    }

    for (const [index, model] of this.checkedSubModels().entries()) {
      if (!model.save()) {
        this.logger.warn(
          `${this.label} not saved: sub-model #${index} (${typeLabel(model.constructor)}) failed to save`
        )
        return false
      }
    }
    return true
  }

  /** A conductor is never destroyed; only its sub-models carry state. */
  isDestroyed(): boolean {
    return false
  }

  /** A conductor is never persisted itself. */
  isPersisted(): boolean {
    return false
  }

  toModel(): this {
    return this
  }

  toKey(): null {
    return null
  }

  toParam(): null {
    return null
  }

  modelName(): ModelName {
    return modelNameFor(this.constructor)
  }

  serializableHash(options?: SerializeOptions): AttributeMap {
    return serializableHash(this.getAttributes(), options)
  }

  /**
   * JSON form of the conducted attributes, optionally nested under the
   * singular model name.
   */
  asJson(options?: JsonOptions): AttributeMap {
    return asJson(this.getAttributes(), this.modelName().singular, options)
  }

  toJSON(): AttributeMap {
    return this.serializableHash()
  }

  protected get logger(): EnsembleLogger {
    return conductorLogger
  }

  private get label(): string {
    return typeLabel(this.constructor)
  }

  private checkedSubModels(): SubModel[] {
    const label = this.label
    return this.subModels().map((model, index) => {
      assertSubModel(model, `sub-model #${index} of ${label}`)
      return model
    })
  }
}
