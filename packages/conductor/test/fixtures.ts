/**
 * In-memory sub-models for conductor tests.
 */

import { ModelErrors, type ErrorSource, type SubModel } from '../src/index.js'

export interface FakeModelOptions {
  /** Force the validity result; by default a model is valid when it has no errors. */
  valid?: boolean
  /** Result of save(); default true. */
  saves?: boolean
  /** Start as already persisted. */
  persisted?: boolean
  /** Errors reported on every validation. */
  errors?: Record<string, string[]>
}

export class FakeModel implements SubModel {
  name: string | undefined = undefined
  anInt: number | undefined = undefined
  persisted: boolean
  saveCount = 0

  private readonly validationErrors = new ModelErrors()

  constructor(private readonly options: FakeModelOptions = {}) {
    this.persisted = options.persisted ?? false
  }

  isNew(): boolean {
    return !this.persisted
  }

  isValid(): boolean {
    this.validationErrors.clear()
    this.validate(this.validationErrors)
    if (this.options.errors) {
      this.validationErrors.merge(this.options.errors)
    }
    return this.options.valid ?? this.validationErrors.isEmpty()
  }

  errors(): ErrorSource {
    return this.validationErrors
  }

  save(): boolean {
    if (this.options.saves === false) {
      return false
    }
    this.persisted = true
    this.saveCount += 1
    return true
  }

  protected validate(_errors: ModelErrors): void {
    /* no rules */
  }
}

/**
 * Requires a name, like a typical person record.
 */
export class FakePerson extends FakeModel {
  protected override validate(errors: ModelErrors): void {
    if (!this.name) {
      errors.add('name', "can't be blank")
    }
  }
}
