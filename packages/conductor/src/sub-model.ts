import { MissingCapabilityError } from '@ensemble/core'
import type { ErrorSource } from './model-errors.js'

/**
 * What a conductor needs from each model it composes.
 *
 * Attribute accessors for the conducted names are expected as ordinary
 * properties on the same object.
 */
export interface SubModel {
  /** True while the model has not been persisted. */
  isNew(): boolean
  /** Runs the model's own validations. */
  isValid(): boolean
  /** Errors from the last {@link SubModel.isValid} call. */
  errors(): ErrorSource
  /** Persists the model; `false` when it refused or failed to. */
  save(): boolean
}

export const SUB_MODEL_CAPABILITIES = ['isNew', 'isValid', 'errors', 'save'] as const

export type SubModelCapability = (typeof SUB_MODEL_CAPABILITIES)[number]

function missingCapability(value: unknown): SubModelCapability | 'object' | undefined {
  if (typeof value !== 'object' || value === null) {
    return 'object'
  }
  return SUB_MODEL_CAPABILITIES.find(
    capability => typeof Reflect.get(value, capability) !== 'function'
  )
}

export function isSubModel(value: unknown): value is SubModel {
  return missingCapability(value) === undefined
}

/**
 * Throws {@link MissingCapabilityError} unless `value` satisfies {@link SubModel}.
 *
 * @param subject - how to name the value in the error, e.g. `sub-model #2 of SignupConductor`
 */
export function assertSubModel(value: unknown, subject: string): asserts value is SubModel {
  const missing = missingCapability(value)
  if (missing === 'object') {
    throw new MissingCapabilityError(subject, 'the sub-model capabilities', `got ${typeof value}`)
  }
  if (missing !== undefined) {
    throw new MissingCapabilityError(subject, `${missing}()`)
  }
}
