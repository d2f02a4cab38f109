/**
 * @ensemble/conductor - unify several sub-models behind one object
 *
 * @example
 * ```typescript
 * import { Conductor, type SubModel } from '@ensemble/conductor'
 *
 * class Registration extends Conductor {
 *   declare email: string | undefined
 *   private declare account: Account | undefined
 *
 *   user(): Account {
 *     return (this.account ??= new Account(store))
 *   }
 *
 *   override subModels(): SubModel[] {
 *     return [this.user()]
 *   }
 * }
 *
 * Registration.conduct('user', 'email')
 * ```
 *
 * @module @ensemble/conductor
 */

export * from './conductor.js'
export * from './model-errors.js'
export * from './naming.js'
export * from './registry.js'
export * from './serialization.js'
export * from './sub-model.js'
