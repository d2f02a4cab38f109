import type { z } from 'zod'
import { BASE_FIELD, ModelErrors, type SubModel } from '@ensemble/conductor'
import {
  isConstraintError,
  NotNullError,
  RecordNotFoundError,
  UniqueConstraintError,
  type ConstraintError
} from '@ensemble/core'
import type { RecordStore, Row } from './store.js'

export type RecordSchema = z.AnyZodObject

function constraintField(error: ConstraintError): string {
  if (error instanceof UniqueConstraintError) {
    return error.columns[0] ?? BASE_FIELD
  }
  if (error instanceof NotNullError) {
    return error.column
  }
  return BASE_FIELD
}

function constraintMessage(error: ConstraintError): string {
  if (error instanceof UniqueConstraintError) {
    return 'has already been taken'
  }
  if (error instanceof NotNullError) {
    return "can't be blank"
  }
  return error.message
}

/**
 * A row of one table, validated by a zod object schema and usable as a
 * conductor sub-model.
 *
 * Columns are the keys of the schema; each one is an ordinary property on
 * the record.
 *
 * @example
 * ```typescript
 * const PersonSchema = z.object({
 *   name: z.string({ required_error: "can't be blank" }).min(1, "can't be blank")
 * })
 *
 * class Person extends TableRecord<typeof PersonSchema> {
 *   protected readonly table = 'people'
 *   protected readonly schema = PersonSchema
 *   name: string | undefined = undefined
 * }
 *
 * const person = new Person(store).assign({ name: 'Ada' })
 * person.save() // true
 * person.id // 1
 * ```
 */
export abstract class TableRecord<TSchema extends RecordSchema = RecordSchema> implements SubModel {
  id: number | undefined = undefined

  protected abstract readonly table: string
  protected abstract readonly schema: TSchema

  private readonly validationErrors = new ModelErrors()

  constructor(protected readonly store: RecordStore) {}

  columns(): string[] {
    return Object.keys(this.schema.shape)
  }

  /**
   * Copy the schema columns found in `attributes` onto the record. Other keys
   * are ignored.
   */
  assign(attributes: Row): this {
    for (const column of this.columns()) {
      if (Object.prototype.hasOwnProperty.call(attributes, column)) {
        Reflect.set(this, column, attributes[column])
      }
    }
    return this
  }

  /** Current column values. */
  toRow(): Row {
    const row: Row = {}
    for (const column of this.columns()) {
      row[column] = Reflect.get(this, column)
    }
    return row
  }

  isNew(): boolean {
    return this.id === undefined
  }

  /**
   * Run the schema and {@link TableRecord.validate}. Schema issues are keyed
   * by the first segment of their path, `base` when there is none.
   */
  isValid(): boolean {
    this.validationErrors.clear()

    const result = this.schema.safeParse(this.toRow())
    if (!result.success) {
      for (const issue of result.error.issues) {
        const field = issue.path[0]
        this.validationErrors.add(typeof field === 'string' ? field : BASE_FIELD, issue.message)
      }
    }
    this.validate(this.validationErrors)

    return this.validationErrors.isEmpty()
  }

  errors(): ModelErrors {
    return this.validationErrors
  }

  /**
   * Validate, then insert (new record) or update. A constraint violation is
   * recorded on the offending column and reported as `false`; other database
   * errors are thrown.
   */
  save(): boolean {
    if (!this.isValid()) {
      return false
    }

    const row = this.toRow()
    try {
      if (this.id === undefined) {
        this.id = this.store.insert(this.table, row)
      } else {
        this.store.update(this.table, this.id, row)
      }
      return true
    } catch (error) {
      if (!isConstraintError(error)) {
        throw error
      }
      this.validationErrors.add(constraintField(error), constraintMessage(error))
      this.store.logger.warn(`${this.table}: ${error.message}`, error.toJSON())
      return false
    }
  }

  /**
   * Replace the column values with the stored row.
   *
   * @throws RecordNotFoundError when the record is new or its row is gone
   */
  reload(): this {
    const id = this.id
    const row = id === undefined ? undefined : this.store.find(this.table, id)
    if (!row) {
      throw new RecordNotFoundError(this.table, id)
    }
    return this.assign(row)
  }

  /**
   * Checks beyond the schema. Add messages to `errors` to make the record
   * invalid.
   */
  protected validate(_errors: ModelErrors): void {
    /* no additional checks by default */
  }
}
