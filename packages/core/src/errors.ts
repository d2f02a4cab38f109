/**
 * Error hierarchy shared by the Ensemble packages.
 *
 * Structural mistakes (a conductor wired to a slot that does not exist, a
 * malformed declaration) are thrown. Validation and persistence outcomes are
 * never thrown by the conductor; they come back as booleans and error
 * collections.
 */

import { ErrorCodes } from './error-codes.js'

// Pre-compiled patterns for SQLite error messages
const SQLITE_UNIQUE_REGEX = /UNIQUE constraint failed: (\w+)\.(\w+)/
const SQLITE_NOT_NULL_REGEX = /NOT NULL constraint failed: (\w+)\.(\w+)/
const SQLITE_CHECK_REGEX = /CHECK constraint failed: (\w+)/

export class EnsembleError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly detail?: string
  ) {
    super(message)
    this.name = 'EnsembleError'
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      detail: this.detail
    }
  }
}

/**
 * A slot accessor, or a capability a sub-model must provide, is missing.
 *
 * `subject` names what was inspected (`slot "user"`, `sub-model #1`) and
 * `capability` what it lacked.
 */
export class MissingCapabilityError extends EnsembleError {
  constructor(
    public readonly subject: string,
    public readonly capability: string,
    detail?: string
  ) {
    super(
      `${subject} does not provide ${capability}`,
      ErrorCodes.CONDUCTOR_MISSING_CAPABILITY,
      detail
    )
    this.name = 'MissingCapabilityError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      subject: this.subject,
      capability: this.capability
    }
  }
}

/**
 * A conductor type was declared incorrectly.
 */
export class DeclarationError extends EnsembleError {
  constructor(
    public readonly conductor: string,
    message: string,
    code: string = ErrorCodes.CONDUCTOR_INVALID_DECLARATION
  ) {
    super(`${conductor}: ${message}`, code)
    this.name = 'DeclarationError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      conductor: this.conductor
    }
  }
}

export class DatabaseError extends EnsembleError {
  constructor(message: string, code: string = ErrorCodes.DB_QUERY_FAILED, detail?: string) {
    super(message, code, detail)
    this.name = 'DatabaseError'
  }
}

export class RecordNotFoundError extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly id?: number
  ) {
    super(
      id === undefined ? `${table} record has not been saved` : `No row in ${table} with id ${id}`,
      ErrorCodes.RECORD_NOT_FOUND
    )
    this.name = 'RecordNotFoundError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      table: this.table,
      id: this.id
    }
  }
}

export class UniqueConstraintError extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly columns: string[]
  ) {
    super(`UNIQUE constraint violation on ${table}`, ErrorCodes.VALIDATION_UNIQUE_VIOLATION)
    this.name = 'UniqueConstraintError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      table: this.table,
      columns: this.columns
    }
  }
}

export class ForeignKeyError extends DatabaseError {
  constructor() {
    super('FOREIGN KEY constraint violation', ErrorCodes.VALIDATION_FOREIGN_KEY_VIOLATION)
    this.name = 'ForeignKeyError'
  }
}

export class NotNullError extends DatabaseError {
  constructor(
    public readonly column: string,
    public readonly table?: string
  ) {
    const tableInfo = table ? ` on table ${table}` : ''
    super(
      `NOT NULL constraint violation on column ${column}${tableInfo}`,
      ErrorCodes.VALIDATION_NOT_NULL_VIOLATION,
      column
    )
    this.name = 'NotNullError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      column: this.column,
      table: this.table
    }
  }
}

export class CheckConstraintError extends DatabaseError {
  constructor(public readonly constraint: string) {
    super(`CHECK constraint violation: ${constraint}`, ErrorCodes.VALIDATION_CHECK_VIOLATION)
    this.name = 'CheckConstraintError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      constraint: this.constraint
    }
  }
}

export type ConstraintError =
  | UniqueConstraintError
  | ForeignKeyError
  | NotNullError
  | CheckConstraintError

/**
 * @internal
 */
function hasMessageProperty(error: object): error is { message: unknown } {
  return 'message' in error
}

/**
 * Map an error thrown by the SQLite driver onto the {@link DatabaseError}
 * hierarchy. Errors that already belong to it are returned unchanged.
 */
export function parseSqliteError(error: unknown): DatabaseError {
  if (error instanceof DatabaseError) {
    return error
  }
  if (!error || typeof error !== 'object' || !hasMessageProperty(error)) {
    return new DatabaseError('Unknown database error', ErrorCodes.DB_UNKNOWN)
  }

  const message = typeof error.message === 'string' ? error.message : ''

  if (message.includes('UNIQUE constraint failed')) {
    const match = SQLITE_UNIQUE_REGEX.exec(message)
    return new UniqueConstraintError(match?.[1] ?? 'unknown', match?.[2] ? [match[2]] : [])
  }
  if (message.includes('FOREIGN KEY constraint failed')) {
    return new ForeignKeyError()
  }
  if (message.includes('NOT NULL constraint failed')) {
    const match = SQLITE_NOT_NULL_REGEX.exec(message)
    return new NotNullError(match?.[2] ?? 'unknown', match?.[1])
  }
  if (message.includes('CHECK constraint failed')) {
    const match = SQLITE_CHECK_REGEX.exec(message)
    return new CheckConstraintError(match?.[1] ?? 'unknown')
  }
  return new DatabaseError(message, ErrorCodes.DB_UNKNOWN)
}

export function isEnsembleError(error: unknown): error is EnsembleError {
  return error instanceof EnsembleError
}

export function isConstraintError(error: unknown): error is ConstraintError {
  return (
    error instanceof UniqueConstraintError ||
    error instanceof ForeignKeyError ||
    error instanceof NotNullError ||
    error instanceof CheckConstraintError
  )
}
