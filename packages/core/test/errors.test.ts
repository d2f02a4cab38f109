import { describe, it, expect } from 'vitest'
import {
  CheckConstraintError,
  DatabaseError,
  DeclarationError,
  EnsembleError,
  ForeignKeyError,
  isConstraintError,
  isEnsembleError,
  MissingCapabilityError,
  NotNullError,
  parseSqliteError,
  RecordNotFoundError,
  UniqueConstraintError
} from '../src/errors.js'
import { ErrorCodes } from '../src/error-codes.js'

describe('EnsembleError', () => {
  it('should serialize name, message, code and detail', () => {
    const error = new EnsembleError('Something broke', ErrorCodes.DB_UNKNOWN, 'more')

    expect(error.toJSON()).toEqual({
      name: 'EnsembleError',
      message: 'Something broke',
      code: 'DB_UNKNOWN',
      detail: 'more'
    })
  })
})

describe('MissingCapabilityError', () => {
  it('should name the subject and the missing capability', () => {
    const error = new MissingCapabilityError('slot "user" of Signup', 'an accessor', 'not defined')

    expect(error).toBeInstanceOf(EnsembleError)
    expect(error.name).toBe('MissingCapabilityError')
    expect(error.message).toBe('slot "user" of Signup does not provide an accessor')
    expect(error.code).toBe(ErrorCodes.CONDUCTOR_MISSING_CAPABILITY)
    expect(error.toJSON()).toEqual({
      name: 'MissingCapabilityError',
      message: 'slot "user" of Signup does not provide an accessor',
      code: 'CONDUCTOR_MISSING_CAPABILITY',
      detail: 'not defined',
      subject: 'slot "user" of Signup',
      capability: 'an accessor'
    })
  })
})

describe('DeclarationError', () => {
  it('should prefix the message with the conductor name', () => {
    const error = new DeclarationError('Signup', 'slot name must be a non-empty string')

    expect(error.message).toBe('Signup: slot name must be a non-empty string')
    expect(error.code).toBe(ErrorCodes.CONDUCTOR_INVALID_DECLARATION)
    expect(error.conductor).toBe('Signup')
  })

  it('should accept a specific code', () => {
    const error = new DeclarationError('Signup', 'sealed', ErrorCodes.CONDUCTOR_SEALED)

    expect(error.code).toBe('CONDUCTOR_SEALED')
  })
})

describe('RecordNotFoundError', () => {
  it('should mention the id when there is one', () => {
    const error = new RecordNotFoundError('people', 7)

    expect(error).toBeInstanceOf(DatabaseError)
    expect(error.message).toBe('No row in people with id 7')
    expect(error.code).toBe(ErrorCodes.RECORD_NOT_FOUND)
  })

  it('should describe unsaved records', () => {
    expect(new RecordNotFoundError('people').message).toBe('people record has not been saved')
  })
})

describe('parseSqliteError', () => {
  it('should parse UNIQUE constraint failures', () => {
    const parsed = parseSqliteError(new Error('UNIQUE constraint failed: users.email'))

    expect(parsed).toBeInstanceOf(UniqueConstraintError)
    expect(parsed.code).toBe(ErrorCodes.VALIDATION_UNIQUE_VIOLATION)
    expect(parsed.toJSON()).toMatchObject({ table: 'users', columns: ['email'] })
  })

  it('should parse NOT NULL constraint failures', () => {
    const parsed = parseSqliteError({ message: 'NOT NULL constraint failed: people.name' })

    expect(parsed).toBeInstanceOf(NotNullError)
    expect(parsed.message).toBe('NOT NULL constraint violation on column name on table people')
    expect(parsed.detail).toBe('name')
  })

  it('should parse FOREIGN KEY constraint failures', () => {
    expect(parseSqliteError(new Error('FOREIGN KEY constraint failed'))).toBeInstanceOf(
      ForeignKeyError
    )
  })

  it('should parse CHECK constraint failures', () => {
    const parsed = parseSqliteError(new Error('CHECK constraint failed: positive_total'))

    expect(parsed).toBeInstanceOf(CheckConstraintError)
    expect(parsed.message).toBe('CHECK constraint violation: positive_total')
  })

  it('should keep other messages with the unknown code', () => {
    const parsed = parseSqliteError(new Error('no such table: ghosts'))

    expect(parsed).toBeInstanceOf(DatabaseError)
    expect(parsed.code).toBe(ErrorCodes.DB_UNKNOWN)
    expect(parsed.message).toBe('no such table: ghosts')
  })

  it('should return errors of the hierarchy unchanged', () => {
    const original = new NotNullError('name')

    expect(parseSqliteError(original)).toBe(original)
  })

  it.each([null, undefined, 'boom', 42, {}])('should handle %p', value => {
    const parsed = parseSqliteError(value)

    expect(parsed).toBeInstanceOf(DatabaseError)
    expect(parsed.message).toBe('Unknown database error')
  })
})

describe('type guards', () => {
  it('isEnsembleError should recognize the hierarchy only', () => {
    expect(isEnsembleError(new DeclarationError('X', 'y'))).toBe(true)
    expect(isEnsembleError(new Error('plain'))).toBe(false)
  })

  it('isConstraintError should recognize constraint violations only', () => {
    expect(isConstraintError(new UniqueConstraintError('users', ['email']))).toBe(true)
    expect(isConstraintError(new CheckConstraintError('x'))).toBe(true)
    expect(isConstraintError(new RecordNotFoundError('users', 1))).toBe(false)
    expect(isConstraintError(new DatabaseError('x'))).toBe(false)
  })
})
