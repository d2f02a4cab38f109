/**
 * @ensemble/record - SQLite table records that plug into a conductor
 *
 * @module @ensemble/record
 */

export * from './store.js'
export * from './table-record.js'
