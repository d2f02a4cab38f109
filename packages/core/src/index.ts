/**
 * @ensemble/core - shared utilities for the Ensemble packages
 *
 * - Error handling (EnsembleError hierarchy, error codes, SQLite error parsing)
 * - Logger interface and implementations
 * - Environment configuration
 *
 * @module @ensemble/core
 */

// Error handling
export * from './errors.js'
export * from './error-codes.js'

// Logger
export * from './logger.js'

// Configuration
export * from './config.js'
