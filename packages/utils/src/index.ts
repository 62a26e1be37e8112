/**
 * Utilities for manipulating bytes, Uint8Arrays, etc.
 */
export * from './bytes'
/**
 * Result tuples for code paths that should not throw
 */
export * from './safe'
