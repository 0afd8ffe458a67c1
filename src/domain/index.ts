/**
 * @module subject-registry/domain
 * @description Domain layer exports
 */

// ============================================================================
// Subscribers
// ============================================================================

export * from './subscriber';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
