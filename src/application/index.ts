/**
 * @module subject-registry/application
 * @description Application layer exports
 */

// ============================================================================
// Registries
// ============================================================================

export * from './registry';

// ============================================================================
// Configuration
// ============================================================================

export * from './config';
