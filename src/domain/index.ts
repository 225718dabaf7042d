/**
 * @module courier-bus/domain
 * @description Domain layer exports
 */

// ============================================================================
// Messages
// ============================================================================

export * from './messages';

// ============================================================================
// Domain Events
// ============================================================================

export * from './events';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
