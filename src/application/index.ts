/**
 * @module courier-bus/application
 * @description Application layer exports
 */

// ============================================================================
// CQRS Pattern
// ============================================================================

export * from './cqrs';

// ============================================================================
// Handler Resolution
// ============================================================================

export * from './resolution';

// ============================================================================
// Command Bus
// ============================================================================

export * from './bus';

// ============================================================================
// Logging
// ============================================================================

export * from './logging';
