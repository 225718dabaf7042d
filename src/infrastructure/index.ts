/**
 * @module courier-bus/infrastructure
 * @description Middleware pipeline, built-in middleware and the in-memory
 * event publisher
 */

// ============================================================================
// Pipeline
// ============================================================================

export * from './pipeline';

// ============================================================================
// Middleware
// ============================================================================

export * from './middleware';

// ============================================================================
// Event Publishing
// ============================================================================

export * from './events';
