/**
 * @fileoverview courier-bus - In-process CQRS message bus
 * @description
 * Commands, queries and domain events as immutable messages; a bus that
 * resolves each command or query to its handler through replaceable
 * strategies; a middleware chain that serializes commands and publishes the
 * events they raise.
 *
 * ## Architecture Layers
 *
 * - **Domain**: messages, domain events, the publisher contract, errors
 * - **Application**: CQRS abstractions, handler resolution, the bus, logging
 * - **Infrastructure**: middleware pipeline, built-in middleware, the
 *   in-memory event publisher
 *
 * @packageDocumentation
 * @module courier-bus
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';

// ============================================================================
// VERSION
// ============================================================================

export const VERSION = '1.0.0';
