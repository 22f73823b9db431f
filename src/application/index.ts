/**
 * @module usecase-dispatch/application
 * @description Application layer exports
 *
 * @example
 * ```typescript
 * import { MediatorBuilder, ZodValidator, LoggingBehavior } from 'usecase-dispatch';
 * ```
 */

// ============================================================================
// CQRS (requests, handlers, registration)
// ============================================================================

export * from './cqrs';

// ============================================================================
// Mediator
// ============================================================================

export * from './mediator';

// ============================================================================
// Validation
// ============================================================================

export * from './validation';

// ============================================================================
// Logging & Configuration
// ============================================================================

export * from './logging';
export * from './config';
