/**
 * @module usecase-dispatch/domain
 * @description Domain layer exports
 */

// ============================================================================
// Context Management
// ============================================================================

export * from './context';

// ============================================================================
// Notifications
// ============================================================================

export * from './notifications';

// ============================================================================
// Responses
// ============================================================================

export * from './responses';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
