/**
 * @fileoverview usecase-dispatch - In-process request dispatch for application use cases
 * @description
 * Routes typed commands and queries to exactly one handler, runs validation
 * before business logic, and returns a uniform Response / PagedResponse that
 * carries structured notifications instead of throwing for expected failures.
 *
 * ## Layers
 *
 * - **domain**: notifications, response envelopes, request context, exceptions
 * - **application**: request markers, handler base classes, mediator, validation,
 *   logging and configuration
 *
 * @packageDocumentation
 * @module usecase-dispatch
 * @version 1.0.0
 */

// reflect-metadata must load before any @Handles-decorated class.
import 'reflect-metadata';

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';
