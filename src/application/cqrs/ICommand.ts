/**
 * @fileoverview CQRS Command Interface
 *
 * Commands represent intentions to modify system state. Each carries an
 * identity generated once, when it is constructed.
 *
 * @module usecase-dispatch/application/cqrs/ICommand
 * @see {@link https://martinfowler.com/bliki/CQRS.html | CQRS Pattern}
 */

import { v4 as uuidv4 } from 'uuid';
import type { Response } from '../../domain/responses/Response';
import type { IRequest } from './IRequest';

/**
 * Command metadata for auditing and tracing.
 *
 * @example
 * ```typescript
 * const metadata: CommandMetadata = {
 *   commandId: '9b1deb4d-3b7d-4bad-9bdd-2b0d7b3dcb6d',
 *   commandType: 'CreateOrderCommand',
 *   timestamp: new Date(),
 *   correlationId: 'trace-789',
 * };
 * ```
 */
export interface CommandMetadata {
  /**
   * Unique identifier for this command instance.
   */
  readonly commandId: string;

  /**
   * Constructor name of the command (e.g., 'CreateOrderCommand').
   */
  readonly commandType: string;

  /**
   * When the command was created.
   */
  readonly timestamp: Date;

  /**
   * Correlation ID linking this command to related work.
   */
  readonly correlationId?: string;
}

/**
 * ICommand - Marker interface for CQRS commands.
 *
 * A Command represents an intention to change the system state and is
 * answered with a `Response<TResult>`.
 *
 * @template TResult - Payload type of the success response
 *
 * @remarks
 * Commands should be:
 * - **Immutable**: Once created, command data should not change
 * - **Task-based**: Represent a specific user intention
 * - **Identified**: `commandId` is assigned once and never reused
 */
export interface ICommand<TResult> extends IRequest<Response<TResult>> {
  readonly commandId: string;
}

/**
 * Abstract base class for commands.
 *
 * Generates the command identity and metadata at construction.
 *
 * @template TResult - Payload type of the success response
 *
 * @example
 * ```typescript
 * class CreateOrderCommand extends CommandBase<string> {
 *   constructor(
 *     readonly customerId: string,
 *     readonly items: readonly OrderItem[],
 *   ) {
 *     super();
 *   }
 * }
 *
 * const command = new CreateOrderCommand(customerId, items);
 * command.commandId; // stable UUID
 * command.metadata.commandType; // 'CreateOrderCommand'
 * ```
 */
export abstract class CommandBase<TResult> implements ICommand<TResult> {
  /**
   * Command metadata including ID, type, and timestamp.
   */
  readonly metadata: CommandMetadata;

  /**
   * @param correlationId - Optional correlation ID for tracing
   */
  protected constructor(correlationId?: string) {
    this.metadata = Object.freeze({
      commandId: uuidv4(),
      commandType: new.target.name,
      timestamp: new Date(),
      ...(correlationId !== undefined && { correlationId }),
    });
  }

  get commandId(): string {
    return this.metadata.commandId;
  }

  /**
   * Phantom property for response type inference.
   * @internal
   */
  readonly __responseType?: Response<TResult>;
}
