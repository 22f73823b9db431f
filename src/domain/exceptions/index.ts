/**
 * @fileoverview Exception Module
 *
 * Configuration and contract-violation errors raised by the dispatch layer
 */

export {
  MediatorError,
  HandlerNotFoundError,
  DuplicateHandlerError,
  InvalidHandlerError,
  OperationCancelledError,
  InvalidPaginationError,
  ResponseContractError,
  ConfigurationError,
  isCancellationError,
} from './exceptions';
