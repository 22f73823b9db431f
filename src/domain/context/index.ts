/**
 * @fileoverview Context Module
 *
 * Request-scoped metadata propagation across async boundaries
 */

export type { IContext, DispatchContextData } from './IContext';
export {
  RequestContext,
  getCurrentContext,
  tryGetCurrentContext,
} from './RequestContext';
export { CancellationListeners } from './CancellationListeners';
