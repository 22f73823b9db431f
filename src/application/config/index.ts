export {
  loadMediatorConfig,
  resolveMediatorOptions,
  MediatorEnvSchema,
  DEFAULT_EMPTY_PAGE_MESSAGE,
} from './options';
export type {
  MediatorOptions,
  ResolvedMediatorOptions,
  MediatorEnvConfig,
  EmptyPagePolicy,
} from './options';
