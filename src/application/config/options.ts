/**
 * @fileoverview Mediator configuration
 *
 * Options can be passed in code or loaded from environment variables:
 *
 * | Variable                       | Values                                   | Default              |
 * |--------------------------------|------------------------------------------|----------------------|
 * | `MEDIATOR_LOG_LEVEL`           | debug, info, warn, error, silent         | info                 |
 * | `MEDIATOR_EMPTY_PAGE_POLICY`   | failure, success                         | failure              |
 * | `MEDIATOR_EMPTY_PAGE_MESSAGE`  | any non-empty text                       | No records found.    |
 */

import { z } from 'zod';
import { ConfigurationError } from '../../domain/exceptions/exceptions';
import { ILogger, LogLevel, LOG_LEVELS, consoleLogger, createLogger } from '../logging/ILogger';

/**
 * What a paged query handler returns when a query matches no rows.
 *
 * - `failure`: a 404 failure carrying the empty-page message
 * - `success`: an empty successful page
 */
export type EmptyPagePolicy = 'failure' | 'success';

/**
 * Mediator configuration options
 */
export interface MediatorOptions {
  /** Custom logger. Defaults to the console logger filtered by `logLevel`. */
  logger?: ILogger;

  /** Minimum level written by the default logger */
  logLevel?: LogLevel;

  /** Empty paged result handling */
  emptyPagePolicy?: EmptyPagePolicy;

  /** Notification message used by the `failure` empty-page policy */
  emptyPageMessage?: string;

  /** Generates trace and request IDs. Defaults to UUID v4. */
  idFactory?: () => string;
}

/**
 * Options after defaults are applied.
 */
export interface ResolvedMediatorOptions {
  logger: ILogger;
  logLevel: LogLevel;
  emptyPagePolicy: EmptyPagePolicy;
  emptyPageMessage: string;
  idFactory?: () => string;
}

export const DEFAULT_EMPTY_PAGE_MESSAGE = 'No records found.';

const ENV_PREFIX = 'MEDIATOR_';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Schema for configuration read from the environment
 */
export const MediatorEnvSchema = z.object({
  logLevel: LogLevelSchema.default('info'),
  emptyPagePolicy: z.enum(['failure', 'success']).default('failure'),
  emptyPageMessage: z.string().trim().min(1).default(DEFAULT_EMPTY_PAGE_MESSAGE),
});

export type MediatorEnvConfig = z.infer<typeof MediatorEnvSchema>;

/**
 * Load mediator configuration from environment variables.
 *
 * @throws {ConfigurationError} If a variable holds an unsupported value
 *
 * @example
 * ```typescript
 * const mediator = MediatorBuilder.create(loadMediatorConfig()).register(...).build();
 * ```
 */
export function loadMediatorConfig(
  env: Record<string, string | undefined> = process.env,
): MediatorEnvConfig {
  const result = MediatorEnvSchema.safeParse({
    logLevel: env[`${ENV_PREFIX}LOG_LEVEL`],
    emptyPagePolicy: env[`${ENV_PREFIX}EMPTY_PAGE_POLICY`],
    emptyPageMessage: env[`${ENV_PREFIX}EMPTY_PAGE_MESSAGE`],
  });

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid mediator configuration: ${issues.join('; ')}`, issues);
  }

  return result.data;
}

/**
 * Apply defaults to user options.
 */
export function resolveMediatorOptions(options: MediatorOptions = {}): ResolvedMediatorOptions {
  const logLevel = options.logLevel ?? 'info';
  if (!LOG_LEVELS.includes(logLevel)) {
    throw new ConfigurationError(`Unknown log level '${logLevel}'`);
  }

  return {
    logger: options.logger ?? createLogger(logLevel, consoleLogger),
    logLevel,
    emptyPagePolicy: options.emptyPagePolicy ?? 'failure',
    emptyPageMessage: options.emptyPageMessage ?? DEFAULT_EMPTY_PAGE_MESSAGE,
    idFactory: options.idFactory,
  };
}
