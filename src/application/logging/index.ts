export {
  consoleLogger,
  silentLogger,
  createLogger,
  LOG_LEVELS,
} from './ILogger';
export type { ILogger, LogLevel } from './ILogger';
