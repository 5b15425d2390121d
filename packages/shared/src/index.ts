export { createLogger, redactPii, type SafeLogger, type LoggerOptions } from './logger';
export { AppError, ErrorCode } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type ApiConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  ApiConfigSchema,
} from './config';
