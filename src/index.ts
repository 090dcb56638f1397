export * from './types/index.js';
export * from './translator/index.js';
export * from './sse/index.js';
export * from './client/index.js';
export * from './shared/errors/index.js';
export { validateMessageCreateParams, type ValidationResult } from './validation/request-validator.js';
export { createLogger, getDefaultLogger, type Logger, type LogContext, type LoggerOptions } from './infrastructure/utils/logger.js';
export { sanitizeForLogging } from './infrastructure/utils/sanitize.js';
export { AppConfig, getConfig, resetConfig } from './infrastructure/config/app-config.js';
