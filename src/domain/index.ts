export * from './entities/LifecycleState.js';
export * from './errors/ReconnectErrors.js';
export type { IConnection } from './ports/IConnection.js';
export type { ILogger, LogLevel, LogData, LogMethod, ErrorLogMethod } from './ports/ILogger.js';
export { LOG_LEVELS } from './ports/ILogger.js';
