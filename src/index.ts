export * from "./domain/index.js";
export * from "./application/index.js";
export { WebSocketConnection } from "./infrastructure/websocket/WebSocketConnection.js";
export type { WebSocketConnectionConfig } from "./infrastructure/websocket/WebSocketConnection.js";
export { PinoLogger } from "./infrastructure/logging/PinoLogger.js";
export type { PinoLoggerOptions } from "./infrastructure/logging/PinoLogger.js";
export { loadConfig, validateConfig } from "./infrastructure/config/Config.js";
export type { AppConfig } from "./infrastructure/config/Config.js";
export { HealthServer } from "./presentation/HealthServer.js";
export type { HealthServerConfig, HealthReport, LinkStatusSource } from "./presentation/HealthServer.js";
