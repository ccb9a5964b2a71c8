import dotenv from "dotenv";
import { LOG_LEVELS, type LogLevel } from "../../domain/ports/ILogger.js";
import { ConfigurationError } from "../../domain/errors/ReconnectErrors.js";

// Load environment variables from .env, never overriding the real environment
dotenv.config();

export interface AppConfig {
  link: {
    name: string;
    url: string;
    /** Heartbeat interval in ms, 0 disables it */
    pingInterval: number;
    /** Time allowed for the close handshake before the socket is killed */
    closeTimeout: number;
  };
  reconnection: {
    maxConnectAttempts: number;
    maxConnectionErrors: number;
  };
  health: {
    /** 0 disables the health endpoint */
    port: number;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
}

function getEnvOrThrow(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`${key} must be a number, got "${value}"`);
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new ConfigurationError(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${value}"`
    );
  }
  return level;
}

/**
 * Load configuration from the environment (and .env when present)
 */
export function loadConfig(): AppConfig {
  return {
    link: {
      name: getEnvOrDefault("LINK_NAME", "steady-link"),
      url: getEnvOrThrow("LINK_URL"),
      pingInterval: getEnvNumber("PING_INTERVAL", 30000),
      closeTimeout: getEnvNumber("CLOSE_TIMEOUT", 5000),
    },
    reconnection: {
      maxConnectAttempts: getEnvNumber("MAX_CONNECT_ATTEMPTS", 0),
      maxConnectionErrors: getEnvNumber("MAX_CONNECTION_ERRORS", 0),
    },
    health: {
      port: getEnvNumber("HEALTH_PORT", 0),
    },
    logging: {
      level: parseLogLevel(getEnvOrDefault("LOG_LEVEL", "info")),
      pretty: process.env.NODE_ENV !== "production",
    },
  };
}

function assertNonNegativeInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): void {
  if (!config.link.url.startsWith("ws://") && !config.link.url.startsWith("wss://")) {
    throw new ConfigurationError("LINK_URL must start with ws:// or wss://");
  }

  assertNonNegativeInteger("PING_INTERVAL", config.link.pingInterval);
  assertNonNegativeInteger("CLOSE_TIMEOUT", config.link.closeTimeout);
  assertNonNegativeInteger("MAX_CONNECT_ATTEMPTS", config.reconnection.maxConnectAttempts);
  assertNonNegativeInteger("MAX_CONNECTION_ERRORS", config.reconnection.maxConnectionErrors);

  if (config.health.port > 65535) {
    throw new ConfigurationError("HEALTH_PORT must be a valid TCP port");
  }
  assertNonNegativeInteger("HEALTH_PORT", config.health.port);
}
