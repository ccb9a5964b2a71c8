export { ReconnectController } from './ReconnectController.js';
export { resolveReconnectOptions } from './ReconnectOptions.js';
export type {
  ReconnectOptions,
  ResolvedReconnectOptions,
  ErrorHook,
  StateHook,
} from './ReconnectOptions.js';
export { createLoggingHooks } from './LoggingHooks.js';
export type { LoggingHooks, LoggingHooksOptions } from './LoggingHooks.js';
