import type { ILogger } from '../domain/ports/ILogger.js';
import { describeState } from '../domain/entities/LifecycleState.js';
import type { ErrorHook, StateHook } from './ReconnectOptions.js';

export interface LoggingHooksOptions {
  /** Optional veto policy; return an Error to stop reconnecting */
  veto?: ErrorHook;
}

export interface LoggingHooks {
  onState: StateHook;
  onError: ErrorHook;
}

/**
 * Builds controller hooks that report transitions and failures through a logger.
 */
export function createLoggingHooks(logger: ILogger, options: LoggingHooksOptions = {}): LoggingHooks {
  const { veto } = options;

  return {
    onState: (state) => {
      logger.info(`Link ${describeState(state).toLowerCase()}`, { state });
    },
    onError: (error) => {
      const override = veto === undefined ? null : veto(error) ?? null;
      if (override) {
        logger.error('Link error vetoed reconnection', override, { cause: error.message });
        return override;
      }
      logger.warn('Link error', { error: error.message });
      return null;
    },
  };
}
