import type { LifecycleState } from '../domain/entities/LifecycleState.js';
import { ConfigurationError } from '../domain/errors/ReconnectErrors.js';

/**
 * Error hook. Returning an Error aborts the controller with that error,
 * regardless of the configured thresholds.
 */
export type ErrorHook = (error: Error) => Error | null | undefined;

export type StateHook = (state: LifecycleState) => void;

export interface ReconnectOptions {
  /** Consecutive establish() failures tolerated before failing (0 = unlimited) */
  maxConnectAttempts?: number;
  /** Consecutive awaitDrop() failures tolerated before failing (0 = unlimited) */
  maxConnectionErrors?: number;
  /** Called for every establish()/awaitDrop() failure */
  onError?: ErrorHook;
  /** Called synchronously on every lifecycle transition */
  onState?: StateHook;
}

export interface ResolvedReconnectOptions {
  readonly maxConnectAttempts: number;
  readonly maxConnectionErrors: number;
  readonly onError: ErrorHook | undefined;
  readonly onState: StateHook | undefined;
}

function assertThreshold(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got ${value}`);
  }
}

export function resolveReconnectOptions(options: ReconnectOptions = {}): ResolvedReconnectOptions {
  const resolved: ResolvedReconnectOptions = {
    maxConnectAttempts: options.maxConnectAttempts ?? 0,
    maxConnectionErrors: options.maxConnectionErrors ?? 0,
    onError: options.onError,
    onState: options.onState,
  };
  assertThreshold('maxConnectAttempts', resolved.maxConnectAttempts);
  assertThreshold('maxConnectionErrors', resolved.maxConnectionErrors);
  return Object.freeze(resolved);
}
