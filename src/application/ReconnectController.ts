import type { IConnection } from '../domain/ports/IConnection.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { LifecycleState } from '../domain/entities/LifecycleState.js';
import { ControllerStateError, toError } from '../domain/errors/ReconnectErrors.js';
import {
  resolveReconnectOptions,
  type ReconnectOptions,
  type ResolvedReconnectOptions,
} from './ReconnectOptions.js';

const noop = (): void => {};

/**
 * Keeps a connection alive: establishes it, waits for it to drop and
 * re-establishes it, until a retry threshold is exhausted, the error hook
 * vetoes, or close() is requested from another task.
 *
 * Single use: start() may only be called once per instance.
 */
export class ReconnectController {
  private readonly options: ResolvedReconnectOptions;
  private readonly logger: ILogger;
  private stopping = false;
  /** Settles once the loop started by start() has unwound, however it ended */
  private exited: Promise<void> | null = null;
  private _state: LifecycleState | undefined;
  private _connectAttempts = 0;
  private _connectionErrors = 0;

  constructor(
    private readonly connection: IConnection,
    logger: ILogger,
    options: ReconnectOptions = {}
  ) {
    this.options = resolveReconnectOptions(options);
    this.logger = logger.child({ component: 'ReconnectController' });
  }

  /** Last emitted lifecycle state, undefined before start() */
  get state(): LifecycleState | undefined {
    return this._state;
  }

  /** Consecutive failed establish() calls */
  get connectAttempts(): number {
    return this._connectAttempts;
  }

  /** Consecutive failed awaitDrop() calls */
  get connectionErrors(): number {
    return this._connectionErrors;
  }

  get stopRequested(): boolean {
    return this.stopping;
  }

  /**
   * Runs the reconnect loop. Resolves on a clean close(); rejects with the
   * last connect error, the last wait error or the error hook's veto.
   */
  start(): Promise<void> {
    if (this.exited) {
      return Promise.reject(
        new ControllerStateError('ReconnectController has already been started')
      );
    }
    const loop = this.run();
    this.exited = loop.then(noop, noop);
    return loop;
  }

  /**
   * Requests shutdown, terminates the connection and waits for start() to
   * unwind. Rejects with the terminate() error, if any.
   */
  async close(): Promise<void> {
    if (!this.stopping) {
      this.stopping = true;
      this.logger.info('Close requested', { state: this._state });
    }

    let terminateError: Error | null = null;
    try {
      await this.connection.terminate();
    } catch (error) {
      terminateError = toError(error);
      this.logger.warn('Terminating connection failed', { error: terminateError.message });
    }

    if (this.exited) {
      await this.exited;
    }

    if (terminateError) {
      throw terminateError;
    }
  }

  private async run(): Promise<void> {
    const { maxConnectAttempts, maxConnectionErrors } = this.options;

    this.emit('connecting');
    for (;;) {
      if (this.stopping) {
        this.emit('closed');
        this.logger.info('Reconnect loop closed');
        return;
      }

      let connectError: Error | null = null;
      let veto: Error | null = null;
      try {
        await this.connection.establish();
      } catch (error) {
        connectError = toError(error);
      }

      if (connectError) {
        veto = this.notifyError(connectError, 'establish');
        this.emit('failing');
        this._connectAttempts++;
      } else {
        this.emit('connected');
        this._connectAttempts = 0;
      }

      if (veto) {
        throw this.fail(veto, 'error hook veto');
      }
      if (connectError && maxConnectAttempts > 0 && this._connectAttempts >= maxConnectAttempts) {
        throw this.fail(connectError, 'max connect attempts reached');
      }
      if (connectError) {
        this.emit('reconnecting');
        continue;
      }

      let waitError: Error | null = null;
      try {
        await this.connection.awaitDrop();
      } catch (error) {
        waitError = toError(error);
      }

      if (waitError) {
        veto = this.notifyError(waitError, 'awaitDrop');
        this.emit('failing');
        this._connectionErrors++;
      } else {
        this.emit('disconnected');
        this._connectionErrors = 0;
      }

      if (veto) {
        throw this.fail(veto, 'error hook veto');
      }
      if (waitError && maxConnectionErrors > 0 && this._connectionErrors >= maxConnectionErrors) {
        throw this.fail(waitError, 'max connection errors reached');
      }

      // Shutting down: the next iteration emits closed instead
      if (!this.stopping) {
        this.emit('reconnecting');
      }
    }
  }

  private notifyError(error: Error, phase: 'establish' | 'awaitDrop'): Error | null {
    this.logger.warn('Connection failure', {
      phase,
      error: error.message,
      connectAttempts: this._connectAttempts,
      connectionErrors: this._connectionErrors,
    });
    if (this.options.onError === undefined) {
      return null;
    }
    return this.options.onError(error) ?? null;
  }

  private fail(error: Error, reason: string): Error {
    this.emit('failed');
    this.logger.error('Reconnect loop failed', error, {
      reason,
      connectAttempts: this._connectAttempts,
      connectionErrors: this._connectionErrors,
    });
    return error;
  }

  private emit(state: LifecycleState): void {
    this.logger.debug('Lifecycle state changed', { from: this._state, to: state });
    this._state = state;
    if (this.options.onState !== undefined) {
      this.options.onState(state);
    }
  }
}
