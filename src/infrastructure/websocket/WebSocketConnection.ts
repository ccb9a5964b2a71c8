import WebSocket from 'ws';
import type { IConnection } from '../../domain/ports/IConnection.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { ConnectionDroppedError } from '../../domain/errors/ReconnectErrors.js';

export interface WebSocketConnectionConfig {
  url: string;
  protocols?: string | string[];
  headers?: Record<string, string>;
  /** Heartbeat interval in ms; 0 disables the heartbeat */
  pingInterval?: number;
  /** How long terminate() waits for the close handshake before killing the socket */
  closeTimeout?: number;
}

interface DropOutcome {
  error: Error | null;
}

const NORMAL_CLOSURE = 1000;
const NO_STATUS_RECEIVED = 1005;
const ABNORMAL_CLOSURE = 1006;

/**
 * IConnection over a `ws` client socket. One socket per establish() call;
 * awaitDrop() settles when that socket closes.
 */
export class WebSocketConnection implements IConnection {
  private ws: WebSocket | null = null;
  private dropped: Promise<DropOutcome> | null = null;
  private terminating = false;
  private pingTimer: NodeJS.Timeout | null = null;
  private readonly pingInterval: number;
  private readonly closeTimeout: number;

  constructor(
    private readonly config: WebSocketConnectionConfig,
    private readonly logger: ILogger
  ) {
    this.pingInterval = config.pingInterval ?? 30000;
    this.closeTimeout = config.closeTimeout ?? 5000;
  }

  get connected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  establish(): Promise<void> {
    this.terminating = false;

    return new Promise((resolve, reject) => {
      this.logger.info('Connecting', { url: this.config.url });

      const ws = new WebSocket(this.config.url, this.config.protocols, {
        headers: this.config.headers,
      });
      this.ws = ws;

      let opened = false;
      let heartbeatExpired = false;
      let socketError: Error | null = null;
      let settleDrop: (outcome: DropOutcome) => void = () => {};

      ws.on('open', () => {
        opened = true;
        this.dropped = new Promise<DropOutcome>((r) => {
          settleDrop = r;
        });
        this.logger.debug('WebSocket connection opened');
        this.startHeartbeat(ws, () => {
          heartbeatExpired = true;
        });
        resolve();
      });

      ws.on('error', (error) => {
        if (!opened) {
          // Reported by the controller as a connect failure
          this.logger.debug('WebSocket error before open', { error: error.message });
          reject(error);
          return;
        }
        this.logger.error('WebSocket error', error);
        socketError ??= error;
      });

      ws.on('close', (code, reason) => {
        const reasonText = reason.toString();
        this.logger.info('WebSocket closed', { code, reason: reasonText });
        this.stopHeartbeat();
        if (this.ws === ws) {
          this.ws = null;
        }

        if (!opened) {
          reject(new ConnectionDroppedError(code, reasonText || 'closed before open'));
          return;
        }

        if (this.terminating) {
          settleDrop({ error: null });
        } else if (heartbeatExpired) {
          settleDrop({ error: new ConnectionDroppedError(ABNORMAL_CLOSURE, 'heartbeat timeout') });
        } else if (socketError) {
          settleDrop({ error: socketError });
        } else if (code === NORMAL_CLOSURE || code === NO_STATUS_RECEIVED) {
          settleDrop({ error: null });
        } else {
          settleDrop({ error: new ConnectionDroppedError(code, reasonText) });
        }
      });
    });
  }

  async awaitDrop(): Promise<void> {
    const dropped = this.dropped;
    if (!dropped) {
      return;
    }

    const { error } = await dropped;
    if (this.dropped === dropped) {
      this.dropped = null;
    }
    if (error) {
      throw error;
    }
  }

  async terminate(): Promise<void> {
    this.terminating = true;
    const ws = this.ws;
    if (!ws || ws.readyState === WebSocket.CLOSED) {
      return;
    }

    this.logger.info('Closing WebSocket', { url: this.config.url });
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.logger.warn('Close handshake timed out, terminating socket');
        ws.terminate();
      }, this.closeTimeout);

      ws.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      ws.close(NORMAL_CLOSURE, 'closing');
    });
  }

  /**
   * Pings every pingInterval; a ping still unanswered at the next tick kills the socket.
   */
  private startHeartbeat(ws: WebSocket, onExpired: () => void): void {
    this.stopHeartbeat();
    if (this.pingInterval === 0) {
      return;
    }

    let awaitingPong = false;
    ws.on('pong', () => {
      awaitingPong = false;
    });

    this.pingTimer = setInterval(() => {
      if (ws.readyState !== WebSocket.OPEN) {
        return;
      }
      if (awaitingPong) {
        this.logger.warn('Heartbeat timed out', { url: this.config.url });
        onExpired();
        ws.terminate();
        return;
      }
      awaitingPong = true;
      ws.ping();
    }, this.pingInterval);
  }

  private stopHeartbeat(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }
}
