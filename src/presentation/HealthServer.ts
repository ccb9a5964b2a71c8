import { createServer, IncomingMessage, ServerResponse } from 'http';
import type { ILogger } from '../domain/ports/ILogger.js';
import {
  toHealthState,
  type ConnectionHealthState,
  type LifecycleState,
} from '../domain/entities/LifecycleState.js';

export interface HealthServerConfig {
  /** 0 picks a free port */
  port: number;
  host?: string;
}

/**
 * Read-only view of the controller the health endpoint reports on
 */
export interface LinkStatusSource {
  readonly state: LifecycleState | undefined;
  readonly connectAttempts: number;
  readonly connectionErrors: number;
}

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  state: LifecycleState | null;
  health: ConnectionHealthState;
  connectAttempts: number;
  connectionErrors: number;
  timestamp: string;
}

/**
 * HTTP health endpoint for watchdogs and load balancers
 */
export class HealthServer {
  private server: ReturnType<typeof createServer> | null = null;

  constructor(
    private readonly source: LinkStatusSource,
    private readonly logger: ILogger,
    private readonly config: HealthServerConfig
  ) {}

  /**
   * Port actually bound, or null when not listening
   */
  get port(): number | null {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      return null;
    }
    return address.port;
  }

  report(): HealthReport {
    const state = this.source.state;
    // Before start() the link is on its way up
    const health = state === undefined ? 'DEGRADED' : toHealthState(state);
    return {
      status: health === 'OFFLINE' ? 'unhealthy' : 'healthy',
      state: state ?? null,
      health,
      connectAttempts: this.source.connectAttempts,
      connectionErrors: this.source.connectionErrors,
      timestamp: new Date().toISOString(),
    };
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handleRequest(req, res);
      });
      this.server = server;

      server.once('error', reject);
      server.listen(this.config.port, this.config.host ?? '0.0.0.0', () => {
        server.off('error', reject);
        this.logger.info('Health server started', {
          port: this.port,
          host: this.config.host ?? '0.0.0.0',
        });
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }
      this.server = null;
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('Health server stopped');
        resolve();
      });
    });
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const method = req.method ?? 'GET';

    this.logger.debug('HTTP Request', { method, path: url.pathname });

    if (url.pathname === '/health' && method === 'GET') {
      const report = this.report();
      this.sendJson(res, report.status === 'healthy' ? 200 : 503, report);
      return;
    }

    this.sendJson(res, 404, { error: 'Not Found', path: url.pathname });
  }

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data, null, 2));
  }
}
