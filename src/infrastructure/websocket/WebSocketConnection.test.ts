import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createServer as createNetServer, type Server as NetServer, type Socket } from 'net';
import { createHash } from 'crypto';
import { WebSocketServer, type ServerOptions, type WebSocket as ServerSocket } from 'ws';
import { WebSocketConnection } from './WebSocketConnection.js';
import { ReconnectController } from '../../application/ReconnectController.js';
import { ConnectionDroppedError } from '../../domain/errors/ReconnectErrors.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { LifecycleState } from '../../domain/entities/LifecycleState.js';

function listen(options: ServerOptions = {}): Promise<{ server: WebSocketServer; url: string }> {
  return new Promise((resolve, reject) => {
    const server = new WebSocketServer({ port: 0, host: '127.0.0.1', ...options });
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      if (!address || typeof address === 'string') {
        reject(new Error(`Unexpected server address ${address}`));
        return;
      }
      resolve({ server, url: `ws://127.0.0.1:${address.port}` });
    });
  });
}

function shutdown(server: WebSocketServer): Promise<void> {
  for (const client of server.clients) {
    client.terminate();
  }
  return new Promise((resolve) => server.close(() => resolve()));
}

function nextConnection(server: WebSocketServer): Promise<ServerSocket> {
  return new Promise((resolve) => server.once('connection', resolve));
}

const WS_GUID = '258EAFA5-E914-47DA-95CA-C5AB0DC85B11';

interface SilentPeer {
  url: string;
  close(): Promise<void>;
}

/**
 * Raw TCP peer that accepts the WebSocket upgrade and then never answers,
 * not even to a close frame.
 */
function listenSilentPeer(): Promise<SilentPeer> {
  const sockets: Socket[] = [];
  const peerErrors: Error[] = [];
  const server: NetServer = createNetServer((socket) => {
    sockets.push(socket);
    socket.on('error', (error) => peerErrors.push(error));

    let head = '';
    let upgraded = false;
    socket.on('data', (chunk) => {
      if (upgraded) return;
      head += chunk.toString('latin1');
      if (!head.includes('\r\n\r\n')) return;

      const key = /sec-websocket-key:\s*(\S+)/i.exec(head)?.[1] ?? '';
      const accept = createHash('sha1').update(key + WS_GUID).digest('base64');
      upgraded = true;
      socket.write(
        [
          'HTTP/1.1 101 Switching Protocols',
          'Upgrade: websocket',
          'Connection: Upgrade',
          `Sec-WebSocket-Accept: ${accept}`,
          '',
          '',
        ].join('\r\n')
      );
    });
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (!address || typeof address === 'string') {
        reject(new Error('Silent peer has no TCP address'));
        return;
      }
      resolve({
        url: `ws://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done) => {
            for (const socket of sockets) {
              socket.destroy();
            }
            server.close(() => done());
          }),
      });
    });
  });
}

describe('WebSocketConnection', () => {
  let logger: ILogger;
  let server: WebSocketServer | null;

  beforeEach(() => {
    logger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };
    server = null;
  });

  afterEach(async () => {
    if (server) {
      await shutdown(server);
    }
  });

  it('should resolve awaitDrop when the server closes normally', async () => {
    const listening = await listen();
    server = listening.server;
    const connection = new WebSocketConnection({ url: listening.url, pingInterval: 0 }, logger);

    const accepted = nextConnection(server);
    await connection.establish();
    expect(connection.connected).toBe(true);

    (await accepted).close(1000, 'bye');

    await expect(connection.awaitDrop()).resolves.toBeUndefined();
    expect(connection.connected).toBe(false);
  });

  it('should reject awaitDrop when the server closes abnormally', async () => {
    const listening = await listen();
    server = listening.server;
    const connection = new WebSocketConnection({ url: listening.url, pingInterval: 0 }, logger);

    const accepted = nextConnection(server);
    await connection.establish();
    (await accepted).close(4001, 'kicked');

    const error = await connection.awaitDrop().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectionDroppedError);
    expect(error).toHaveProperty('code', 4001);
    expect(error).toHaveProperty('reason', 'kicked');
  });

  it('should reject establish when nothing is listening', async () => {
    const listening = await listen();
    await shutdown(listening.server);
    const connection = new WebSocketConnection({ url: listening.url, pingInterval: 0 }, logger);

    await expect(connection.establish()).rejects.toThrow();
    expect(connection.connected).toBe(false);
    expect(logger.error).not.toHaveBeenCalled();
    expect(logger.debug).toHaveBeenCalledWith('WebSocket error before open', {
      error: expect.any(String),
    });
  });

  it('should resolve awaitDrop immediately without a connection', async () => {
    const connection = new WebSocketConnection({ url: 'ws://127.0.0.1:1', pingInterval: 0 }, logger);
    await expect(connection.awaitDrop()).resolves.toBeUndefined();
    await expect(connection.terminate()).resolves.toBeUndefined();
  });

  it('should unblock a pending awaitDrop when terminated', async () => {
    const listening = await listen();
    server = listening.server;
    const connection = new WebSocketConnection({ url: listening.url, pingInterval: 0 }, logger);

    await connection.establish();
    const drop = connection.awaitDrop();
    await connection.terminate();

    await expect(drop).resolves.toBeUndefined();
  });

  it('should abort a pending establish when terminated', async () => {
    let reached: () => void = () => {};
    const upgradeRequested = new Promise<void>((resolve) => {
      reached = resolve;
    });
    let release: (verified: boolean) => void = () => {};
    const listening = await listen({
      verifyClient: (_info, callback) => {
        release = callback;
        reached();
      },
    });
    server = listening.server;
    const connection = new WebSocketConnection({ url: listening.url, pingInterval: 0 }, logger);

    const establishing = connection.establish().catch((e: unknown) => e);
    await upgradeRequested;
    await connection.terminate();
    release(false);

    expect(await establishing).toBeInstanceOf(Error);
    expect(connection.connected).toBe(false);
    await expect(connection.awaitDrop()).resolves.toBeUndefined();
  });

  it('should kill the socket when the close handshake times out', async () => {
    const peer = await listenSilentPeer();
    const connection = new WebSocketConnection(
      { url: peer.url, pingInterval: 0, closeTimeout: 100 },
      logger
    );

    try {
      await connection.establish();
      const drop = connection.awaitDrop();

      const started = Date.now();
      await connection.terminate();
      const elapsed = Date.now() - started;

      await expect(drop).resolves.toBeUndefined();
      expect(elapsed).toBeGreaterThanOrEqual(90);
      expect(elapsed).toBeLessThan(2000);
      expect(logger.warn).toHaveBeenCalledWith('Close handshake timed out, terminating socket');
      expect(connection.connected).toBe(false);
    } finally {
      await peer.close();
    }
  });

  it('should fail the drop when the heartbeat goes unanswered', async () => {
    const listening = await listen({ autoPong: false });
    server = listening.server;
    const connection = new WebSocketConnection({ url: listening.url, pingInterval: 25 }, logger);

    await connection.establish();

    const error = await connection.awaitDrop().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectionDroppedError);
    expect(error).toHaveProperty('code', 1006);
    expect(error).toHaveProperty('reason', 'heartbeat timeout');
  });

  it('should be kept alive by a ReconnectController until closed', async () => {
    const listening = await listen();
    server = listening.server;
    let accepted = 0;
    server.on('connection', (socket) => {
      accepted++;
      if (accepted === 1) {
        socket.close(1000, 'rotate');
      }
    });

    const states: LifecycleState[] = [];
    let reconnected: () => void = () => {};
    const secondConnect = new Promise<void>((resolve) => {
      reconnected = resolve;
    });
    const connection = new WebSocketConnection({ url: listening.url, pingInterval: 0 }, logger);
    const controller = new ReconnectController(connection, logger, {
      onState: (state) => {
        states.push(state);
        if (state === 'connected' && states.filter((s) => s === 'connected').length === 2) {
          reconnected();
        }
      },
    });

    const run = controller.start();
    await secondConnect;
    await controller.close();

    await expect(run).resolves.toBeUndefined();
    expect(accepted).toBe(2);
    expect(states).toEqual([
      'connecting',
      'connected',
      'disconnected',
      'reconnecting',
      'connected',
      'disconnected',
      'closed',
    ]);
  });
});
