import { describe, it, expect } from 'vitest';
import { Writable } from 'stream';
import pino from 'pino';
import { PinoLogger } from './PinoLogger.js';

function capture(): { lines: Array<Record<string, unknown>>; logger: PinoLogger } {
  const lines: Array<Record<string, unknown>> = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      lines.push(JSON.parse(chunk.toString()));
      callback();
    },
  });
  return { lines, logger: new PinoLogger(pino({ level: 'trace' }, stream)) };
}

describe('PinoLogger', () => {
  it('should log messages with structured data', () => {
    const { lines, logger } = capture();

    logger.info('Link connected', { url: 'ws://localhost:9000' });
    logger.debug('No data');
    logger.trace('Ping sent', { seq: 1 });

    expect(lines[0]).toMatchObject({ level: 30, msg: 'Link connected', url: 'ws://localhost:9000' });
    expect(lines[1]).toMatchObject({ level: 20, msg: 'No data' });
    expect(lines[2]).toMatchObject({ level: 10, msg: 'Ping sent', seq: 1 });
  });

  it('should serialize Error instances under err', () => {
    const { lines, logger } = capture();

    logger.error('Reconnect loop failed', new Error('refused'), { attempts: 3 });

    expect(lines[0]).toMatchObject({
      level: 50,
      msg: 'Reconnect loop failed',
      attempts: 3,
      err: { type: 'Error', message: 'refused' },
    });
  });

  it('should keep non-Error values under error', () => {
    const { lines, logger } = capture();

    logger.fatal('Unexpected rejection', 'boom');

    expect(lines[0]).toMatchObject({ level: 60, msg: 'Unexpected rejection', error: 'boom' });
  });

  it('should carry bindings into child loggers', () => {
    const { lines, logger } = capture();

    logger.child({ component: 'ReconnectController' }).warn('Connection failure', { phase: 'establish' });

    expect(lines[0]).toMatchObject({
      level: 40,
      msg: 'Connection failure',
      component: 'ReconnectController',
      phase: 'establish',
    });
  });
});
