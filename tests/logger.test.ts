import { strict as assert } from 'node:assert';
import { Writable } from 'node:stream';
import { afterEach, test } from 'node:test';
import { createLogger, initLogging, isLogLevel, shutdownLogging } from '../src/utils/logger';

function createCollector(): { stream: Writable; lines: () => string[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return {
    stream,
    lines: () => chunks.join('').split('\n').filter(Boolean),
  };
}

const TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z /;

afterEach(async () => {
  await shutdownLogging();
});

test('loggers stay silent until logging is initialised', () => {
  const collector = createCollector();
  const logger = createLogger('early');

  logger.error('lost');
  initLogging({ stream: collector.stream, level: 'debug' });
  logger.info('kept');

  const lines = collector.lines();
  assert.equal(lines.length, 1);
  assert.match(lines[0], TIMESTAMP);
  assert.equal(lines[0].replace(TIMESTAMP, ''), '[early] INFO: kept');
});

test('messages below the configured level are dropped', () => {
  const collector = createCollector();
  initLogging({ stream: collector.stream, level: 'info' });
  const logger = createLogger('scanner');

  logger.debug('hidden');
  logger.info('Scan finished');
  logger.warn('Symlink loop detected at /tmp/x. Skipping.');
  logger.error('Permission denied for directory: /tmp/y');

  assert.deepEqual(
    collector.lines().map((line) => line.replace(TIMESTAMP, '')),
    [
      '[scanner] INFO: Scan finished',
      '[scanner] WARN: Symlink loop detected at /tmp/x. Skipping.',
      '[scanner] ERROR: Permission denied for directory: /tmp/y',
    ]
  );
});

test('extra details are written after the message', () => {
  const collector = createCollector();
  initLogging({ stream: collector.stream, level: 'debug' });

  createLogger('session').debug('Toggled', 3);

  assert.deepEqual(
    collector.lines().map((line) => line.replace(TIMESTAMP, '')),
    ['[session] DEBUG: Toggled 3']
  );
});

test('after shutdown nothing more is written and a caller-owned stream stays open', async () => {
  const collector = createCollector();
  initLogging({ stream: collector.stream });
  const logger = createLogger('app');

  logger.info('before');
  await shutdownLogging();
  logger.info('after');

  assert.equal(collector.lines().length, 1);
  assert.equal(collector.stream.writableEnded, false);
});

test('isLogLevel accepts only the four levels', () => {
  assert.equal(isLogLevel('debug'), true);
  assert.equal(isLogLevel('error'), true);
  assert.equal(isLogLevel('trace'), false);
  assert.equal(isLogLevel('INFO'), false);
});
