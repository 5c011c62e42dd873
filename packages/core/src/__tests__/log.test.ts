import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createLogger, formatLogLine, silentLogger } from '../log.js';
import { captureSink } from './fakes.js';

describe('formatLogLine', () => {
  it('prints info lines without a level tag', () => {
    assert.equal(formatLogLine('info', 'Connected'), 'Connected');
  });

  it('tags other levels and appends fields as JSON', () => {
    assert.equal(formatLogLine('warn', 'SQL rejected', { reason: 'DROP' }), 'WARN: SQL rejected {"reason":"DROP"}');
  });

  it('omits an empty field set', () => {
    assert.equal(formatLogLine('error', 'Failed', {}), 'ERROR: Failed');
  });
});

describe('createLogger', () => {
  it('drops messages below the threshold', () => {
    const { lines, sink } = captureSink();
    const logger = createLogger('warn', sink);
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too', { code: 7 });
    assert.deepEqual(lines, ['WARN: shown', 'ERROR: shown too {"code":7}']);
  });

  it('emits everything at debug', () => {
    const { lines, sink } = captureSink();
    const logger = createLogger('debug', sink);
    logger.debug('a');
    logger.info('b');
    assert.deepEqual(lines, ['DEBUG: a', 'b']);
  });

  it('silent level emits nothing', () => {
    const { lines, sink } = captureSink();
    createLogger('silent', sink).error('nothing');
    assert.deepEqual(lines, []);
    assert.doesNotThrow(() => silentLogger.error('nothing'));
  });
});
