import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { configure, resetConfig } from '../../src/config.js';
import { logger } from '../../src/logger.js';

describe('logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
    resetConfig();
  });

  function captureStderr() {
    return jest.spyOn(console, 'error').mockImplementation(() => undefined);
  }

  it('should prefix messages with their level', () => {
    configure({ logLevel: 'debug' });
    const stderr = captureStderr();

    logger.error('build failed');
    logger.warn('replacing class');
    logger.info('loaded');
    logger.debug('dispatch built');

    expect(stderr.mock.calls).toEqual([
      ['[ERROR] build failed'],
      ['[WARN] replacing class'],
      ['[INFO] loaded'],
      ['[DEBUG] dispatch built'],
    ]);
  });

  it('should drop messages below the configured level', () => {
    configure({ logLevel: 'warn' });
    const stderr = captureStderr();

    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('shown');

    expect(stderr.mock.calls).toEqual([['[WARN] shown']]);
  });

  it('should stay quiet when silent', () => {
    configure({ logLevel: 'silent' });
    const stderr = captureStderr();

    logger.error('hidden');

    expect(stderr).not.toHaveBeenCalled();
  });
});
