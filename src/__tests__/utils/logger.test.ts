import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger } from '../../utils/logger/logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop debug output unless verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createLogger(false);

    logger.debug('removed (0,0)');
    logger.info('Explored 3 nodes');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('Explored 3 nodes');
  });

  it('should print debug output when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger(true).debug('removed (0,0)');
    expect(log).toHaveBeenCalledWith('removed (0,0)');
  });

  it('should send errors to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger(false).error('Unknown search type: bfs');
    expect(error).toHaveBeenCalledWith('Unknown search type: bfs');
  });
});
