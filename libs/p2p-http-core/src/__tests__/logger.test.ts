import { afterEach, describe, it, expect, vi } from 'vitest';
import { ConsoleLogger } from '../logger';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes the event name and passes meta through', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    new ConsoleLogger().info('p2p.cache.hit', { signature: 'GET /a.json' });
    expect(info).toHaveBeenCalledWith('[p2p] p2p.cache.hit', { signature: 'GET /a.json' });
  });

  it('omits empty meta', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    new ConsoleLogger('content').warn('p2p.cache.set.error', {});
    expect(warn).toHaveBeenCalledWith('[content] p2p.cache.set.error');
  });

  it('drops lines below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('p2p', 'warn');

    logger.debug('p2p.request.attempt');
    logger.error('p2p.request.failed');

    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[p2p] p2p.request.failed');
  });
});
