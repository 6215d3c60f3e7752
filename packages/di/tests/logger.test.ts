import { describe, expect, it, vi } from 'vitest';

import { ConsoleLogger, NullLogger } from '../src/logging/logger.js';

describe('ConsoleLogger', () => {
  it('prints at or above the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: 'info', prefix: 'app' });

    logger.debug('hidden');
    logger.warn('creation failed', { type: 'Clock' });

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[WARN] [app] creation failed', { type: 'Clock' });
  });

  it('omits an empty context and the prefix when none is set', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new ConsoleLogger();

    logger.error('boom', {});
    logger.info('ready');

    expect(error).toHaveBeenCalledWith('[ERROR] boom');
    expect(info).toHaveBeenCalledWith('[INFO] ready');
  });

  it('prints debug output when asked to', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    new ConsoleLogger({ level: 'debug' }).debug('registered', { typeKey: 'Clock' });

    expect(debug).toHaveBeenCalledWith('[DEBUG] registered', { typeKey: 'Clock' });
  });
});

describe('NullLogger', () => {
  it('writes nothing', () => {
    const spies = (['debug', 'info', 'warn', 'error'] as const).map((level) =>
      vi.spyOn(console, level).mockImplementation(() => undefined)
    );
    const logger = new NullLogger();

    logger.debug();
    logger.info();
    logger.warn();
    logger.error();

    for (const spy of spies) expect(spy).not.toHaveBeenCalled();
  });
});
