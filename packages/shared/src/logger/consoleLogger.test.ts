import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger } from './consoleLogger';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes debug/info/warn when the level allows it and handles error branches', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger('debug');

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(debugSpy).toHaveBeenCalledWith('d');
    expect(infoSpy).toHaveBeenCalledWith('i');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));
  });

  it('drops messages below the configured level', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger('warn');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('w');
  });

  it('still writes errors when silent', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger('silent');
    logger.warn('w');
    logger.error(new Error('boom'), 'failed');

    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('failed', expect.any(Error));
  });

  it('changes level at runtime', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.info('hidden');
    logger.setLevel('info');
    logger.info('shown');

    expect(logger.getLevel()).toBe('info');
    expect(infoSpy).toHaveBeenCalledTimes(1);
    expect(infoSpy).toHaveBeenCalledWith('shown');
  });

  it('scopes child loggers with prefixes and merges bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger('info');
    logger.child({}).info('no-prefix');
    expect(infoSpy).toHaveBeenCalledWith('no-prefix');

    logger.child({ a: 1 }).child({ b: 'x' }).info('hello');
    expect(infoSpy).toHaveBeenCalledWith('[a=1 b=x] hello');

    logger.child({ pacscript: 'neofetch' }).warn('warn');
    expect(warnSpy).toHaveBeenCalledWith('[pacscript=neofetch] warn');
  });
});
