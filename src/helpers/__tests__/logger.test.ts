/**
 * Unit tests for the tagged logger
 */

import { createLogger, getLogLevel, setLogLevel } from '../logger';

describe('Logger', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    jest.restoreAllMocks();
  });

  it('should prefix messages with the component tag', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    setLogLevel('info');

    createLogger('Kalshi').info('fetched 12 markets', { series: 'KXNFLGAME' });

    expect(logSpy).toHaveBeenCalledWith('[Kalshi] fetched 12 markets', { series: 'KXNFLGAME' });
  });

  it('should route each level to its console method', () => {
    const debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('debug');

    const log = createLogger('Explorer');
    log.debug('a');
    log.warn('b');
    log.error('c');

    expect(debugSpy).toHaveBeenCalledWith('[Explorer] a');
    expect(warnSpy).toHaveBeenCalledWith('[Explorer] b');
    expect(errorSpy).toHaveBeenCalledWith('[Explorer] c');
  });

  it('should drop messages below the active level', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('warn');

    const log = createLogger('ESPN');
    log.info('hidden');
    log.warn('shown');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });
});
