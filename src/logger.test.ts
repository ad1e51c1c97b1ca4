import Logger from './logger';
import { LogLevel } from './types/gauge-types';

describe('Logger', () => {
  let logger: Logger;
  let info: jest.SpyInstance;
  let debug: jest.SpyInstance;

  beforeEach(() => {
    logger = new Logger();
    logger.disableColors();
    info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('prints the configured header and leftover context', () => {
    logger.setLogFormat(['level', 'logger']);
    const category = logger.createLogger('GaugeProtocol');
    category.info('hello', { command: 'D' });
    expect(info).toHaveBeenCalledWith('[INFO][GaugeProtocol]', 'hello', '{"command":"D"}');
  });

  test('puts exchange fields in the header', () => {
    logger.setLogFormat(['level', 'command', 'response', 'responseTime']);
    logger.info('done', { command: 'D', response: '+001.00NTO', responseTime: 12 });
    expect(info).toHaveBeenCalledWith('[INFO][C:D][R:"+001.00NTO"][RT:12ms]', 'done');
  });

  test('filters below the global level', () => {
    logger.setLevel('warn');
    logger.info('hidden');
    expect(info).not.toHaveBeenCalled();
    expect(logger.getLevel()).toBe('warn');
  });

  test('category levels override the global one', () => {
    const category = logger.createLogger('NodeSerialTransport');
    category.setLevel('trace');
    category.trace('bytes');
    expect(debug).toHaveBeenCalledTimes(1);
    category.pause();
    category.info('muted');
    expect(info).not.toHaveBeenCalled();
  });

  test('watch sees every emitted message', () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const seen: LogLevel[] = [];
    logger.watch(({ level }) => seen.push(level));
    logger.info('a');
    logger.error('b');
    logger.clearWatch();
    logger.info('c');
    expect(seen).toEqual(['info', 'error']);
  });

  test('counts messages per level', () => {
    logger.info('a');
    logger.info('b');
    logger.debug('hidden');
    expect(logger.getCounts().info).toBe(2);
    expect(logger.getCounts().debug).toBe(0);
  });

  test('rejects invalid settings', () => {
    expect(() => logger.setLogFormat(['level', 'transport'])).toThrow('Invalid log format');
    expect(() => logger.setCustomFormatter('timestamp', String)).toThrow(
      'Invalid formatter field: timestamp'
    );
    expect(() => logger.setRateLimit(-1)).toThrow('Rate limit must be a non-negative number');
    expect(() => logger.createLogger('')).toThrow('Logger name required');
  });

  test('custom formatters change the header', () => {
    logger.setLogFormat(['logger']);
    logger.setCustomFormatter('logger', v => `<${String(v)}>`);
    logger.createLogger('GaugeSession').info('opened');
    expect(info).toHaveBeenCalledWith('<GaugeSession>', 'opened');
  });

  test('global context is merged into the header', () => {
    logger.setLogFormat(['path']);
    logger.setGlobalContext({ path: '/dev/ttyUSB0' });
    logger.info('ready');
    expect(info).toHaveBeenCalledWith('[P:/dev/ttyUSB0]', 'ready');
  });

  test('disable silences everything', () => {
    logger.disable();
    logger.error('nothing');
    expect(logger.isEnabled()).toBe(false);
    expect(logger.getCounts().error).toBe(0);
  });
});
