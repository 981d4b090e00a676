import { createLogger, setLogLevel } from '../src/logging';

beforeEach(() => {
  jest.spyOn(console, 'debug').mockImplementation(() => { });
  jest.spyOn(console, 'log').mockImplementation(() => { });
  jest.spyOn(console, 'warn').mockImplementation(() => { });
  jest.spyOn(console, 'error').mockImplementation(() => { });
});

afterEach(() => {
  setLogLevel('info');
  jest.restoreAllMocks();
});

describe('createLogger', () => {
  it('should prefix messages with the scope', () => {
    const logger = createLogger('Coordinator');
    logger.info('Started');
    expect(console.log).toHaveBeenCalledWith('[Coordinator] Started');
  });

  it('should pass extra details through', () => {
    const logger = createLogger('Queue');
    const err = new Error('boom');
    logger.error('Job failed:', err);
    expect(console.error).toHaveBeenCalledWith('[Queue] Job failed:', err);
  });

  it('should nest child scopes', () => {
    const logger = createLogger('Coordinator').child('Watcher');
    expect(logger.scope).toBe('Coordinator:Watcher');
    logger.warn('Skipped');
    expect(console.warn).toHaveBeenCalledWith('[Coordinator:Watcher] Skipped');
  });

  it('should drop debug output at the default level', () => {
    createLogger('Host').debug('Dispatched');
    expect(console.debug).not.toHaveBeenCalled();
  });

  it('should honor the configured level', () => {
    const logger = createLogger('Host');

    setLogLevel('debug');
    logger.debug('Dispatched');
    expect(console.debug).toHaveBeenCalledWith('[Host] Dispatched');

    setLogLevel('error');
    logger.info('quiet');
    logger.warn('quiet');
    logger.error('loud');
    expect(console.log).not.toHaveBeenCalled();
    expect(console.warn).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith('[Host] loud');
  });
});
