import { ConsoleLogger } from '../../src/infrastructure/common/ConsoleLogger';

describe('ConsoleLogger', () => {
  let info: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should write one JSON object per entry with the child context', () => {
    const logger = new ConsoleLogger('info', 'json').child({ userId: 'u1' });

    logger.info('Turn handled', { intent: 'buddy_response' });

    expect(info).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(info.mock.calls[0][0]));
    expect(entry).toEqual({
      timestamp: expect.any(String),
      level: 'info',
      message: 'Turn handled',
      userId: 'u1',
      intent: 'buddy_response'
    });
  });

  it('should write pretty lines with context and metadata', () => {
    const logger = new ConsoleLogger('info', 'pretty', { userId: 'u1' });

    logger.info('hello', { a: 1 });

    expect(String(info.mock.calls[0][0])).toMatch(/ \[INFO\] \[userId=u1\] hello \{"a":1\}$/);
  });

  it('should drop entries below the level', () => {
    const logger = new ConsoleLogger('warn', 'json');

    logger.info('quiet');
    logger.error('loud', new Error('boom'));

    expect(info).not.toHaveBeenCalled();
    expect(JSON.parse(String(error.mock.calls[0][0]))).toMatchObject({ level: 'error', message: 'loud', error: 'boom' });
  });

  it('should change level at runtime', () => {
    const logger = new ConsoleLogger('error', 'json');

    logger.setLevel('info');
    logger.info('now visible');

    expect(info).toHaveBeenCalledTimes(1);
  });
});
