import {
  LogEntry,
  LogLevel,
  REDACTED,
  createLogger,
  redactContext,
  resetLogHandler,
  setLogHandler,
  setLogLevel,
} from '../src/logger';

describe('logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
    setLogLevel(LogLevel.Info);
  });

  afterAll(() => {
    resetLogHandler();
  });

  test('suppresses entries below the minimum level', () => {
    const log = createLogger();
    log.debug('hidden');
    log.info('shown');
    expect(entries.map((e) => e.message)).toEqual(['shown']);
  });

  test('child loggers carry their parent context', () => {
    const log = createLogger({ component: 'test' }).child({ requestId: 'req_1' });
    log.warn('careful', { projectId: 'proj_1' });
    expect(entries[0].level).toBe(LogLevel.Warn);
    expect(entries[0].context).toEqual({ component: 'test', requestId: 'req_1', projectId: 'proj_1' });
  });

  test('secret-named keys are redacted', () => {
    const log = createLogger();
    log.error('oops', { password: 'hunter22', passwordHash: 'abc', Authorization: 'Bearer x', accountId: 'acct_1' });
    expect(entries[0].context).toEqual({
      password: REDACTED,
      passwordHash: REDACTED,
      Authorization: REDACTED,
      accountId: 'acct_1',
    });
  });

  test('redactContext passes through undefined', () => {
    expect(redactContext(undefined)).toBeUndefined();
  });
});
