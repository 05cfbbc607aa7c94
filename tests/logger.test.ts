import { describe, it, expect, vi, afterEach } from 'vitest';
import { LogLevel, formatLog, logger, setLogLevel } from '../src/utils/logger';

describe('formatLog', () => {
  it('renders level, message and metadata', () => {
    expect(
      formatLog({
        level: LogLevel.INFO,
        message: 'State saved: 3 listings',
        timestamp: '2026-10-18T12:00:00.000Z',
        metadata: { file: 'state.json' },
      })
    ).toBe('[2026-10-18T12:00:00.000Z] INFO: State saved: 3 listings {"file":"state.json"}');
  });

  it('omits empty metadata', () => {
    expect(
      formatLog({ level: LogLevel.WARN, message: 'x', timestamp: '2026-10-18T12:00:00.000Z', metadata: {} })
    ).toBe('[2026-10-18T12:00:00.000Z] WARN: x');
  });
});

describe('logger', () => {
  afterEach(() => {
    setLogLevel(LogLevel.INFO);
    vi.restoreAllMocks();
  });

  it('drops entries below the threshold', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel(LogLevel.WARN);

    logger.info('hidden');
    logger.warn('shown');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('serializes errors', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logger.error('Error saving state', new Error('EACCES'), { file: 'state.json' });

    const line = String(errorSpy.mock.calls[0]?.[0]);
    expect(line).toContain('ERROR: Error saving state {"file":"state.json","error":{"name":"Error","message":"EACCES"');
  });
});
