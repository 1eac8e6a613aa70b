import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  StructuredLogger,
  getCurrentRequestId,
  isLogLevel,
  loggers,
  runWithRequestId,
  setLogLevel,
  type LogEntry,
} from '../../src/lib/logger.js';

function captureConsole() {
  return {
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
  };
}

function entries(spy: { mock: { calls: unknown[][] } }): LogEntry[] {
  return spy.mock.calls.map((call) => JSON.parse(String(call[0])));
}

describe('StructuredLogger', () => {
  let errorSpy: ReturnType<typeof captureConsole>['error'];
  let warnSpy: ReturnType<typeof captureConsole>['warn'];

  beforeEach(() => {
    ({ error: errorSpy, warn: warnSpy } = captureConsole());
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write one JSON entry per line to stderr', () => {
    const logger = new StructuredLogger('Test', { minLevel: 'debug' });

    logger.info('hello', { url: 'https://nac.test' });

    const [entry] = entries(errorSpy);
    expect(entry.level).toBe('info');
    expect(entry.message).toBe('hello');
    expect(entry.component).toBe('Test');
    expect(entry.context).toEqual({ url: 'https://nac.test' });
    expect(Number.isNaN(Date.parse(entry.timestamp))).toBe(false);
  });

  it('should send warnings through console.warn', () => {
    new StructuredLogger('Test').warn('careful');

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should drop entries below the minimum level', () => {
    const logger = new StructuredLogger('Test', { minLevel: 'warn' });

    logger.debug('quiet');
    logger.info('quiet');
    logger.warn('loud');

    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('should log nothing when silent', () => {
    const logger = new StructuredLogger('Test', { minLevel: 'silent' });

    logger.error('nothing', new Error('x'));

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should include error details and omit the stack when asked', () => {
    const logger = new StructuredLogger('Test', { includeStack: false });
    const error = Object.assign(new Error('refused'), { code: 'ECONNREFUSED' });

    logger.error('request failed', error);

    const [entry] = entries(errorSpy);
    expect(entry.error).toEqual({ name: 'Error', message: 'refused', code: 'ECONNREFUSED' });
  });

  it('should attach the current request id to nested entries', () => {
    const logger = new StructuredLogger('Test', { minLevel: 'debug' });

    runWithRequestId('req-1', () => logger.debug('inside'));
    logger.debug('outside');

    const [inside, outside] = entries(errorSpy);
    expect(inside.context).toEqual({ requestId: 'req-1' });
    expect(outside.context).toBeUndefined();
  });

  it('should use a custom formatter', () => {
    const logger = new StructuredLogger('Test', { formatter: (entry) => `${entry.level}:${entry.message}` });

    logger.info('plain');

    expect(errorSpy).toHaveBeenCalledWith('info:plain');
  });

  describe('trackAsync', () => {
    it('should log completion with duration and return the result', async () => {
      const logger = new StructuredLogger('Test');

      await expect(logger.trackAsync('listInstances', async () => 3)).resolves.toBe(3);

      const [entry] = entries(errorSpy);
      expect(entry.message).toBe('listInstances completed');
      expect(typeof entry.context?.duration).toBe('number');
      expect(typeof entry.context?.requestId).toBe('string');
      expect(getCurrentRequestId()).toBeUndefined();
    });

    it('should tag entries from other components with the operation request id', async () => {
      const api = new StructuredLogger('API');
      const http = new StructuredLogger('Http', { minLevel: 'debug' });

      await api.trackAsync('getTask', async () => http.debug('request sent'));

      const [inner, done] = entries(errorSpy);
      expect(inner.component).toBe('Http');
      expect(inner.context?.requestId).toBe(done.context?.requestId);
    });

    it('should keep request ids apart for overlapping operations', async () => {
      const logger = new StructuredLogger('Test', { minLevel: 'debug' });
      let releaseFirst: () => void = () => {};
      const firstGate = new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });

      const first = logger.trackAsync('first', async () => {
        await firstGate;
        logger.debug('first step');
      });
      const second = logger.trackAsync('second', async () => {
        logger.debug('second step');
        releaseFirst();
      });
      await Promise.all([first, second]);

      const byMessage = new Map(entries(errorSpy).map((entry) => [entry.message, entry.context?.requestId]));
      expect(byMessage.get('first step')).toBe(byMessage.get('first completed'));
      expect(byMessage.get('second step')).toBe(byMessage.get('second completed'));
      expect(byMessage.get('first step')).not.toBe(byMessage.get('second step'));
    });

    it('should log and rethrow failures', async () => {
      const logger = new StructuredLogger('Test');
      const failure = new Error('boom');

      await expect(logger.trackAsync('getTask', async () => Promise.reject(failure))).rejects.toBe(failure);

      const [entry] = entries(errorSpy);
      expect(entry.level).toBe('error');
      expect(entry.message).toBe('getTask failed');
      expect(entry.error?.message).toBe('boom');
    });
  });
});

describe('setLogLevel', () => {
  afterEach(() => {
    setLogLevel('warn');
  });

  it('should update every component logger', () => {
    setLogLevel('debug');

    expect(Object.values(loggers).map((logger) => logger.getMinLevel())).toEqual([
      'debug',
      'debug',
      'debug',
      'debug',
      'debug',
    ]);
  });
});

describe('helpers', () => {
  it('should recognize log levels', () => {
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
