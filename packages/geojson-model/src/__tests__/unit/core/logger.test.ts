import { afterEach, describe, it, expect, vi } from 'vitest';
import { decodeGeoJson } from '../../../codec/decode.js';
import { Logger, createLogger, isLogLevel, setLogLevel } from '../../../core/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('error');
  });

  it('writes JSON lines with metadata', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const log = new Logger({ level: 'info', service: 'test', pretty: false });

    log.info('decoded', { file: 'a.json' });

    expect(info).toHaveBeenCalledTimes(1);
    const line = String(info.mock.calls[0]?.[0]);
    expect(JSON.parse(line)).toEqual({
      timestamp: expect.any(String),
      level: 'info',
      service: 'test',
      message: 'decoded',
      file: 'a.json',
    });
  });

  it('writes a readable line when pretty', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = new Logger({ level: 'warn', service: 'test', pretty: true });

    log.warn('slow file', { ms: 2 });

    expect(String(warn.mock.calls[0]?.[0])).toMatch(/^\[\S+\] WARN test: slow file \{"ms":2\}$/);
  });

  it('drops messages below its level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const log = new Logger({ level: 'info', service: 'test', pretty: true });

    log.debug('hidden');
    log.setLevel('debug');
    log.debug('shown');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(log.level).toBe('debug');
  });

  it('applies setLogLevel to child loggers', () => {
    const child = createLogger({ module: 'unit' });

    setLogLevel('info');

    expect(child.level).toBe('info');
  });

  it('logs decode failures at debug level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    setLogLevel('debug');

    expect(() => decodeGeoJson({ type: 'Circle' })).toThrow();

    expect(debug).toHaveBeenCalledTimes(1);
    expect(String(debug.mock.calls[0]?.[0])).toContain('GeoJSON decode failed');
  });

  it('recognizes level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
