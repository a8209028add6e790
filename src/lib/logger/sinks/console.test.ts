import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { ConsoleSink } from './console';
import { LogLevel, type LogEntry } from '../types';
import { colorize } from '../utils/color';

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: new Date(2024, 0, 15, 9, 5, 3).getTime(),
    type: 'info',
    template: 'Pod set up',
    message: 'Pod set up',
    ...overrides,
  };
}

describe('ConsoleSink', () => {
  const spies = {
    log: vi.spyOn(console, 'log'),
    info: vi.spyOn(console, 'info'),
    warn: vi.spyOn(console, 'warn'),
    error: vi.spyOn(console, 'error'),
  };

  beforeEach(() => {
    for (const spy of Object.values(spies)) {
      spy.mockImplementation(() => {});
    }
  });

  afterEach(() => {
    for (const spy of Object.values(spies)) {
      spy.mockReset();
    }
  });

  describe('format', () => {
    test('should print only the message by default', () => {
      const sink = new ConsoleSink();

      expect(sink.format(entry())).toBe('Pod set up');
    });

    test('should prefix timestamp, type, service and entity', () => {
      const sink = new ConsoleSink({ timestamps: true, typeLabels: true });

      expect(
        sink.format(
          entry({ serviceName: 'pod-pool', entityName: 'GreetingPod' }),
        ),
      ).toBe('[01-15-2024 09:05:03] [INFO] [pod-pool] [GreetingPod] Pod set up');
    });
  });

  describe('write', () => {
    test('should route each type to its console method', () => {
      const sink = new ConsoleSink({ colors: false, minLevel: LogLevel.DEBUG });

      sink.write(entry({ type: 'error', message: 'e' }));
      sink.write(entry({ type: 'warn', message: 'w' }));
      sink.write(entry({ type: 'info', message: 'i' }));
      sink.write(entry({ type: 'success', message: 's' }));
      sink.write(entry({ type: 'notice', message: 'n' }));
      sink.write(entry({ type: 'debug', message: 'd' }));

      expect(spies.error).toHaveBeenCalledWith('e');
      expect(spies.warn).toHaveBeenCalledWith('w');
      expect(spies.info).toHaveBeenCalledWith('i');
      expect(spies.log.mock.calls).toEqual([['s'], ['n'], ['d']]);
    });

    test('should colour output by type', () => {
      const sink = new ConsoleSink();

      sink.write(entry({ type: 'warn', message: 'careful' }));

      expect(spies.warn).toHaveBeenCalledWith(colorize('warn', 'careful'));
    });

    test('should drop entries below the minimum level', () => {
      const sink = new ConsoleSink({ colors: false });

      sink.write(entry({ type: 'debug', message: 'hidden' }));
      expect(spies.log).not.toHaveBeenCalled();

      sink.setMinLevel(LogLevel.DEBUG);
      expect(sink.getMinLevel()).toBe(LogLevel.DEBUG);

      sink.write(entry({ type: 'debug', message: 'shown' }));
      expect(spies.log).toHaveBeenCalledWith('shown');
    });

    test('should print raw entries unformatted at any level', () => {
      const sink = new ConsoleSink({
        timestamps: true,
        minLevel: LogLevel.ERROR,
      });

      sink.write(entry({ type: 'raw', message: 'raw text' }));

      expect(spies.log).toHaveBeenCalledWith('raw text');
    });

    test('should stay silent while muted or after close', () => {
      const sink = new ConsoleSink({ muted: true });

      sink.write(entry());
      expect(sink.isMuted()).toBe(true);

      sink.unmute();
      sink.close();
      sink.write(entry());

      expect(spies.info).not.toHaveBeenCalled();
    });
  });
});
