import { describe, it, expect } from 'vitest';
import { ErrorEvent, LogEvent, NodeEvent, isLevelEnabled } from '../events.js';
import { createPerformanceTimer, debug, error, info, warning } from '../helpers.js';
import { MissingInputError } from '../errors.js';
import { steppingClock } from './support.js';

describe('event factories', () => {
  it('should create log events at the matching level', () => {
    const events = [
      info('a', { runnableName: 'p' }),
      warning('b'),
      debug('c', { details: { n: 1 } }),
    ];

    expect(events.map((e) => [e.type, e.level, e.message])).toEqual([
      ['log', 'info', 'a'],
      ['log', 'warn', 'b'],
      ['log', 'debug', 'c'],
    ]);
    expect(events[0].runnableName).toBe('p');
    expect(events[2].details).toEqual({ n: 1 });
    expect(events[0]).toBeInstanceOf(LogEvent);
  });

  it('should carry the code of pipeline errors in error events', () => {
    const event = error(new MissingInputError('C', ['y']), { nodeName: 'C' });

    expect(event).toBeInstanceOf(ErrorEvent);
    expect(event.type).toBe('error_event');
    expect(event.nodeName).toBe('C');
    expect(event.error.name).toBe('MissingInputError');
    expect(event.error.code).toBe('MissingInput');
    expect(event.error.message).toBe("Node 'C' is missing required input 'y'");
  });

  it('should accept non-error values', () => {
    expect(error('plain text').error).toEqual({ name: 'Error', message: 'plain text' });
  });

  it('should stamp node events with the node name', () => {
    const event = new NodeEvent('load', 'succeeded', { runnableName: 'p', executionTime: 4 });

    expect(event.type).toBe('node');
    expect(event.nodeName).toBe('load');
    expect(event.executionTime).toBe(4);
  });

  it('should compare log levels', () => {
    expect(isLevelEnabled('warn', 'info')).toBe(true);
    expect(isLevelEnabled('debug', 'info')).toBe(false);
    expect(isLevelEnabled('info', 'info')).toBe(true);
  });
});

describe('PerformanceTimer', () => {
  it('should measure durations with the injected clock', () => {
    const timer = createPerformanceTimer('op', steppingClock(5));

    expect(timer.start()).toBe(0);
    expect(timer.isRunning).toBe(true);
    expect(timer.stop()).toBe(5);
    expect(timer.isRunning).toBe(false);
    timer.start();
    timer.stop();

    expect(timer.getStats()).toEqual({ count: 2, total: 10, average: 5, minimum: 5, maximum: 5 });
  });

  it('should refuse to stop a timer that was not started', () => {
    const timer = createPerformanceTimer('idle');

    expect(() => timer.stop()).toThrow("Timer 'idle' is not running");
  });

  it('should report zeroed statistics without measurements', () => {
    const event = createPerformanceTimer('none').performanceStats({ runnableName: 'p' });

    expect(event.level).toBe('debug');
    expect(event.message).toBe(
      'Performance: none - 0 operations, avg: 0ms, min: 0ms, max: 0ms, total: 0ms',
    );
    expect(event.details).toEqual({
      operation: 'none',
      count: 0,
      total: 0,
      average: 0,
      minimum: 0,
      maximum: 0,
    });
  });

  it('should clear measurements on reset', () => {
    const timer = createPerformanceTimer('op', steppingClock(3));
    timer.start();
    timer.stop();

    expect(timer.reset().measurements).toEqual([]);
    expect(timer.getStats().count).toBe(0);
  });
});
