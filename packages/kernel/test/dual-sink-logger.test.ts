/**
 * Meshconf Kernel: DualSinkLogger Tests
 *
 *   DSL-U1:  ephemeral write is synchronous and carries the logger's tags
 *   DSL-U2:  one entry point per level
 *   DSL-U3:  unbound durable handle: durable copy dropped, nothing thrown
 *   DSL-U4:  bound durable sink receives every event, in call order, after the call returns
 *   DSL-U5:  a slow durable sink does not slow the log call
 *   DSL-U6:  a throwing ephemeral sink is swallowed and counted
 *   DSL-U7:  a failing durable sink is swallowed and counted
 *   DSL-U8:  minLevel filters the ephemeral sink only
 *   DSL-U9:  durable: false opts a logger out of durable storage
 *   DSL-U10: long messages are truncated
 *   DSL-U11: console line format and level parsing
 */

import { describe, it, expect, afterEach } from 'vitest';
import { performance } from 'node:perf_hooks';
import { DualSinkLogger } from '../src/logging/dual-sink-logger.js';
import { bindDurableSink, getDurableSink, unbindDurableSink } from '../src/logging/durable-sink-handle.js';
import { formatLogLine } from '../src/logging/console-sink.js';
import type { DurableLogSink, EphemeralLogSink } from '../src/logging/log-sink.js';
import { LogLevel, MAX_LOG_MESSAGE_LENGTH, parseLogLevel } from '../src/types/log.js';
import type { LogEvent } from '../src/types/log.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function pause(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function collectingSink(): EphemeralLogSink & { events: LogEvent[] } {
  const events: LogEvent[] = [];
  return { events, write: (event) => void events.push(event) };
}

function collectingDurable(): DurableLogSink & { events: LogEvent[] } {
  const events: LogEvent[] = [];
  return { events, append: (event) => void events.push(event) };
}

afterEach(() => {
  unbindDurableSink();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('DualSinkLogger: DSL-U1 ephemeral write', () => {
  it('writes a frozen event to the ephemeral sink before returning', () => {
    const sink = collectingSink();
    const logger = new DualSinkLogger('meshconf.test', 'Radio', { ephemeral: sink });

    logger.info('link up');

    expect(sink.events).toHaveLength(1);
    const event = sink.events[0];
    expect(event?.level).toBe(LogLevel.Info);
    expect(event?.subsystem).toBe('meshconf.test');
    expect(event?.category).toBe('Radio');
    expect(event?.message).toBe('link up');
    expect(event?.id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(Number.isNaN(Date.parse(event?.timestamp ?? ''))).toBe(false);
    expect(Object.isFrozen(event)).toBe(true);
  });
});

describe('DualSinkLogger: DSL-U2 levels', () => {
  it('maps each method to its level', () => {
    const sink = collectingSink();
    const logger = new DualSinkLogger('s', 'c', { ephemeral: sink });

    logger.debug('d');
    logger.info('i');
    logger.notice('n');
    logger.warning('w');
    logger.error('e');
    logger.fault('f');

    expect(sink.events.map((e) => e.level)).toEqual([
      LogLevel.Debug,
      LogLevel.Info,
      LogLevel.Notice,
      LogLevel.Warning,
      LogLevel.Error,
      LogLevel.Fault,
    ]);
  });
});

describe('DualSinkLogger: DSL-U3 unbound durable handle', () => {
  it('still writes the ephemeral line and does not throw', async () => {
    const sink = collectingSink();
    const logger = new DualSinkLogger('s', 'c', { ephemeral: sink });

    expect(getDurableSink()).toBeUndefined();
    expect(() => logger.warning('early')).not.toThrow();
    await pause(0);

    expect(sink.events.map((e) => e.message)).toEqual(['early']);
    expect(logger.failedDurableWrites).toBe(0);
  });

  it('picks up a sink bound after the logger was created', async () => {
    const logger = new DualSinkLogger('s', 'c', { ephemeral: collectingSink() });
    const durable = collectingDurable();

    logger.info('before bind');
    bindDurableSink(durable);
    logger.info('after bind');
    await pause(0);

    expect(durable.events.map((e) => e.message)).toEqual(['after bind']);
  });
});

describe('DualSinkLogger: DSL-U4 durable handoff', () => {
  it('appends after the call returns and keeps call order', async () => {
    const durable = collectingDurable();
    bindDurableSink(durable);
    const ephemeral = collectingSink();
    const logger = new DualSinkLogger('s', 'c', { ephemeral });

    logger.info('one');
    logger.error('two');
    logger.debug('three');
    expect(durable.events).toHaveLength(0);

    await pause(0);

    expect(durable.events.map((e) => e.message)).toEqual(['one', 'two', 'three']);
    // Same event values in both sinks.
    expect(durable.events).toEqual(ephemeral.events);
  });
});

describe('DualSinkLogger: DSL-U5 non-blocking', () => {
  it('returns quickly even when the durable append busy-waits', async () => {
    let appended = 0;
    bindDurableSink({
      append: () => {
        const until = performance.now() + 150;
        while (performance.now() < until) {
          // simulate a slow synchronous write
        }
        appended++;
      },
    });
    const logger = new DualSinkLogger('s', 'c', { ephemeral: collectingSink() });

    const start = performance.now();
    logger.info('a');
    logger.info('b');
    const elapsed = performance.now() - start;

    expect(elapsed).toBeLessThan(100);
    expect(appended).toBe(0);
    await pause(0);
    expect(appended).toBe(2);
  });

  it('does not wait for an asynchronous append to settle', async () => {
    let settled = false;
    let started = false;
    bindDurableSink({
      append: async () => {
        started = true;
        await pause(200);
        settled = true;
      },
    });
    const logger = new DualSinkLogger('s', 'c', { ephemeral: collectingSink() });

    logger.notice('slow');
    await pause(0);

    expect(started).toBe(true);
    expect(settled).toBe(false);
  });
});

describe('DualSinkLogger: DSL-U6 ephemeral failure', () => {
  it('swallows a throwing ephemeral sink and still reaches the durable sink', async () => {
    const durable = collectingDurable();
    bindDurableSink(durable);
    const logger = new DualSinkLogger('s', 'c', {
      ephemeral: {
        write: () => {
          throw new Error('EPIPE');
        },
      },
    });

    expect(() => logger.error('broken pipe')).not.toThrow();
    await pause(0);

    expect(logger.droppedEphemeralWrites).toBe(1);
    expect(durable.events.map((e) => e.message)).toEqual(['broken pipe']);
  });
});

describe('DualSinkLogger: DSL-U7 durable failure', () => {
  it('counts a rejecting append without surfacing it', async () => {
    bindDurableSink({ append: () => Promise.reject(new Error('store closed')) });
    const logger = new DualSinkLogger('s', 'c', { ephemeral: collectingSink() });

    logger.info('x');
    await pause(0);

    expect(logger.failedDurableWrites).toBe(1);
  });

  it('counts a synchronously throwing append', async () => {
    bindDurableSink({
      append: () => {
        throw new Error('store closed');
      },
    });
    const logger = new DualSinkLogger('s', 'c', { ephemeral: collectingSink() });

    expect(() => logger.info('x')).not.toThrow();
    await pause(0);

    expect(logger.failedDurableWrites).toBe(1);
  });
});

describe('DualSinkLogger: DSL-U8 minLevel', () => {
  it('filters the ephemeral sink but sends every level to the durable sink', async () => {
    const durable = collectingDurable();
    bindDurableSink(durable);
    const ephemeral = collectingSink();
    const logger = new DualSinkLogger('s', 'c', { ephemeral, minLevel: LogLevel.Warning });

    logger.debug('d');
    logger.info('i');
    logger.warning('w');
    logger.fault('f');
    await pause(0);

    expect(ephemeral.events.map((e) => e.message)).toEqual(['w', 'f']);
    expect(durable.events.map((e) => e.message)).toEqual(['d', 'i', 'w', 'f']);
  });
});

describe('DualSinkLogger: DSL-U9 durable opt-out', () => {
  it('never hands events to the durable sink', async () => {
    const durable = collectingDurable();
    bindDurableSink(durable);
    const ephemeral = collectingSink();
    const logger = new DualSinkLogger('s', 'c', { ephemeral, durable: false });

    logger.error('flush failed');
    await pause(0);

    expect(ephemeral.events).toHaveLength(1);
    expect(durable.events).toHaveLength(0);
  });
});

describe('DualSinkLogger: DSL-U10 truncation', () => {
  it(`cuts messages to ${MAX_LOG_MESSAGE_LENGTH} characters`, () => {
    const sink = collectingSink();
    const logger = new DualSinkLogger('s', 'c', { ephemeral: sink });

    logger.info('x'.repeat(MAX_LOG_MESSAGE_LENGTH + 25));

    expect(sink.events[0]?.message).toHaveLength(MAX_LOG_MESSAGE_LENGTH);
  });
});

describe('DualSinkLogger: DSL-U11 formatting and parsing', () => {
  it('formats one console line per event', () => {
    const line = formatLogLine({
      id: '01HX0000000000000000000001',
      timestamp: '2026-03-01T12:00:00.000Z',
      level: LogLevel.Warning,
      subsystem: 'meshconf.kernel',
      category: 'ConfigMutator',
      message: 'low battery',
    });

    expect(line).toBe('2026-03-01T12:00:00.000Z WARNING [meshconf.kernel:ConfigMutator] low battery');
  });

  it('parses labels case-insensitively and numeric levels', () => {
    expect(parseLogLevel('notice')).toBe(LogLevel.Notice);
    expect(parseLogLevel('FAULT')).toBe(LogLevel.Fault);
    expect(parseLogLevel('3')).toBe(LogLevel.Warning);
    expect(parseLogLevel('9')).toBeUndefined();
    expect(parseLogLevel('verbose')).toBeUndefined();
  });
});
