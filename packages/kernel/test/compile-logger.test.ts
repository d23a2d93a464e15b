/**
 * Keel Kernel — Compile Logger Tests
 *
 *   LOG-U1: entries below the configured level are dropped
 *   LOG-U2: entries carry timestamp, level, node and message
 *   LOG-U3: without a sink every call is a no-op
 *   LOG-U4: a throwing sink drops the entry and counts it
 */

import { describe, it, expect } from 'vitest';
import { CompileLogger } from '../src/logging/compile-logger.js';
import type { LogEntry } from '../src/logging/log-sink.js';
import { isLogLevel } from '../src/logging/log-sink.js';

function capture(level: ConstructorParameters<typeof CompileLogger>[1]): { logger: CompileLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new CompileLogger(
    { append: (entry) => entries.push(entry) },
    level,
    () => new Date('2026-03-01T12:00:00.000Z'),
  );
  return { logger, entries };
}

describe('LOG-U1: level threshold', () => {
  it('forwards warning and error at the default level', () => {
    const { logger, entries } = capture(undefined);
    logger.debug('web1', 'd');
    logger.info('web1', 'i');
    logger.warning('web1', 'w');
    logger.error('web1', 'e');
    expect(entries.map((e) => e.level)).toEqual(['warning', 'error']);
  });

  it('forwards everything at debug', () => {
    const { logger, entries } = capture('debug');
    logger.debug('web1', 'd');
    logger.info('web1', 'i');
    expect(entries.map((e) => e.message)).toEqual(['d', 'i']);
    expect(logger.enabled('debug')).toBe(true);
  });
});

describe('LOG-U2: entry shape', () => {
  it('stamps each entry with the injected clock', () => {
    const { logger, entries } = capture('info');
    logger.info('db1.example.com', 'Compiled 4 resources');
    expect(entries).toEqual([
      {
        timestamp: '2026-03-01T12:00:00.000Z',
        level: 'info',
        node: 'db1.example.com',
        message: 'Compiled 4 resources',
      },
    ]);
  });
});

describe('LOG-U3: no sink', () => {
  it('reports every level as disabled and does not throw', () => {
    const logger = new CompileLogger();
    expect(logger.enabled('error')).toBe(false);
    expect(() => logger.error('web1', 'ignored')).not.toThrow();
  });

  it('recognizes configured level names', () => {
    expect(isLogLevel('warning')).toBe(true);
    expect(isLogLevel('warn')).toBe(false);
  });
});

describe('LOG-U4: failing sink', () => {
  it('counts the entries it could not append', () => {
    const written: string[] = [];
    const logger = new CompileLogger({
      append: (entry) => {
        if (entry.level === 'error') throw new Error('EACCES: permission denied');
        written.push(entry.message);
      },
    });
    expect(() => logger.error('web1', 'lost')).not.toThrow();
    logger.warning('web1', 'kept');
    expect(written).toEqual(['kept']);
    expect(logger.droppedEntries).toBe(1);
  });
});
