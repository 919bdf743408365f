/**
 * Mock Logger Utilities for Testing
 *
 * Captures log entries through a log handler so tests can assert on them.
 * Capturing forces LOG_LEVEL to debug for the duration and restores it after.
 *
 * Usage:
 * ```typescript
 * const logs = setupMockLogger();
 *
 * it('warns on ties', async () => {
 *   // run code that logs
 *   expect(logs.hasLog('warn', /Ambiguous/)).toBe(true);
 * });
 * ```
 */

import { afterEach, beforeEach } from 'vitest';

import { addLogHandler, type LogEntry, type LogLevel } from '../../packages/kernel/logger';

export class MockLogger {
  private entries: LogEntry[] = [];
  private cleanup: (() => void) | null = null;
  private previousLevel: string | undefined;

  startCapturing(): void {
    this.previousLevel = process.env['LOG_LEVEL'];
    process.env['LOG_LEVEL'] = 'debug';
    this.cleanup = addLogHandler(entry => {
      this.entries.push(entry);
    });
  }

  stopCapturing(): void {
    this.cleanup?.();
    this.cleanup = null;
    if (this.previousLevel === undefined) delete process.env['LOG_LEVEL'];
    else process.env['LOG_LEVEL'] = this.previousLevel;
  }

  clear(): void {
    this.entries = [];
  }

  hasLog(level: LogLevel, messagePattern: RegExp | string): boolean {
    const pattern = typeof messagePattern === 'string' ? new RegExp(messagePattern) : messagePattern;
    return this.entries.some(e => e.level === level && pattern.test(e.message));
  }

  getByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter(e => e.level === level);
  }

  getWarnings(): LogEntry[] {
    return this.getByLevel('warn');
  }
}

/**
 * Vitest helper that captures logs for each test in the enclosing describe
 */
export function setupMockLogger(): MockLogger {
  const mock = new MockLogger();

  beforeEach(() => {
    mock.clear();
    mock.startCapturing();
  });

  afterEach(() => {
    mock.stopCapturing();
  });

  return mock;
}
