/**
 * Logger Tests
 *
 * - Level threshold for each method
 * - Context formatting, including circular references
 * - FileLogger writes timestamped lines
 * - createLogger() with and without a log file
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, readFileSync, rmSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConsoleLogger, FileLogger, MultiLogger, createLogger, isLogLevel } from '@polybridge/core';

// =============================================================================
// Test Helpers
// =============================================================================

interface ConsoleCapture {
  lines: Array<{ method: string; text: string }>;
  restore: () => void;
}

function captureConsole(): ConsoleCapture {
  const original = {
    error: console.error,
    warn: console.warn,
    info: console.info,
    debug: console.debug,
    log: console.log,
  };
  const lines: ConsoleCapture['lines'] = [];
  for (const method of ['error', 'warn', 'info', 'debug', 'log'] as const) {
    console[method] = (...args: unknown[]) => {
      lines.push({ method, text: args.map(String).join(' ') });
    };
  }
  return {
    lines,
    restore: () => {
      Object.assign(console, original);
    },
  };
}

// =============================================================================
// TESTS: ConsoleLogger
// =============================================================================

describe('ConsoleLogger', () => {
  let capture: ConsoleCapture;

  beforeEach(() => {
    capture = captureConsole();
  });

  afterEach(() => {
    capture.restore();
  });

  it('should print nothing when silent', () => {
    const logger = new ConsoleLogger('silent');
    logger.error('e');
    logger.warn('w');
    logger.trace('t');
    assert.deepStrictEqual(capture.lines, []);
  });

  it('should respect the warnings threshold', () => {
    const logger = new ConsoleLogger('warnings');
    logger.error('broken');
    logger.warn('careful');
    logger.info('hidden');
    logger.debug('hidden');

    assert.deepStrictEqual(capture.lines, [
      { method: 'error', text: '[ERROR] broken' },
      { method: 'warn', text: '[WARN] careful' },
    ]);
  });

  it('should route debug and trace to console.debug at debug level', () => {
    const logger = new ConsoleLogger('debug');
    logger.debug('registered');
    logger.trace('dispatched');

    assert.deepStrictEqual(capture.lines, [
      { method: 'debug', text: '[DEBUG] registered' },
      { method: 'debug', text: '[TRACE] dispatched' },
    ]);
  });

  it('should append context as JSON', () => {
    new ConsoleLogger('info').info('Registered class', { className: 'Base', methods: ['do_something'] });

    assert.deepStrictEqual(capture.lines, [
      { method: 'info', text: '[INFO] Registered class {"className":"Base","methods":["do_something"]}' },
    ]);
  });

  it('should survive circular context and describe functions', () => {
    const context: Record<string, unknown> = { impl: function baseDefault() {} };
    context.self = context;
    new ConsoleLogger('info').info('loop', context);

    assert.deepStrictEqual(capture.lines, [
      { method: 'info', text: '[INFO] loop {"impl":"[Function baseDefault]","self":"[Circular]"}' },
    ]);
  });
});

// =============================================================================
// TESTS: FileLogger, MultiLogger, createLogger
// =============================================================================

describe('FileLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'polybridge-logger-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write timestamped lines and create parent directories', async () => {
    const file = join(dir, 'nested', 'dispatch.log');
    const logger = new FileLogger('debug', file);
    logger.trace('No host override', { method: 'do_something' });
    await logger.close();

    const lines = readFileSync(file, 'utf-8').trimEnd().split('\n');
    assert.strictEqual(lines.length, 1);
    assert.match(lines[0], /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \[TRACE\] No host override \{"method":"do_something"\}$/);
  });

  it('should reject a directory path', () => {
    const target = join(dir, 'logs');
    mkdirSync(target);
    assert.throws(() => new FileLogger('info', target), /is a directory/);
  });

  it('should receive debug lines from createLogger even when the console is quiet', async () => {
    const capture = captureConsole();
    const file = join(dir, 'bridge.log');
    try {
      const logger = createLogger('errors', { logFile: file });
      assert.ok(logger instanceof MultiLogger);
      logger.debug('sealed');
      await logger.close();
    } finally {
      capture.restore();
    }

    assert.deepStrictEqual(capture.lines, []);
    assert.match(readFileSync(file, 'utf-8'), /\[DEBUG\] sealed\n$/);
  });

  it('should return a ConsoleLogger without a log file', () => {
    const logger = createLogger('info');
    assert.ok(logger instanceof ConsoleLogger);
    assert.strictEqual(logger.level, 'info');
  });
});

describe('isLogLevel', () => {
  it('should accept only known levels', () => {
    assert.strictEqual(isLogLevel('debug'), true);
    assert.strictEqual(isLogLevel('verbose'), false);
    assert.strictEqual(isLogLevel(3), false);
    assert.strictEqual(isLogLevel('toString'), false);
  });
});
