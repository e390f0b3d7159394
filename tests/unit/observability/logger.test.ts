import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  configureLogging,
  createLogger,
  resetLogging,
  withLogContext,
} from '../../../src/utils/observability/index.js';

function spyOnStderr() {
  return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
}

describe('observability logger', () => {
  let stderrSpy: ReturnType<typeof spyOnStderr>;

  function stderrRecords(): Record<string, unknown>[] {
    return stderrSpy.mock.calls.map((call) => JSON.parse(String(call[0])) as Record<string, unknown>);
  }

  beforeEach(() => {
    stderrSpy = spyOnStderr();
  });

  afterEach(() => {
    stderrSpy.mockRestore();
    resetLogging();
  });

  it('drops records below the configured level', () => {
    configureLogging({ level: 'warn' });
    const logger = createLogger({ domain: 'unit-test' });

    logger.debug('debug_event');
    logger.info('info_event');
    logger.warn('warn_event', { attempt: 1 });

    const records = stderrRecords();
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ level: 'warn', event: 'warn_event', domain: 'unit-test', attempt: 1 });
    expect(typeof records[0].timestamp).toBe('string');
  });

  it('writes nothing to stdout', () => {
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    configureLogging({ level: 'debug' });

    createLogger().error('error_event');

    expect(stdoutSpy).not.toHaveBeenCalled();
    stdoutSpy.mockRestore();
  });

  it('merges the async context and child context', async () => {
    configureLogging({ level: 'info' });
    const logger = createLogger({ domain: 'agent' }).child({ operation: 'search' });

    await withLogContext({ turnId: 'turn_test_123' }, async () => {
      logger.info('tool_call_received', { toolName: 'search_emails' });
    });

    expect(stderrRecords()[0]).toMatchObject({
      event: 'tool_call_received',
      turnId: 'turn_test_123',
      domain: 'agent',
      operation: 'search',
      toolName: 'search_emails',
    });
  });

  it('redacts secrets, message content and addresses', () => {
    configureLogging({ level: 'info' });

    createLogger().info('test_event', {
      token: 'test-token',
      utterance: 'what did alice say?',
      sender: 'alice@example.com',
    });

    expect(stderrRecords()[0]).toMatchObject({
      token: '[REDACTED]',
      utterance: '[REDACTED_TEXT len=19]',
      sender: 'a***@example.com',
    });
  });

  it('writes every record to the file sink regardless of level', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'inbox-agent-log-'));
    const logFile = path.join(tempDir, 'logs', 'app.ndjson');
    configureLogging({ level: 'error', filePath: logFile });

    createLogger({ domain: 'unit-test' }).debug('file_event', { ok: true });

    await vi.waitFor(() => {
      expect(fs.existsSync(logFile)).toBe(true);
      expect(fs.readFileSync(logFile, 'utf-8').trim().length).toBeGreaterThan(0);
    }, { timeout: 1000 });

    const payload = JSON.parse(fs.readFileSync(logFile, 'utf-8').trim().split('\n')[0]) as Record<string, unknown>;
    expect(payload).toMatchObject({ level: 'debug', event: 'file_event', domain: 'unit-test', ok: true });
    expect(stderrSpy).not.toHaveBeenCalled();
  });
});
