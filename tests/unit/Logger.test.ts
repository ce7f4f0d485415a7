import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';

import { Logger } from '../../src/infrastructure/logging/Logger.js';

describe('Logger', () => {
  let dir: string;
  let stderr: MockInstance;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'desk-logger-'));
    stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function written(): string {
    return stderr.mock.calls.map(call => String(call[0])).join('');
  }

  it('writes level-tagged lines to stderr', () => {
    const logger = new Logger('info');
    logger.info('hello');
    expect(written()).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO \] hello\n$/);
  });

  it('drops messages below the configured level', () => {
    const logger = new Logger('warn');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    expect(written()).toContain('[WARN ] w');
    expect(written()).toContain('[ERROR] e');
    expect(written()).not.toContain('] i');
    expect(written()).not.toContain('] d');
  });

  it('appends meta after the message', () => {
    const logger = new Logger('debug');
    logger.debug('count', 3);
    logger.info('payload', { id: 'A' });
    expect(written()).toContain('[DEBUG] count 3\n');
    expect(written()).toContain('[INFO ] payload\n{\n  "id": "A"\n}\n');
  });

  it('prefixes child logger messages', () => {
    const logger = new Logger('info');
    logger.child('API').warn('slow');
    expect(written()).toContain('[WARN ] [API] slow');
  });

  it('writes to the log file, creating its directory', () => {
    const file = join(dir, 'nested', 'client.log');
    const logger = new Logger('info', file, { console: false });
    logger.info('to file');

    expect(logger.filePath).toBe(file);
    expect(readFileSync(file, 'utf8')).toContain('[INFO ] to file');
    expect(stderr).not.toHaveBeenCalled();
  });

  it('can switch stderr output on and off', () => {
    const logger = new Logger('info');
    logger.setConsoleOutput(false);
    logger.info('hidden');
    logger.setConsoleOutput(true);
    logger.info('shown');
    expect(written()).not.toContain('hidden');
    expect(written()).toContain('shown');
  });

  it('rotates an oversized log and prunes old rotations', () => {
    const file = join(dir, 'client.log');
    writeFileSync(file, 'x'.repeat(64));
    writeFileSync(`${file}.old-1`, '');
    writeFileSync(`${file}.old-2`, '');

    new Logger('info', file, { console: false, maxLogSizeBytes: 16, maxRotatedLogs: 2 });

    const rotated = readdirSync(dir).filter(name => name.startsWith('client.log.'));
    expect(rotated).toHaveLength(2);
    expect(readFileSync(file, 'utf8')).not.toContain('xxxx');
  });

  it('turns file logging off when the file cannot be written', () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, '');
    const logger = new Logger('info', join(blocker, 'client.log'), { console: false });

    expect(logger.filePath).toBeNull();
    expect(existsSync(join(blocker, 'client.log'))).toBe(false);
    expect(stderr).not.toHaveBeenCalled();

    logger.setConsoleOutput(true);
    expect(written()).toContain('File logging disabled');
  });

  it('holds a mid-session file failure back until stderr is on again', () => {
    const file = join(dir, 'client.log');
    const logger = new Logger('info', file);
    logger.setConsoleOutput(false);

    rmSync(file);
    mkdirSync(file);
    logger.info('lost');

    expect(logger.filePath).toBeNull();
    expect(stderr).not.toHaveBeenCalled();

    logger.setConsoleOutput(true);
    expect(written()).toContain(`File logging disabled (${file}): `);
    expect(written()).not.toContain('lost');

    stderr.mockClear();
    logger.setConsoleOutput(false);
    logger.setConsoleOutput(true);
    expect(stderr).not.toHaveBeenCalled();
  });
});
