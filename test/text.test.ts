import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  bracketedIp,
  field,
  formatDateToken,
  isDirectory,
  MAX_LOG_LINE_LENGTH,
  scanLogLines,
  splitLines,
  tail,
} from '../src/lib/text.js';

const tempDirs: string[] = [];

describe('text helpers', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    for (const dir of tempDirs.splice(0, tempDirs.length)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  function makeDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'panel-diag-text-'));
    tempDirs.push(dir);
    return dir;
  }

  it('looks up awk-style fields', () => {
    const line = '  203.0.113.9 - - [19/Oct/2026:08:00:00 +0000] "GET / HTTP/1.1"';
    expect(field(line, 1)).toBe('203.0.113.9');
    expect(field(line, 6)).toBe('"GET');
    expect(field(line, 7)).toBe('/');
    expect(field(line, 20)).toBe('');
  });

  it('splits lines without a phantom trailing entry', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
    expect(splitLines('a\r\nb')).toEqual(['a', 'b']);
    expect(splitLines('')).toEqual([]);
  });

  it('keeps the last n items', () => {
    expect(tail([1, 2, 3, 4], 2)).toEqual([3, 4]);
    expect(tail([1, 2], 5)).toEqual([1, 2]);
    expect(tail([1, 2], 0)).toEqual([]);
  });

  it('extracts the bracketed address from the preferred column', () => {
    const line = '2026-10-19 09:15:02 [4821] SMTP connection from [198.51.100.7]:52144 (TCP/IP connection count = 21)';
    expect(bracketedIp(line, 7)).toBe('198.51.100.7');
  });

  it('falls back to the first bracketed address when the column differs', () => {
    const line = '2026-10-19 09:15:02 SMTP connection from [198.51.100.8]:52144 (TCP/IP connection count = 21)';
    expect(bracketedIp(line, 7)).toBe('198.51.100.8');
    expect(bracketedIp('no address [here]', 2)).toBeNull();
  });

  it('formats date tokens the way apache writes them', () => {
    const date = new Date(2026, 9, 5, 14, 30);
    expect(formatDateToken(date, '%d/%b/%Y:')).toBe('05/Oct/2026:');
    expect(formatDateToken(date, '%Y-%m-%d')).toBe('2026-10-05');
    expect(formatDateToken(date, '%e|%y|%%|%Q')).toBe(' 5|26|%|%Q');
  });

  it('streams only the lines the filter keeps', async () => {
    const dir = makeDir();
    const file = path.join(dir, 'messages');
    fs.writeFileSync(file, 'keep one\r\ndrop\nkeep two');

    await expect(scanLogLines(file, (line) => line.startsWith('keep'))).resolves.toEqual({
      status: 'ok',
      lines: ['keep one', 'keep two'],
    });
  });

  it('treats missing paths and directories as missing', async () => {
    const dir = makeDir();
    const keepAll = () => true;
    fs.writeFileSync(path.join(dir, 'plain'), 'x\n');

    await expect(scanLogLines(path.join(dir, 'missing'), keepAll)).resolves.toEqual({ status: 'missing' });
    await expect(scanLogLines(path.join(dir, 'plain', 'deeper'), keepAll)).resolves.toEqual({ status: 'missing' });
    await expect(scanLogLines(dir, keepAll)).resolves.toEqual({ status: 'missing' });
    expect(isDirectory(dir)).toBe(true);
  });

  it('reports and logs a log path that cannot be read', async () => {
    const dir = makeDir();
    const file = path.join(dir, 'messages');
    fs.symlinkSync(file, file);
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await expect(scanLogLines(file, () => true)).resolves.toEqual({ status: 'unreadable', code: 'ELOOP' });
    expect(warnSpy).toHaveBeenCalledWith('log.read_failed', { path: file, code: 'ELOOP' });
  });

  it('cuts overlong lines instead of failing', async () => {
    const dir = makeDir();
    const file = path.join(dir, 'messages');
    fs.writeFileSync(file, `${'x'.repeat(MAX_LOG_LINE_LENGTH + 10)}\nafter\n`);

    const scan = await scanLogLines(file, () => true);
    expect(scan).toEqual({ status: 'ok', lines: ['x'.repeat(MAX_LOG_LINE_LENGTH), 'after'] });
  });
});
