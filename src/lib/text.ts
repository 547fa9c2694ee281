import fs from 'fs';
import { isIP } from 'net';
import { errorCode } from '../errors.js';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

/** Splits on runs of whitespace the way awk does, ignoring leading blanks. */
export function splitFields(line: string): string[] {
  const trimmed = line.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
}

/** 1-based awk-style field lookup; missing fields come back as ''. */
export function field(line: string, position: number): string {
  return splitFields(line)[position - 1] ?? '';
}

export function splitLines(raw: string): string[] {
  const lines = raw.split(/\r?\n/);
  if (lines.length && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export type LogScan =
  | { status: 'ok'; lines: string[] }
  | { status: 'missing' }
  | { status: 'unreadable'; code: string };

// Longer lines are cut here; runs of NUL bytes after an unclean shutdown can
// otherwise grow one "line" past the maximum string length.
export const MAX_LOG_LINE_LENGTH = 64 * 1024;
const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);

class LineBuffer {
  private pending = '';

  push(text: string): string[] {
    const lines: string[] = [];
    let start = 0;
    for (let end = text.indexOf('\n'); end !== -1; end = text.indexOf('\n', start)) {
      lines.push(this.take(text.slice(start, end)));
      start = end + 1;
    }
    this.append(text.slice(start));
    return lines;
  }

  flush(): string[] {
    return this.pending ? [this.take('')] : [];
  }

  private append(text: string) {
    const room = MAX_LOG_LINE_LENGTH - this.pending.length;
    if (room > 0) this.pending += text.slice(0, room);
  }

  private take(rest: string): string {
    this.append(rest);
    const line = this.pending.endsWith('\r') ? this.pending.slice(0, -1) : this.pending;
    this.pending = '';
    return line;
  }
}

async function* streamLines(filePath: string): AsyncGenerator<string> {
  const input = fs.createReadStream(filePath, { encoding: 'utf8', highWaterMark: 1024 * 1024 });
  const buffer = new LineBuffer();
  for await (const chunk of input) {
    yield* buffer.push(String(chunk));
  }
  yield* buffer.flush();
}

/**
 * Streams a log file and keeps only the lines `keep` accepts. A path that is
 * absent or not a regular file is `missing`; any other failure is
 * `unreadable` and logged, so callers can tell "checked and absent" from
 * "could not read".
 */
export async function scanLogLines(filePath: string, keep: (line: string) => boolean): Promise<LogScan> {
  try {
    const stat = await fs.promises.stat(filePath);
    if (!stat.isFile()) return { status: 'missing' };
    const lines: string[] = [];
    for await (const line of streamLines(filePath)) {
      if (keep(line)) lines.push(line);
    }
    return { status: 'ok', lines };
  } catch (err) {
    const code = errorCode(err) || (err instanceof Error ? err.message : String(err));
    if (MISSING_CODES.has(code)) return { status: 'missing' };
    console.warn('log.read_failed', { path: filePath, code });
    return { status: 'unreadable', code };
  }
}

export function unreadableLogLine(filePath: string, code: string): string {
  return `Could not read ${filePath}: ${code}`;
}

export function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

export function isDirectory(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch {
    return false;
  }
}

export function tail<T>(items: readonly T[], count: number): T[] {
  if (count <= 0) return [];
  return items.slice(-count);
}

export function bracketedTokens(value: string): string[] {
  return Array.from(value.matchAll(/\[([^\]]*)\]/g), (match) => match[1] ?? '');
}

/**
 * Picks the IP address out of a log line: the bracketed token in the given
 * whitespace column when it holds an address, else the first bracketed
 * address anywhere in the line.
 */
export function bracketedIp(line: string, position: number): string | null {
  const preferred = bracketedTokens(field(line, position)).find((token) => isIP(token) !== 0);
  if (preferred) return preferred;
  return bracketedTokens(line).find((token) => isIP(token) !== 0) ?? null;
}

function pad2(value: number) {
  return String(value).padStart(2, '0');
}

/**
 * Minimal strftime: %d %e %m %b %Y %y and %%. Unknown directives are kept
 * verbatim. Uses server-local time, matching what Apache writes.
 */
export function formatDateToken(date: Date, format: string): string {
  return format.replace(/%([a-zA-Z%])/g, (directive, code: string) => {
    switch (code) {
      case 'd':
        return pad2(date.getDate());
      case 'e':
        return String(date.getDate()).padStart(2, ' ');
      case 'm':
        return pad2(date.getMonth() + 1);
      case 'b':
        return MONTHS[date.getMonth()] ?? '';
      case 'Y':
        return String(date.getFullYear());
      case 'y':
        return pad2(date.getFullYear() % 100);
      case '%':
        return '%';
      default:
        return directive;
    }
  });
}
