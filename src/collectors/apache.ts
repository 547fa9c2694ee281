import fs from 'fs';
import path from 'path';
import { isIP } from 'net';
import type { ApacheLayout, DiagConfig } from '../config.js';
import { countBy, type FrequencyTable } from '../lib/frequency.js';
import { errorCode } from '../errors.js';
import {
  formatDateToken,
  isDirectory,
  isFile,
  scanLogLines,
  splitFields,
  tail,
  unreadableLogLine,
} from '../lib/text.js';
import { formatFrequencyTable, type Section, type SectionBlock } from '../report.js';

export type AccessLogEntry = Readonly<{
  domain: string;
  ip: string;
  method: string;
  uri: string;
  line: string;
}>;

/** Today's access log lines across every domain, read once. */
export type LogWindow = readonly AccessLogEntry[];

export type TodaysTraffic = {
  window: LogWindow;
  /** One `Could not read` line per domain log that failed to read. */
  unreadable: readonly string[];
};

export type TrafficTables = {
  topIps: FrequencyTable;
  postDomains: FrequencyTable;
  getDomains: FrequencyTable;
  postUris: FrequencyTable;
  botDomains: FrequencyTable;
};

const BOT_PATTERN = /crawl|bot|spider|yahoo|bing|google/i;
const SERVER_LIMIT_PATTERN = /server reached|scoreboard/i;
const SERVER_LIMIT_LINES = 5;
const TITLE = 'APACHE WEB SERVER ANALYSIS';

export function selectApacheLayout(config: Pick<DiagConfig, 'ea4MarkerFile' | 'ea4' | 'ea3'>): ApacheLayout {
  return isFile(config.ea4MarkerFile) ? config.ea4 : config.ea3;
}

// Byte order, the same as `ls` under LC_ALL=C.
const byName = (a: fs.Dirent, b: fs.Dirent) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

/** Per-user domain logs live one directory down: domlogs/<user>/<domain>. */
export function listDomlogFiles(domlogsDir: string): string[] {
  const files: string[] = [];
  const owners = fs.readdirSync(domlogsDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .sort(byName);
  for (const owner of owners) {
    const ownerDir = path.join(domlogsDir, owner.name);
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(ownerDir, { withFileTypes: true });
    } catch (err) {
      console.warn('log.read_failed', { path: ownerDir, code: errorCode(err) });
      continue;
    }
    for (const entry of entries.sort(byName)) {
      if (!entry.isFile() || entry.name.endsWith('.gz')) continue;
      files.push(path.join(ownerDir, entry.name));
    }
  }
  return files;
}

export function domainFromLogFile(filePath: string): string {
  return path.basename(filePath).replace(/-ssl_log$/, '');
}

/**
 * The client column is either a bare address or `vhost:address` when the
 * vhost is prefixed to the line.
 */
export function clientAddress(firstField: string): string {
  if (!firstField.includes(':') || isIP(firstField) !== 0) return firstField;
  return firstField.slice(firstField.indexOf(':') + 1);
}

export function parseAccessLine(line: string, domain: string): AccessLogEntry {
  const fields = splitFields(line);
  return {
    domain,
    ip: clientAddress(fields[0] ?? ''),
    method: (fields[5] ?? '').replace(/^"/, ''),
    uri: fields[6] ?? '',
    line,
  };
}

export async function readTodaysWindow(files: readonly string[], dateToken: string): Promise<TodaysTraffic> {
  const window: AccessLogEntry[] = [];
  const unreadable: string[] = [];
  for (const file of files) {
    const scan = await scanLogLines(file, (line) => line.includes(dateToken));
    if (scan.status === 'unreadable') {
      unreadable.push(unreadableLogLine(file, scan.code));
      continue;
    }
    if (scan.status === 'missing') continue;
    const domain = domainFromLogFile(file);
    for (const line of scan.lines) {
      window.push(parseAccessLine(line, domain));
    }
  }
  return { window: Object.freeze(window), unreadable };
}

export function analyzeTraffic(window: LogWindow): TrafficTables {
  return {
    topIps: countBy(window, (entry) => entry.ip, 15),
    postDomains: countBy(window, (entry) => (entry.method === 'POST' ? entry.domain : null), 10),
    getDomains: countBy(window, (entry) => (entry.method === 'GET' ? entry.domain : null), 10),
    postUris: countBy(window, (entry) => (entry.method === 'POST' ? entry.uri : null), 10),
    botDomains: countBy(window, (entry) => (BOT_PATTERN.test(entry.line) ? entry.domain : null), 10),
  };
}

export function findServerLimitErrors(lines: readonly string[], limit = SERVER_LIMIT_LINES): string[] {
  return tail(lines.filter((line) => SERVER_LIMIT_PATTERN.test(line)), limit);
}

function tableBlock(heading: string, table: FrequencyTable): SectionBlock {
  return { heading, lines: table.length ? formatFrequencyTable(table) : ['None.'] };
}

async function errorLogBlock(layout: ApacheLayout): Promise<SectionBlock> {
  const heading = 'Recent Apache Server Limit Errors:';
  const scan = await scanLogLines(layout.errorLog, (line) => SERVER_LIMIT_PATTERN.test(line));
  if (scan.status === 'missing') {
    return { heading, lines: [`Apache error log not found at ${layout.errorLog}`] };
  }
  if (scan.status === 'unreadable') {
    return { heading, lines: [unreadableLogLine(layout.errorLog, scan.code)], tone: 'error' };
  }
  const matches = findServerLimitErrors(scan.lines);
  return { heading, lines: matches.length ? matches : ['No server limit errors found.'] };
}

export async function collectApacheStatus(
  config: Pick<DiagConfig, 'ea4MarkerFile' | 'ea4' | 'ea3' | 'accessLogDateFormat'>,
  now: Date = new Date(),
): Promise<Section> {
  const layout = selectApacheLayout(config);
  if (!isDirectory(layout.domlogsDir)) {
    return {
      title: TITLE,
      blocks: [{ lines: [`Apache domlogs directory not found at ${layout.domlogsDir}`], tone: 'error' }],
    };
  }

  const dateToken = formatDateToken(now, config.accessLogDateFormat);
  const { window, unreadable } = await readTodaysWindow(listDomlogFiles(layout.domlogsDir), dateToken);
  const blocks: SectionBlock[] = unreadable.length ? [{ lines: [...unreadable], tone: 'error' }] : [];
  if (!window.length) {
    blocks.push({ lines: ['No Apache traffic recorded yet for today.'] });
    return { title: TITLE, blocks };
  }

  const tables = analyzeTraffic(window);
  blocks.push(
    tableBlock('Top 15 IPs Hitting Server Today:', tables.topIps),
    tableBlock('Top 10 Domains by POST Requests Today:', tables.postDomains),
    tableBlock('Top 10 Domains by GET Requests Today:', tables.getDomains),
    tableBlock('Top 10 URIs Receiving POST Requests:', tables.postUris),
    tableBlock('Top 10 Suspected Bot Hits by Domain:', tables.botDomains),
    await errorLogBlock(layout),
  );
  return { title: TITLE, blocks };
}
