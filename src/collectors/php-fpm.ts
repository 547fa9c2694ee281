import fs from 'fs';
import path from 'path';
import type { DiagConfig } from '../config.js';
import { buildFrequencyTable, DEFAULT_TABLE_LIMIT, type FrequencyTable } from '../lib/frequency.js';
import { scanLogLines, unreadableLogLine } from '../lib/text.js';
import { formatFrequencyTable, type Section, type SectionBlock } from '../report.js';

const MAX_CHILDREN_PATTERN = /reached (?:pm\.)?max_children setting/;
const FPM_LOG_RELATIVE = path.join('root', 'usr', 'var', 'log', 'php-fpm', 'error.log');

export function listPhpVersions(installRoot: string): string[] {
  try {
    return fs.readdirSync(installRoot, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && entry.name.startsWith('ea-php'))
      .map((entry) => entry.name)
      .sort();
  } catch {
    return [];
  }
}

/**
 * Classifies a max_children warning by its third ": "-separated field, falling
 * back to the pool name, e.g. `[pool bob_example_com]`.
 */
export function maxChildrenKey(line: string): string | null {
  const third = (line.split(': ')[2] ?? '').trim();
  if (third) return third;
  const pool = line.match(/\[pool ([^\]]+)\]/);
  return pool?.[1] ?? null;
}

export function rankMaxChildrenErrors(lines: readonly string[], limit = DEFAULT_TABLE_LIMIT): FrequencyTable {
  const keys: string[] = [];
  for (const line of lines) {
    if (!MAX_CHILDREN_PATTERN.test(line)) continue;
    const key = maxChildrenKey(line);
    if (key) keys.push(key);
  }
  return buildFrequencyTable(keys, limit);
}

async function versionBlock(installRoot: string, version: string): Promise<SectionBlock> {
  const heading = `Checking ${version}...`;
  const logPath = path.join(installRoot, version, FPM_LOG_RELATIVE);
  const scan = await scanLogLines(logPath, (line) => MAX_CHILDREN_PATTERN.test(line));
  if (scan.status === 'missing') {
    return { heading, lines: ['Log file not found for this version.'] };
  }
  if (scan.status === 'unreadable') {
    return { heading, lines: [unreadableLogLine(logPath, scan.code)], tone: 'error' };
  }
  const table = rankMaxChildrenErrors(scan.lines);
  return {
    heading,
    lines: table.length ? formatFrequencyTable(table) : ["No 'max_children' errors found."],
  };
}

export async function collectPhpFpmStatus(config: Pick<DiagConfig, 'phpInstallRoot'>): Promise<Section> {
  const versions = listPhpVersions(config.phpInstallRoot);
  if (!versions.length) {
    return {
      title: 'PHP-FPM STATUS',
      blocks: [{ lines: [`No EasyApache PHP versions found under ${config.phpInstallRoot}.`] }],
    };
  }
  const blocks: SectionBlock[] = [];
  for (const version of versions) {
    blocks.push(await versionBlock(config.phpInstallRoot, version));
  }
  return { title: 'PHP-FPM STATUS', blocks };
}
