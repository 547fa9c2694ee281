import type { DiagConfig } from '../config.js';
import type { Section } from '../report.js';
import { scanLogLines, tail, unreadableLogLine } from '../lib/text.js';

const OOM_MARKER = /oom-killer/i;
const OOM_OR_KILLED = /oom-killer|killed/i;
const OOM_LINE_LIMIT = 10;

/** Last matching kernel lines, oldest first, as they appear in the log. */
export function findOomEvents(lines: readonly string[], limit = OOM_LINE_LIMIT): string[] | null {
  if (!lines.some((line) => OOM_MARKER.test(line))) return null;
  return tail(lines.filter((line) => OOM_OR_KILLED.test(line)), limit);
}

export async function collectSystemLogs(config: Pick<DiagConfig, 'systemLog'>): Promise<Section> {
  const heading = 'Recent OOM (Out Of Memory) Events:';
  // Every oom-killer line also matches the wider pattern, so the scan only keeps those.
  const scan = await scanLogLines(config.systemLog, (line) => OOM_OR_KILLED.test(line));
  if (scan.status === 'missing') {
    return {
      title: 'SYSTEM LOGS',
      blocks: [{ heading, lines: [`System log not found at ${config.systemLog}.`] }],
    };
  }
  if (scan.status === 'unreadable') {
    return {
      title: 'SYSTEM LOGS',
      blocks: [{ heading, lines: [unreadableLogLine(config.systemLog, scan.code)], tone: 'error' }],
    };
  }
  const events = findOomEvents(scan.lines);
  return {
    title: 'SYSTEM LOGS',
    blocks: [{ heading, lines: events ?? [`No OOM events found in ${config.systemLog}.`] }],
  };
}
