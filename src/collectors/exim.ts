import type { DiagConfig } from '../config.js';
import { commandOutput, runCommand } from '../exec.js';
import { buildFrequencyTable, type FrequencyTable } from '../lib/frequency.js';
import { bracketedIp, scanLogLines, unreadableLogLine } from '../lib/text.js';
import { formatFrequencyTable, type Section, type SectionBlock } from '../report.js';

const RATE_LIMIT_MARKER = 'connection count';
// With exim's +pid log selector the client address sits in the seventh column.
const CLIENT_ADDRESS_FIELD = 7;

export function rankRateLimitedIps(lines: readonly string[], limit = 10): FrequencyTable {
  const ips: string[] = [];
  for (const line of lines) {
    if (!line.includes(RATE_LIMIT_MARKER)) continue;
    const ip = bracketedIp(line, CLIENT_ADDRESS_FIELD);
    if (ip) ips.push(ip);
  }
  return buildFrequencyTable(ips, limit);
}

export async function collectEximStatus(config: Pick<DiagConfig, 'eximMainLog'>): Promise<Section> {
  const queue = await runCommand('exim', ['-bpc'], 8000);
  const queueCount = commandOutput(queue);
  const blocks: SectionBlock[] = [
    {
      heading: 'Outgoing Emails in Queue:',
      lines: [queueCount || 'exim queue count unavailable.'],
    },
  ];

  const heading = 'Top IPs Triggering Connection Rate Limiting:';
  const scan = await scanLogLines(config.eximMainLog, (line) => line.includes(RATE_LIMIT_MARKER));
  if (scan.status === 'missing') {
    blocks.push({ heading, lines: [`Exim main log not found at ${config.eximMainLog}.`] });
  } else if (scan.status === 'unreadable') {
    blocks.push({ heading, lines: [unreadableLogLine(config.eximMainLog, scan.code)], tone: 'error' });
  } else {
    const table = rankRateLimitedIps(scan.lines);
    blocks.push({
      heading,
      lines: table.length ? formatFrequencyTable(table) : ['No recent connection rate-limiting events found.'],
    });
  }

  return { title: 'EMAIL (EXIM) STATUS', blocks };
}
