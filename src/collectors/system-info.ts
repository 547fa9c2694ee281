import { commandOutput, runCommand } from '../exec.js';
import type { Section, SectionBlock } from '../report.js';
import { splitLines } from '../lib/text.js';

const PROBES: Array<{ heading: string; command: string; args: string[] }> = [
  { heading: 'Load & Uptime:', command: 'uptime', args: [] },
  { heading: 'Disk Usage:', command: 'df', args: ['-h'] },
  { heading: 'Memory Usage:', command: 'free', args: ['-mh'] },
  { heading: 'CPU Core Count:', command: 'nproc', args: [] },
];

export async function collectSystemInfo(): Promise<Section> {
  const blocks: SectionBlock[] = [];
  for (const probe of PROBES) {
    const result = await runCommand(probe.command, probe.args, 8000);
    const output = commandOutput(result);
    blocks.push({
      heading: probe.heading,
      lines: output ? splitLines(output) : [`${probe.command} unavailable.`],
    });
  }
  return { title: 'BASIC SYSTEM INFO', blocks };
}
