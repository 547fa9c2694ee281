import type { FrequencyTable } from './lib/frequency.js';

export type SectionBlock = {
  heading?: string;
  lines: string[];
  tone?: 'error';
};

export type Section = {
  title: string;
  blocks: SectionBlock[];
};

type Palette = {
  yellow: string;
  blue: string;
  red: string;
  reset: string;
};

const RULE = '='.repeat(53);

export function createPalette(color: boolean): Palette {
  if (!color) {
    return { yellow: '', blue: '', red: '', reset: '' };
  }
  return {
    yellow: '\x1b[1;33m',
    blue: '\x1b[1;34m',
    red: '\x1b[0;31m',
    reset: '\x1b[0m',
  };
}

export function colorEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return !env.NO_COLOR;
}

/** Renders like `uniq -c`: right-aligned count, then the key. */
export function formatFrequencyTable(table: FrequencyTable): string[] {
  return table.map(({ key, count }) => `${String(count).padStart(7)} ${key}`);
}

function banner(palette: Palette, text: string): string[] {
  const { blue, yellow, reset } = palette;
  return [
    `${blue}${RULE}${reset}`,
    `${blue}== ${yellow}${text}${reset}`,
    `${blue}${RULE}${reset}`,
  ];
}

export function renderSection(section: Section, palette: Palette): string[] {
  const lines = ['', ...banner(palette, section.title)];
  section.blocks.forEach((block, index) => {
    if (index > 0) lines.push('');
    if (block.heading) {
      lines.push(`${palette.yellow}${block.heading}${palette.reset}`);
    }
    for (const line of block.lines) {
      lines.push(block.tone === 'error' ? `${palette.red}${line}${palette.reset}` : line);
    }
  });
  return lines;
}

export function renderHealthReport(sections: Section[], palette: Palette): string[] {
  return [
    '',
    ...banner(palette, 'Health check start.'),
    ...sections.flatMap((section) => renderSection(section, palette)),
    ...banner(palette, 'Health check complete.'),
  ];
}
