import { describe, expect, it } from 'vitest';
import {
  colorEnabled,
  createPalette,
  formatFrequencyTable,
  renderHealthReport,
  renderSection,
} from '../src/report.js';

const RULE = '='.repeat(53);

describe('report rendering', () => {
  it('formats frequency tables like uniq -c', () => {
    expect(formatFrequencyTable([
      { key: '2.2.2.2', count: 5 },
      { key: '1.1.1.1', count: 123 },
    ])).toEqual(['      5 2.2.2.2', '    123 1.1.1.1']);
  });

  it('renders section blocks with headings and blank separators', () => {
    const lines = renderSection(
      {
        title: 'SYSTEM LOGS',
        blocks: [
          { heading: 'First:', lines: ['a'] },
          { lines: ['b', 'c'] },
        ],
      },
      createPalette(false),
    );
    expect(lines).toEqual(['', RULE, '== SYSTEM LOGS', RULE, 'First:', 'a', '', 'b', 'c']);
  });

  it('colours headers and error lines when colour is on', () => {
    const lines = renderSection(
      { title: 'APACHE WEB SERVER ANALYSIS', blocks: [{ lines: ['missing'], tone: 'error' }] },
      createPalette(true),
    );
    expect(lines[2]).toBe('\x1b[1;34m== \x1b[1;33mAPACHE WEB SERVER ANALYSIS\x1b[0m');
    expect(lines[4]).toBe('\x1b[0;31mmissing\x1b[0m');
  });

  it('wraps sections between the start and completion banners', () => {
    const lines = renderHealthReport(
      [{ title: 'PHP-FPM STATUS', blocks: [{ lines: ['x'] }] }],
      createPalette(false),
    );
    expect(lines).toEqual([
      '',
      RULE,
      '== Health check start.',
      RULE,
      '',
      RULE,
      '== PHP-FPM STATUS',
      RULE,
      'x',
      RULE,
      '== Health check complete.',
      RULE,
    ]);
  });

  it('disables colour when NO_COLOR is set', () => {
    expect(colorEnabled({})).toBe(true);
    expect(colorEnabled({ NO_COLOR: '1' })).toBe(false);
  });
});
