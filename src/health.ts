import type { DiagConfig } from './config.js';
import { collectApacheStatus } from './collectors/apache.js';
import { collectEximStatus } from './collectors/exim.js';
import { collectPhpFpmStatus } from './collectors/php-fpm.js';
import { collectSystemInfo } from './collectors/system-info.js';
import { collectSystemLogs } from './collectors/system-logs.js';
import { createPalette, renderHealthReport, type Section } from './report.js';

type Collector = {
  title: string;
  collect: () => Promise<Section>;
};

export function buildCollectors(config: DiagConfig, now: Date = new Date()): Collector[] {
  return [
    { title: 'BASIC SYSTEM INFO', collect: () => collectSystemInfo() },
    { title: 'SYSTEM LOGS', collect: () => collectSystemLogs(config) },
    { title: 'EMAIL (EXIM) STATUS', collect: () => collectEximStatus(config) },
    { title: 'APACHE WEB SERVER ANALYSIS', collect: () => collectApacheStatus(config, now) },
    { title: 'PHP-FPM STATUS', collect: () => collectPhpFpmStatus(config) },
  ];
}

/** Runs each collector in turn; one failing collector never stops the rest. */
export async function runCollectors(collectors: Collector[]): Promise<Section[]> {
  const sections: Section[] = [];
  for (const collector of collectors) {
    try {
      sections.push(await collector.collect());
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn('healthcheck.collector.failed', { section: collector.title, message });
      sections.push({
        title: collector.title,
        blocks: [{ lines: [`Section unavailable: ${message}`], tone: 'error' }],
      });
    }
  }
  return sections;
}

export async function runHealthCheck(config: DiagConfig, color: boolean, now: Date = new Date()): Promise<string[]> {
  const sections = await runCollectors(buildCollectors(config, now));
  return renderHealthReport(sections, createPalette(color));
}
