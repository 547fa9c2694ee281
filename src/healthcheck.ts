#!/usr/bin/env node
import { readDiagConfig } from './config.js';
import { runHealthCheck } from './health.js';
import { colorEnabled } from './report.js';

runHealthCheck(readDiagConfig(), colorEnabled()).then(
  (lines) => {
    for (const line of lines) {
      console.log(line);
    }
  },
  (err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.warn('healthcheck.failed', { message });
  },
);
