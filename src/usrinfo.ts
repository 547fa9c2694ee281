#!/usr/bin/env node
import { readDiagConfig } from './config.js';
import { runUsrinfo } from './identity.js';
import { createCpanelApi } from './lib/cpanel-api.js';
import { createPublicResolver } from './lib/dns.js';

const config = readDiagConfig();

runUsrinfo(process.argv.slice(2), {
  accounts: createCpanelApi(),
  resolver: createPublicResolver(config.publicDnsServer, config.dnsTimeoutMs),
  config,
}).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  },
);
