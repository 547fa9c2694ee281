import { Resolver } from 'dns/promises';
import { errorCode } from '../errors.js';

export interface PublicResolver {
  readonly server: string;
  resolveA(domain: string): Promise<string[]>;
}

// Answers that just mean "no A record"; anything else is worth a log line.
const EMPTY_ANSWER_CODES = new Set(['ENODATA', 'ENOTFOUND', 'NXDOMAIN']);

export function createPublicResolver(server: string, timeoutMs: number): PublicResolver {
  const resolver = new Resolver({ timeout: timeoutMs, tries: 1 });
  resolver.setServers([server]);
  return {
    server,
    async resolveA(domain) {
      try {
        return await resolver.resolve4(domain);
      } catch (err) {
        const code = errorCode(err);
        if (!EMPTY_ANSWER_CODES.has(code)) {
          const message = err instanceof Error ? err.message : String(err);
          console.warn('dns.public.lookup_failed', { domain, server, code, message });
        }
        return [];
      }
    },
  };
}
