import path from 'path';
import type { DiagConfig } from './config.js';
import { ResolutionError, UsageError } from './errors.js';
import type { AccountApi } from './lib/cpanel-api.js';
import type { PublicResolver } from './lib/dns.js';
import { isFile } from './lib/text.js';

export const NOT_IN_LOCAL_ZONE = 'Not Found in local zone';
export const NOT_IN_PUBLIC_DNS = 'Not Found in public DNS';
export const NOT_AVAILABLE = 'N/A';
export const UNLIMITED = 'Unlimited';
export const SYSTEM_DEFAULT_PHP = 'System Default';
export const PHP_LOG_NOT_FOUND = 'Not found at common locations.';

export type AccountIdentity = {
  username: string;
  primaryDomain: string;
};

export type AccountProfile = AccountIdentity & {
  localARecord: string;
  publicARecord: string;
  publicResolver: string;
  diskUsed: string;
  diskLimit: string;
  phpVersion: string;
  phpLogPath: string;
};

export type IdentityDeps = {
  accounts: AccountApi;
  resolver: PublicResolver;
  config: Pick<DiagConfig, 'homeRoot'>;
};

export type OutputSink = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export function formatMegabytesAsGigabytes(raw: string | null): string {
  const value = String(raw ?? '').trim();
  if (!value) return NOT_AVAILABLE;
  const megabytes = Number(value);
  if (!Number.isFinite(megabytes)) return NOT_AVAILABLE;
  return `${(megabytes / 1024).toFixed(2)}GB`;
}

export function formatQuotaLimit(raw: string | null): string {
  if (String(raw ?? '').trim() === 'unlimited') return UNLIMITED;
  return formatMegabytesAsGigabytes(raw);
}

export async function resolveIdentity(token: string, accounts: AccountApi): Promise<AccountIdentity> {
  const input = token.trim();
  if (!input) {
    throw new UsageError();
  }

  // A real system account wins even if the token also looks like a domain.
  if (await accounts.userExists(input)) {
    const primaryDomain = (await accounts.getMainDomain(input)) ?? '';
    if (!primaryDomain) {
      throw new ResolutionError(input, `Could not resolve user or domain for '${input}'.`);
    }
    return { username: input, primaryDomain };
  }

  const owner = await accounts.domainOwner(input);
  if (!owner) {
    throw new ResolutionError(input, `Could not find a cPanel user for the domain '${input}'.`);
  }
  return { username: owner, primaryDomain: input };
}

async function degrade<T>(fact: string, task: () => Promise<T>, fallback: T): Promise<T> {
  try {
    return await task();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn('usrinfo.fact.failed', { fact, message });
    return fallback;
  }
}

export function findPhpErrorLog(homeRoot: string, identity: AccountIdentity): string {
  const home = path.join(homeRoot, identity.username);
  const candidates = [
    path.join(home, 'logs', `${identity.primaryDomain}.php.error.log`),
    path.join(home, 'public_html', 'error_log'),
  ];
  return candidates.find((candidate) => isFile(candidate)) ?? PHP_LOG_NOT_FOUND;
}

export async function gatherProfile(identity: AccountIdentity, deps: IdentityDeps): Promise<AccountProfile> {
  const { accounts, resolver, config } = deps;
  const { username, primaryDomain } = identity;

  const localARecord = await degrade(
    'local_a_record',
    async () => (await accounts.zoneAddressRecords(primaryDomain))[0] ?? NOT_IN_LOCAL_ZONE,
    NOT_IN_LOCAL_ZONE,
  );

  const publicARecord = await degrade(
    'public_a_record',
    async () => {
      const answers = await resolver.resolveA(primaryDomain);
      return answers.length ? answers.join(', ') : NOT_IN_PUBLIC_DNS;
    },
    NOT_IN_PUBLIC_DNS,
  );

  const quota = await degrade(
    'quota',
    () => accounts.quotaInfo(username),
    { megabytesUsed: null, megabytesLimit: null },
  );

  const phpVersion = await degrade(
    'php_version',
    async () => (await accounts.phpVhostVersions(username)).get(primaryDomain) ?? SYSTEM_DEFAULT_PHP,
    SYSTEM_DEFAULT_PHP,
  );

  const phpLogPath = await degrade(
    'php_log_path',
    async () => findPhpErrorLog(config.homeRoot, identity),
    PHP_LOG_NOT_FOUND,
  );

  return {
    username,
    primaryDomain,
    localARecord,
    publicARecord,
    publicResolver: resolver.server,
    diskUsed: formatMegabytesAsGigabytes(quota.megabytesUsed),
    diskLimit: formatQuotaLimit(quota.megabytesLimit),
    phpVersion,
    phpLogPath,
  };
}

export function renderProfile(profile: AccountProfile): string[] {
  return [
    `cPanel User: ${profile.username}`,
    `cPanel Domain: ${profile.primaryDomain}`,
    `Local A Record (in cPanel Zone): ${profile.localARecord}`,
    `Public A Record (from ${profile.publicResolver}): ${profile.publicARecord}`,
    `Disk space used: ${profile.diskUsed}`,
    `Disk space allocated: ${profile.diskLimit}`,
    `PHP Version: ${profile.phpVersion}`,
    `PHP Log Location: ${profile.phpLogPath}`,
  ];
}

/** Runs the account lookup end to end and returns the process exit code. */
export async function runUsrinfo(
  args: string[],
  deps: IdentityDeps,
  sink: OutputSink = { out: (line) => console.log(line), err: (line) => console.error(line) },
): Promise<number> {
  try {
    const identity = await resolveIdentity(args[0] ?? '', deps.accounts);
    const profile = await gatherProfile(identity, deps);
    for (const line of renderProfile(profile)) {
      sink.out(line);
    }
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      sink.err(err.message);
      return 1;
    }
    if (err instanceof ResolutionError) {
      sink.err(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
