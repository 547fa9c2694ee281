import { z } from 'zod';
import { runCommand, type CommandResult } from '../exec.js';

export type QuotaInfo = {
  megabytesUsed: string | null;
  megabytesLimit: string | null;
};

export interface AccountApi {
  userExists(user: string): Promise<boolean>;
  getMainDomain(user: string): Promise<string | null>;
  domainOwner(domain: string): Promise<string | null>;
  quotaInfo(user: string): Promise<QuotaInfo>;
  phpVhostVersions(user: string): Promise<Map<string, string>>;
  zoneAddressRecords(domain: string): Promise<string[]>;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

const numberish = z.union([z.number(), z.string()]).nullable().optional();

const uapiEnvelope = <T extends z.ZodTypeAny>(data: T) =>
  z.object({
    result: z.object({
      status: z.union([z.number(), z.string()]),
      data: data.nullable().optional(),
    }),
  });

const whmapiEnvelope = <T extends z.ZodTypeAny>(data: T) =>
  z.object({
    metadata: z.object({ result: z.union([z.number(), z.string()]) }),
    data: data.nullable().optional(),
  });

const mainDomainSchema = uapiEnvelope(z.object({ main_domain: z.string().nullable().optional() }));

const quotaSchema = uapiEnvelope(
  z.object({
    megabytes_used: numberish,
    megabyte_limit: numberish,
    megabytes_limit: numberish,
  }),
);

const vhostVersionsSchema = uapiEnvelope(
  z.array(
    z.object({
      vhost: z.string(),
      version: z.string().nullable().optional(),
    }),
  ),
);

const domainOwnerSchema = whmapiEnvelope(z.object({ user: z.string().nullable().optional() }));

const zoneSchema = whmapiEnvelope(
  z.object({
    zone: z.array(
      z.object({
        record: z
          .array(
            z.object({
              name: z.string().optional(),
              type: z.string().optional(),
              address: z.string().optional(),
            }),
          )
          .optional(),
      }),
    ),
  }),
);

function isSuccess(status: number | string) {
  return String(status) === '1';
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function nonEmpty(value: string | null | undefined): string | null {
  const trimmed = String(value ?? '').trim();
  return trimmed || null;
}

function toText(value: number | string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return nonEmpty(String(value));
}

export function parseMainDomainResponse(raw: string): string | null {
  const parsed = mainDomainSchema.safeParse(parseJson(raw));
  if (!parsed.success || !isSuccess(parsed.data.result.status)) return null;
  return nonEmpty(parsed.data.result.data?.main_domain);
}

/**
 * cPanel reports an unlimited quota either as the literal "unlimited" or as a
 * zero/null limit; both come back as "unlimited".
 */
export function parseQuotaResponse(raw: string): QuotaInfo {
  const parsed = quotaSchema.safeParse(parseJson(raw));
  if (!parsed.success || !isSuccess(parsed.data.result.status) || !parsed.data.result.data) {
    return { megabytesUsed: null, megabytesLimit: null };
  }
  const data = parsed.data.result.data;
  const rawLimit = data.megabyte_limit !== undefined ? data.megabyte_limit : data.megabytes_limit;
  const limitText = toText(rawLimit);
  const unlimited = rawLimit === null || (limitText !== null && Number(limitText) === 0);
  return {
    megabytesUsed: toText(data.megabytes_used),
    megabytesLimit: unlimited ? 'unlimited' : limitText,
  };
}

export function parseVhostVersionsResponse(raw: string): Map<string, string> {
  const versions = new Map<string, string>();
  const parsed = vhostVersionsSchema.safeParse(parseJson(raw));
  if (!parsed.success || !isSuccess(parsed.data.result.status)) return versions;
  for (const entry of parsed.data.result.data ?? []) {
    const version = nonEmpty(entry.version);
    if (version && !versions.has(entry.vhost)) {
      versions.set(entry.vhost, version);
    }
  }
  return versions;
}

export function parseDomainOwnerResponse(raw: string): string | null {
  const parsed = domainOwnerSchema.safeParse(parseJson(raw));
  if (!parsed.success || !isSuccess(parsed.data.metadata.result)) return null;
  return nonEmpty(parsed.data.data?.user);
}

/** A records for the zone apex, in the order the zone file lists them. */
export function parseZoneAddressRecords(raw: string, domain: string): string[] {
  const parsed = zoneSchema.safeParse(parseJson(raw));
  if (!parsed.success || !isSuccess(parsed.data.metadata.result)) return [];
  const apex = `${domain.replace(/\.$/, '')}.`.toLowerCase();
  const addresses: string[] = [];
  for (const zone of parsed.data.data?.zone ?? []) {
    for (const record of zone.record ?? []) {
      if ((record.type || '').toUpperCase() !== 'A') continue;
      if ((record.name || '').toLowerCase() !== apex) continue;
      const address = nonEmpty(record.address);
      if (address) addresses.push(address);
    }
  }
  return addresses;
}

async function runJson(run: CommandRunner, command: string, args: string[]): Promise<string> {
  const result = await run(command, args);
  if (result.code !== 0) {
    console.warn('cpanel.api.failed', {
      command,
      fn: args.filter((arg) => !arg.startsWith('--')).slice(0, 2).join(' '),
      code: result.code,
      stderr: result.stderr.trim().slice(0, 200),
    });
    return '';
  }
  return result.stdout;
}

export function createCpanelApi(run: CommandRunner = runCommand): AccountApi {
  const uapi = (user: string, module: string, fn: string) =>
    runJson(run, 'uapi', ['--output=json', `--user=${user}`, module, fn]);
  const whmapi1 = (fn: string, domain: string) =>
    runJson(run, 'whmapi1', ['--output=json', fn, `domain=${domain}`]);

  return {
    async userExists(user) {
      if (!user || user.startsWith('-')) return false;
      const result = await run('id', ['-u', user]);
      return result.code === 0;
    },
    async getMainDomain(user) {
      return parseMainDomainResponse(await uapi(user, 'Domains', 'get_main_domain'));
    },
    async domainOwner(domain) {
      return parseDomainOwnerResponse(await whmapi1('getdomainowner', domain));
    },
    async quotaInfo(user) {
      return parseQuotaResponse(await uapi(user, 'Quota', 'get_quota_info'));
    },
    async phpVhostVersions(user) {
      return parseVhostVersionsResponse(await uapi(user, 'LangPHP', 'php_get_vhost_versions'));
    },
    async zoneAddressRecords(domain) {
      return parseZoneAddressRecords(await whmapi1('dumpzone', domain), domain);
    },
  };
}
