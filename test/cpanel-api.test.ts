import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  createCpanelApi,
  parseDomainOwnerResponse,
  parseMainDomainResponse,
  parseQuotaResponse,
  parseVhostVersionsResponse,
  parseZoneAddressRecords,
} from '../src/lib/cpanel-api.js';

const uapi = (data: unknown, status = 1) =>
  JSON.stringify({ apiversion: 3, module: 'X', func: 'y', result: { status, data, errors: null } });

const whmapi = (data: unknown, result = 1) =>
  JSON.stringify({ metadata: { result, reason: 'OK', version: 1 }, data });

describe('cpanel api response parsing', () => {
  it('reads the main domain', () => {
    expect(parseMainDomainResponse(uapi({ main_domain: 'bob.example' }))).toBe('bob.example');
    expect(parseMainDomainResponse(uapi({ main_domain: '' }))).toBeNull();
    expect(parseMainDomainResponse(uapi({ main_domain: 'bob.example' }, 0))).toBeNull();
    expect(parseMainDomainResponse('not json')).toBeNull();
    expect(parseMainDomainResponse('')).toBeNull();
  });

  it('reads quota usage and limit as text', () => {
    expect(parseQuotaResponse(uapi({ megabytes_used: 2048, megabyte_limit: 10240 }))).toEqual({
      megabytesUsed: '2048',
      megabytesLimit: '10240',
    });
    expect(parseQuotaResponse(uapi({ megabytes_used: '512.5', megabytes_limit: 'unlimited' }))).toEqual({
      megabytesUsed: '512.5',
      megabytesLimit: 'unlimited',
    });
  });

  it('treats a zero or null quota limit as unlimited', () => {
    expect(parseQuotaResponse(uapi({ megabytes_used: 1, megabyte_limit: 0 })).megabytesLimit).toBe('unlimited');
    expect(parseQuotaResponse(uapi({ megabytes_used: 1, megabyte_limit: null })).megabytesLimit).toBe('unlimited');
  });

  it('returns absent quota facts when the call failed', () => {
    expect(parseQuotaResponse(uapi(null, 0))).toEqual({ megabytesUsed: null, megabytesLimit: null });
    expect(parseQuotaResponse(uapi({}))).toEqual({ megabytesUsed: null, megabytesLimit: null });
  });

  it('maps vhosts to their php version', () => {
    const versions = parseVhostVersionsResponse(
      uapi([
        { vhost: 'bob.example', version: 'ea-php81', account: 'bob' },
        { vhost: 'shop.bob.example', version: 'ea-php74', account: 'bob' },
        { vhost: 'blank.example', version: '' },
      ]),
    );
    expect(versions.get('bob.example')).toBe('ea-php81');
    expect(versions.get('shop.bob.example')).toBe('ea-php74');
    expect(versions.has('blank.example')).toBe(false);
  });

  it('reads the domain owner', () => {
    expect(parseDomainOwnerResponse(whmapi({ user: 'bobby' }))).toBe('bobby');
    expect(parseDomainOwnerResponse(whmapi({ user: null }))).toBeNull();
    expect(parseDomainOwnerResponse(whmapi({ user: 'bobby' }, 0))).toBeNull();
  });

  it('keeps apex A records in zone order', () => {
    const raw = whmapi({
      zone: [
        {
          record: [
            { Line: 1, type: 'SOA', name: 'bob.example.' },
            { Line: 5, type: 'A', name: 'bob.example.', address: '192.0.2.20' },
            { Line: 6, type: 'A', name: 'mail.bob.example.', address: '192.0.2.99' },
            { Line: 7, type: 'A', name: 'bob.example.', address: '192.0.2.10' },
            { Line: 8, type: 'CNAME', name: 'www.bob.example.', cname: 'bob.example' },
          ],
        },
      ],
    });
    expect(parseZoneAddressRecords(raw, 'bob.example')).toEqual(['192.0.2.20', '192.0.2.10']);
    expect(parseZoneAddressRecords(whmapi({ zone: [{ record: [] }] }), 'bob.example')).toEqual([]);
  });
});

describe('createCpanelApi', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('invokes uapi and whmapi1 with json output', async () => {
    const run = vi.fn(async (command: string, args: string[]) => {
      if (command === 'uapi' && args[3] === 'get_main_domain') {
        return { code: 0, stdout: uapi({ main_domain: 'bob.example' }), stderr: '' };
      }
      if (command === 'whmapi1' && args[1] === 'getdomainowner') {
        return { code: 0, stdout: whmapi({ user: 'bob' }), stderr: '' };
      }
      return { code: 1, stdout: '', stderr: 'unexpected' };
    });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const api = createCpanelApi(run);

    await expect(api.getMainDomain('bob')).resolves.toBe('bob.example');
    expect(run).toHaveBeenCalledWith('uapi', ['--output=json', '--user=bob', 'Domains', 'get_main_domain']);

    await expect(api.domainOwner('bob.example')).resolves.toBe('bob');
    expect(run).toHaveBeenCalledWith('whmapi1', ['--output=json', 'getdomainowner', 'domain=bob.example']);

    await expect(api.zoneAddressRecords('bob.example')).resolves.toEqual([]);
  });

  it('checks system accounts with id and never passes flags through', async () => {
    const run = vi.fn(async (_command: string, args: string[]) => ({
      code: args[1] === 'bob' ? 0 : 1,
      stdout: '',
      stderr: '',
    }));
    const api = createCpanelApi(run);

    await expect(api.userExists('bob')).resolves.toBe(true);
    await expect(api.userExists('nobody-here')).resolves.toBe(false);
    await expect(api.userExists('--help')).resolves.toBe(false);
    expect(run).toHaveBeenCalledTimes(2);
    expect(run).toHaveBeenCalledWith('id', ['-u', 'bob']);
  });

  it('logs failed api calls and returns absent values', async () => {
    const run = vi.fn(async () => ({ code: 255, stdout: '', stderr: 'whmapi1: not found' }));
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const api = createCpanelApi(run);

    await expect(api.quotaInfo('bob')).resolves.toEqual({ megabytesUsed: null, megabytesLimit: null });
    expect(warnSpy).toHaveBeenCalledWith('cpanel.api.failed', {
      command: 'uapi',
      fn: 'Quota get_quota_info',
      code: 255,
      stderr: 'whmapi1: not found',
    });
  });
});
