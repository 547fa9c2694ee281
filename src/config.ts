export type ApacheLayout = {
  name: 'ea4' | 'ea3';
  domlogsDir: string;
  errorLog: string;
};

export type DiagConfig = {
  homeRoot: string;
  publicDnsServer: string;
  dnsTimeoutMs: number;
  systemLog: string;
  eximMainLog: string;
  ea4MarkerFile: string;
  ea4: ApacheLayout;
  ea3: ApacheLayout;
  phpInstallRoot: string;
  accessLogDateFormat: string;
};

export const DEFAULT_ACCESS_LOG_DATE_FORMAT = '%d/%b/%Y:';

function readPositiveInt(raw: string | undefined, fallback: number): number {
  const value = String(raw || '').trim();
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return parsed;
}

export function readDiagConfig(env: NodeJS.ProcessEnv = process.env): DiagConfig {
  return {
    homeRoot: env.PANEL_DIAG_HOME_ROOT || '/home',
    publicDnsServer: env.PANEL_DIAG_PUBLIC_DNS || '8.8.8.8',
    dnsTimeoutMs: readPositiveInt(env.PANEL_DIAG_DNS_TIMEOUT_MS, 5000),
    systemLog: env.PANEL_DIAG_SYSTEM_LOG || '/var/log/messages',
    eximMainLog: env.PANEL_DIAG_EXIM_LOG || '/var/log/exim_mainlog',
    ea4MarkerFile: env.PANEL_DIAG_EA4_MARKER || '/etc/cpanel/ea4/is_ea4',
    ea4: {
      name: 'ea4',
      domlogsDir: env.PANEL_DIAG_EA4_DOMLOGS || '/var/log/apache2/domlogs',
      errorLog: env.PANEL_DIAG_EA4_ERROR_LOG || '/var/log/apache2/error_log',
    },
    ea3: {
      name: 'ea3',
      domlogsDir: env.PANEL_DIAG_EA3_DOMLOGS || '/usr/local/apache/domlogs',
      errorLog: env.PANEL_DIAG_EA3_ERROR_LOG || '/usr/local/apache/logs/error_log',
    },
    phpInstallRoot: env.PANEL_DIAG_PHP_ROOT || '/opt/cpanel',
    accessLogDateFormat: env.PANEL_DIAG_ACCESS_LOG_DATE_FORMAT || DEFAULT_ACCESS_LOG_DATE_FORMAT,
  };
}
