import path from 'path';

export type CommandPolicyMode = 'off' | 'audit' | 'enforce';

export type CommandPolicyContext = {
  source?: string;
};

type Decision =
  | { allowed: true }
  | { allowed: false; reason: string };

// Read-only API functions. Anything that changes account state stays out of this list.
const UAPI_FUNCTIONS = new Set([
  'Domains get_main_domain',
  'Quota get_quota_info',
  'LangPHP php_get_vhost_versions',
]);
const WHMAPI1_FUNCTIONS = new Set(['getdomainowner', 'dumpzone']);
const NO_ARG_COMMANDS = new Set(['uptime', 'nproc']);

function getModeFromEnv(): CommandPolicyMode {
  const raw = String(process.env.PANEL_DIAG_COMMAND_POLICY_MODE || '').trim().toLowerCase();
  if (raw === 'off' || raw === '0' || raw === 'false') return 'off';
  if (raw === 'audit') return 'audit';
  if (raw === 'enforce') return 'enforce';
  return 'enforce';
}

function baseCommand(command: string) {
  return path.basename(command || '');
}

function hasUnsafeArgChars(value: string) {
  return value.includes('\u0000') || value.includes('\n') || value.includes('\r');
}

function deny(reason: string): Decision {
  return { allowed: false, reason };
}

function allow(): Decision {
  return { allowed: true };
}

function isAllowed(command: string, args: string[]): Decision {
  const cmd = baseCommand(command);
  if (!cmd) return deny('empty command');

  for (const arg of args) {
    if (hasUnsafeArgChars(arg)) return deny('argv contains unsafe characters');
  }

  if (NO_ARG_COMMANDS.has(cmd)) {
    if (args.length) return deny(`${cmd} does not accept args`);
    return allow();
  }

  switch (cmd) {
    case 'id': {
      if (args.length !== 2 || args[0] !== '-u') return deny('id requires exactly "-u <user>"');
      if (!args[1] || args[1].startsWith('-')) return deny('id user must not be a flag');
      return allow();
    }
    case 'df': {
      if (args.length !== 1 || args[0] !== '-h') return deny('df only allows -h');
      return allow();
    }
    case 'free': {
      if (args.length !== 1 || args[0] !== '-mh') return deny('free only allows -mh');
      return allow();
    }
    case 'exim': {
      if (args.length !== 1 || args[0] !== '-bpc') return deny('exim only allows -bpc');
      return allow();
    }
    case 'uapi': {
      if (args[0] !== '--output=json') return deny('uapi requires --output=json');
      if (!String(args[1] || '').startsWith('--user=')) return deny('uapi requires --user=<user>');
      const fn = `${args[2] || ''} ${args[3] || ''}`.trim();
      if (!UAPI_FUNCTIONS.has(fn)) return deny(`uapi function not allowlisted: ${fn || '(missing)'}`);
      if (args.length !== 4) return deny('uapi does not accept extra args');
      return allow();
    }
    case 'whmapi1': {
      if (args[0] !== '--output=json') return deny('whmapi1 requires --output=json');
      const fn = String(args[1] || '');
      if (!WHMAPI1_FUNCTIONS.has(fn)) return deny(`whmapi1 function not allowlisted: ${fn || '(missing)'}`);
      const params = args.slice(2);
      if (params.length !== 1 || !params[0]?.startsWith('domain=')) {
        return deny(`whmapi1 ${fn} only accepts domain=<domain>`);
      }
      return allow();
    }
    default:
      return deny(`command not allowlisted: ${cmd}`);
  }
}

export function enforceCommandPolicy(command: string, args: string[], context: CommandPolicyContext = {}) {
  const mode = getModeFromEnv();
  if (mode === 'off') return;

  const decision = isAllowed(command, args);
  if (decision.allowed) return;

  const message = [
    'command policy violation',
    context.source ? `source=${context.source}` : '',
    `command=${baseCommand(command)}`,
    `args=${JSON.stringify(args)}`,
    `reason=${decision.reason}`,
  ]
    .filter(Boolean)
    .join(' ');

  if (mode === 'enforce') {
    throw new Error(message);
  }

  // audit
  console.warn(message);
}
