export class UsageError extends Error {
  constructor(message = 'Usage: usrinfo <cpanel_username|domain_name>') {
    super(message);
    this.name = 'UsageError';
  }
}

/** The token could not be mapped to an account hosted on this server. */
export class ResolutionError extends Error {
  readonly token: string;

  constructor(token: string, message: string) {
    super(message);
    this.name = 'ResolutionError';
    this.token = token;
  }
}

/** The `code` of a Node system error, or '' when there is none. */
export function errorCode(err: unknown): string {
  if (err && typeof err === 'object' && 'code' in err) {
    return String(err.code);
  }
  return '';
}
