import { spawn } from 'child_process';
import { enforceCommandPolicy } from './command-policy.js';

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

const DEFAULT_TIMEOUT_MS = Number(process.env.PANEL_DIAG_COMMAND_TIMEOUT_MS || 15000);
const COMMAND_NOT_FOUND = 127;

export function runCommand(
  command: string,
  args: string[],
  timeoutMs = DEFAULT_TIMEOUT_MS,
): Promise<CommandResult> {
  return new Promise((resolve) => {
    enforceCommandPolicy(command, args, { source: 'exec.runCommand' });
    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: { ...process.env, LC_ALL: 'C' },
    });
    let stdout = '';
    let stderr = '';
    let settled = false;
    const finish = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };
    const timer = setTimeout(() => {
      child.kill('SIGKILL');
    }, timeoutMs);
    child.stdout.on('data', (chunk) => {
      stdout += chunk.toString();
    });
    child.stderr.on('data', (chunk) => {
      stderr += chunk.toString();
    });
    // A missing binary (no exim, not a cPanel host) is reported like a shell would.
    child.on('error', (err) => {
      finish({ code: COMMAND_NOT_FOUND, stdout, stderr: stderr || err.message });
    });
    child.on('close', (code) => {
      finish({ code: code ?? 1, stdout, stderr });
    });
  });
}

export function commandOutput(result: CommandResult): string {
  return (result.stdout || '').trim();
}
