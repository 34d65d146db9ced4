import { spawn } from 'node:child_process';

const DEFAULT_TIMEOUT_MS = 60_000;
const MAX_CAPTURED_OUTPUT = 1024 * 1024;

export interface RunCommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Kill the process and reject after this many milliseconds (default 60s). */
  timeoutMs?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export class CommandError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;
  readonly timedOut: boolean;

  constructor(command: string, exitCode: number | null, stderr: string, timedOut = false) {
    const detail = timedOut
      ? 'timed out'
      : exitCode === null ? 'was terminated' : `failed with exit code ${exitCode}`;
    const output = stderr.trim();
    super(`Command (${command}) ${detail}${output ? `: ${output.slice(0, 500)}` : ''}`);
    this.name = 'CommandError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
    this.timedOut = timedOut;
  }
}

function appendCapped(buffer: string, chunk: Buffer): string {
  if (buffer.length >= MAX_CAPTURED_OUTPUT) return buffer;
  return (buffer + chunk.toString('utf8')).slice(0, MAX_CAPTURED_OUTPUT);
}

/**
 * Run a command from an argv array (no shell) and resolve with its output.
 * Rejects with CommandError on a non-zero exit or a timeout.
 */
export function runCommand(command: string, args: string[], options: RunCommandOptions = {}): Promise<CommandResult> {
  const { cwd, env, timeoutMs = DEFAULT_TIMEOUT_MS } = options;
  const display = [command, ...args].join(' ');

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      env: env ? { ...process.env, ...env } : process.env,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeoutMs);

    const finish = (error: Error | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (error) {
        reject(error);
      } else {
        resolve({ stdout, stderr });
      }
    };

    child.stdout.on('data', (chunk: Buffer) => {
      stdout = appendCapped(stdout, chunk);
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr = appendCapped(stderr, chunk);
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        finish(new CommandError(display, null, `"${command}" not found. Ensure it is installed and available on PATH.`));
        return;
      }
      finish(error);
    });

    child.on('close', (code) => {
      if (code === 0 && !timedOut) {
        finish(null);
        return;
      }
      finish(new CommandError(display, code, stderr || stdout, timedOut));
    });
  });
}
