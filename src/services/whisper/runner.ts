import { spawn } from 'child_process';
import { logger } from '../../config/logger';

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs: number;
  /** Aborting kills the child (client went away). */
  signal?: AbortSignal;
}

export type CommandRunner = (cmd: string, args: string[], opts: RunOptions) => Promise<CommandResult>;

export class CommandTimeoutError extends Error {
  constructor(
    readonly cmd: string,
    readonly timeoutMs: number
  ) {
    super(`Command timed out after ${timeoutMs}ms: ${cmd}`);
    this.name = 'CommandTimeoutError';
  }
}

export class CommandAbortedError extends Error {
  constructor(readonly cmd: string) {
    super(`Command aborted: ${cmd}`);
    this.name = 'CommandAbortedError';
  }
}

export async function runCommand(cmd: string, args: string[], opts: RunOptions): Promise<CommandResult> {
  const { signal } = opts;
  if (signal?.aborted) throw new CommandAbortedError(cmd);

  return await new Promise((resolve, reject) => {
    const child = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    const onAbort = () => {
      clearTimeout(timeoutId);
      child.kill('SIGKILL');
      reject(new CommandAbortedError(cmd));
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      child.kill('SIGKILL');
      reject(new CommandTimeoutError(cmd, opts.timeoutMs));
    }, opts.timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    const settle = () => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    };

    // Decode on the stream so multibyte characters split across chunks survive.
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (d: string) => (stdout += d));
    child.stderr.on('data', (d: string) => (stderr += d));

    child.on('error', (e) => {
      settle();
      reject(e);
    });

    child.on('close', (code) => {
      settle();
      resolve({ code: code ?? 1, stdout, stderr });
    });
  });
}

/** Preferred binary first, then the usual whisper.cpp names; each tried once. */
export function candidateBinaries(preferred: string): string[] {
  return [...new Set([preferred, 'whisper-cli', 'whisper'])];
}

export type Attempt =
  | { bin: string; notFound: true }
  | { bin: string; notFound: false; result: CommandResult };

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * Runs `args` with each candidate until one actually runs. A missing binary,
 * or one that exits non-zero complaining it is deprecated (the old `main`
 * / `whisper` shims), moves on to the next name. The last attempt is returned.
 */
export async function runWithFallback(
  candidates: string[],
  args: string[],
  opts: RunOptions,
  run: CommandRunner = runCommand
): Promise<Attempt> {
  let last: Attempt | null = null;
  for (const bin of candidates) {
    let result: CommandResult;
    try {
      result = await run(bin, args, opts);
    } catch (e) {
      if (!isNotFound(e)) throw e;
      logger.debug('[transcribe] binary not found', { bin });
      last = { bin, notFound: true };
      continue;
    }
    last = { bin, notFound: false, result };

    const output = (result.stdout + result.stderr).toLowerCase();
    if (result.code !== 0 && output.includes('deprecated')) {
      logger.warn('[transcribe] binary reported deprecation, trying next', { bin, code: result.code });
      continue;
    }
    break;
  }

  if (!last) throw new Error('No whisper binary candidates configured');
  return last;
}
