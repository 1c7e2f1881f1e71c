/**
 * Errors raised while resolving models and running whisper.cpp. The ones that
 * can reach a client carry the HTTP status and JSON body to answer with.
 */

export type ErrorBody = { error: string } & Record<string, unknown>;

/** Keep only the end of a (possibly long) process stream. */
export function tail(text: string, max = 2000): string {
  return text.length > max ? text.slice(-max) : text;
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly body: ErrorBody
  ) {
    super(body.error);
    this.name = 'HttpError';
  }
}

export class WhisperBinaryNotFoundError extends HttpError {
  constructor(readonly triedBins: string[]) {
    super(500, {
      error: `whisper binary not found (tried ${triedBins.join(', ')})`,
      tried_bins: triedBins,
    });
    this.name = 'WhisperBinaryNotFoundError';
  }
}

export interface ProcessFailure {
  exitCode: number;
  stdout: string;
  stderr: string;
  cmd: string;
  triedBins: string[];
  usedBin: string;
}

export class WhisperProcessError extends HttpError {
  constructor(failure: ProcessFailure) {
    super(500, {
      error: 'whisper.cpp failed',
      exit_code: failure.exitCode,
      stderr_tail: tail(failure.stderr),
      stdout_tail: tail(failure.stdout),
      cmd: failure.cmd,
      tried_bins: failure.triedBins,
      used_bin: failure.usedBin,
    });
    this.name = 'WhisperProcessError';
  }
}

export class WhisperTimeoutError extends HttpError {
  constructor(timeoutMs: number, usedBin: string) {
    super(504, {
      error: `whisper.cpp timed out after ${timeoutMs}ms`,
      timeout_ms: timeoutMs,
      used_bin: usedBin,
    });
    this.name = 'WhisperTimeoutError';
  }
}

export class MissingOutputError extends HttpError {
  constructor(stdout: string, stderr: string) {
    super(500, {
      error: 'missing JSON output',
      stdout_tail: tail(stdout),
      stderr_tail: tail(stderr),
    });
    this.name = 'MissingOutputError';
  }
}

export class InvalidOutputError extends HttpError {
  constructor(details: string) {
    super(500, { error: 'invalid JSON output', details });
    this.name = 'InvalidOutputError';
  }
}

export class ModelNotFoundError extends Error {
  constructor(readonly modelPath: string) {
    super(`Model not found at ${modelPath}`);
    this.name = 'ModelNotFoundError';
  }
}

export class UnknownModelError extends Error {
  constructor(readonly alias: string) {
    super(`Unknown model alias: ${alias}`);
    this.name = 'UnknownModelError';
  }
}
