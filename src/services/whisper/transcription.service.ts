/**
 * One transcription = one whisper.cpp run in a private temp directory,
 * followed by reading the files it wrote there.
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { logger } from '../../config/logger';
import { buildWhisperArgs, formatCommand } from './command';
import { WhisperBinaryNotFoundError, WhisperProcessError, WhisperTimeoutError } from './errors';
import { readWhisperOutputs } from './output';
import { CommandTimeoutError, runCommand, runWithFallback, type Attempt, type CommandRunner } from './runner';
import type { Transcriber, TranscriptionRequest, TranscriptionResult, WhisperRuntime } from './types';

export interface TranscriptionSettings {
  runtime: WhisperRuntime;
  /** Binary names in the order they are tried. */
  binaries: string[];
  timeoutMs: number;
}

export class WhisperTranscriptionService implements Transcriber {
  constructor(
    private readonly settings: TranscriptionSettings,
    private readonly run: CommandRunner = runCommand
  ) {}

  async transcribe(inputPath: string, request: TranscriptionRequest, signal?: AbortSignal): Promise<TranscriptionResult> {
    const workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'whisper-'));
    const outPrefix = path.join(workDir, 'out');
    const { binaries, timeoutMs } = this.settings;

    try {
      const args = buildWhisperArgs(this.settings.runtime, { inputPath, outPrefix }, request);

      let attempt: Attempt;
      try {
        attempt = await runWithFallback(binaries, args, { timeoutMs, signal }, this.run);
      } catch (e) {
        if (e instanceof CommandTimeoutError) throw new WhisperTimeoutError(e.timeoutMs, e.cmd);
        throw e;
      }

      if (attempt.notFound) throw new WhisperBinaryNotFoundError(binaries);

      const { bin, result } = attempt;
      logger.info('[transcribe] whisper.cpp finished', {
        bin,
        code: result.code,
        stdoutBytes: result.stdout.length,
        stderrBytes: result.stderr.length,
      });

      if (result.code !== 0) {
        throw new WhisperProcessError({
          exitCode: result.code,
          stdout: result.stdout,
          stderr: result.stderr,
          cmd: formatCommand(bin, args),
          triedBins: binaries,
          usedBin: bin,
        });
      }

      const outputs = await readWhisperOutputs(outPrefix, {
        wordTimestamps: request.wordTimestamps,
        stdout: result.stdout,
        stderr: result.stderr,
      });

      return {
        ...outputs.transcript,
        srt: outputs.srt,
        word_timestamps: outputs.wordTimestamps,
        used_bin: bin,
      };
    } finally {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    }
  }
}
