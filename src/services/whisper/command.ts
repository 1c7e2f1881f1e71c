import type { TranscriptionRequest, WhisperRuntime } from './types';

export interface CommandTarget {
  inputPath: string;
  /** whisper.cpp appends .json / .srt / .wts.json to this. */
  outPrefix: string;
}

export function buildWhisperArgs(
  runtime: WhisperRuntime,
  target: CommandTarget,
  request: TranscriptionRequest
): string[] {
  const args = [
    '-m',
    runtime.modelPath,
    '-f',
    target.inputPath,
    '-oj',
    '-osrt',
    '-of',
    target.outPrefix,
    '-t',
    String(runtime.threads),
    '-bs',
    String(runtime.beamSize),
  ];
  if (request.language) args.push('-l', request.language);
  if (request.task === 'translate') args.push('-tr');
  if (request.wordTimestamps) args.push('-owts');
  return args;
}

export function formatCommand(bin: string, args: string[]): string {
  return [bin, ...args].join(' ');
}
