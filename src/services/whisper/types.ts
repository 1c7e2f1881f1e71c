/**
 * Shapes shared by the whisper.cpp wrapper and the HTTP layer. Response
 * fields are snake_case because that is what clients receive.
 */

export type WhisperTask = 'transcribe' | 'translate';

export interface TranscriptionRequest {
  /** Language code passed with -l; undefined lets whisper.cpp decide. */
  language?: string;
  task: WhisperTask;
  wordTimestamps: boolean;
}

/** Fixed per-process settings for every whisper.cpp invocation. */
export interface WhisperRuntime {
  modelPath: string;
  threads: number;
  beamSize: number;
}

export interface TranscriptSegment {
  start: number | null;
  end: number | null;
  text: string;
}

export interface Transcript {
  language: string | null;
  duration: number | null;
  text: string;
  segments: TranscriptSegment[];
}

export interface TranscriptionResult extends Transcript {
  srt: string | null;
  word_timestamps: unknown;
  used_bin: string;
}

export interface Transcriber {
  /** `signal` aborts the run, killing whisper.cpp, when the caller no longer wants the result. */
  transcribe(inputPath: string, request: TranscriptionRequest, signal?: AbortSignal): Promise<TranscriptionResult>;
}

export interface HealthInfo {
  ok: true;
  model: string;
  model_path: string;
  threads: number;
  beam_size: number;
  bin: string;
}
