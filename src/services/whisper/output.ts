import * as fs from 'fs';
import { InvalidOutputError, MissingOutputError } from './errors';
import type { Transcript, TranscriptSegment } from './types';

export interface WhisperOutputs {
  transcript: Transcript;
  srt: string | null;
  wordTimestamps: unknown;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function asNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function objectAt(obj: JsonObject, key: string): JsonObject {
  const value = obj[key];
  return isObject(value) ? value : {};
}

function msToSeconds(value: unknown): number | null {
  const ms = asNumber(value);
  return ms === null ? null : ms / 1000;
}

/**
 * Accepts both the flat layout ({ text, segments: [{ start, end, text }] })
 * and whisper.cpp's -oj layout ({ result, transcription: [{ offsets, text }] }).
 */
export function normalizeTranscript(data: JsonObject): Transcript {
  const result = objectAt(data, 'result');
  const language = asString(data.language) ?? asString(result.language);
  const duration = asNumber(data.duration);

  const rawSegments: unknown = data.segments;
  const transcription: unknown = data.transcription;

  if (!Array.isArray(rawSegments) && Array.isArray(transcription)) {
    const entries = transcription.filter(isObject);
    const segments: TranscriptSegment[] = entries.map((entry) => {
      const offsets = objectAt(entry, 'offsets');
      return {
        start: msToSeconds(offsets.from),
        end: msToSeconds(offsets.to),
        text: (asString(entry.text) ?? '').trim(),
      };
    });
    const text = asString(data.text) ?? entries.map((entry) => asString(entry.text) ?? '').join('');
    return { language, duration, text: text.trim(), segments };
  }

  const flat = Array.isArray(rawSegments) ? rawSegments.filter(isObject) : [];
  return {
    language,
    duration,
    text: (asString(data.text) ?? '').trim(),
    segments: flat.map((s) => ({
      start: asNumber(s.start),
      end: asNumber(s.end),
      text: (asString(s.text) ?? '').trim(),
    })),
  };
}

async function readIfExists(filePath: string): Promise<string | null> {
  if (!fs.existsSync(filePath)) return null;
  return await fs.promises.readFile(filePath, 'utf8');
}

function parseJson(raw: string, filePath: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new InvalidOutputError(`${filePath}: ${message}`);
  }
}

export interface ReadOutputOptions {
  wordTimestamps: boolean;
  /** Process streams, reported back when the JSON file is missing. */
  stdout: string;
  stderr: string;
}

export async function readWhisperOutputs(outPrefix: string, opts: ReadOutputOptions): Promise<WhisperOutputs> {
  const jsonPath = `${outPrefix}.json`;
  const raw = await readIfExists(jsonPath);
  if (raw === null) throw new MissingOutputError(opts.stdout, opts.stderr);

  const data = parseJson(raw, jsonPath);
  if (!isObject(data)) throw new InvalidOutputError(`${jsonPath}: expected a JSON object`);

  const srt = await readIfExists(`${outPrefix}.srt`);

  let wordTimestamps: unknown = null;
  if (opts.wordTimestamps) {
    const wtsPath = `${outPrefix}.wts.json`;
    const wtsRaw = await readIfExists(wtsPath);
    if (wtsRaw !== null) wordTimestamps = parseJson(wtsRaw, wtsPath);
  }

  return { transcript: normalizeTranscript(data), srt, wordTimestamps };
}
