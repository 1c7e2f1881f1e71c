/**
 * Central configuration. All env vars are read here so the rest of the app
 * stays env-agnostic and testable. Call loadConfig() at startup; it throws
 * ConfigError on bad values.
 */
import dotenv from 'dotenv';

dotenv.config();

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  return {
    env: env.NODE_ENV || 'development',
    host: env.HOST || '0.0.0.0',
    port: positiveInt(env, 'PORT', 8000),
    logLevel: env.LOG_LEVEL || 'info',

    whisper: {
      modelsDir: env.MODELS_DIR || '/models',
      /** Alias from the ggml table (e.g. base.en) or a path to a model file. */
      model: env.WHISPER_MODEL || 'base.en',
      threads: positiveInt(env, 'WHISPER_THREADS', 4),
      beamSize: positiveInt(env, 'WHISPER_BEAM_SIZE', 5),
      /** Preferred binary; whisper-cli and whisper are tried after it. */
      bin: env.WHISPER_BIN || 'whisper-cli',
      timeoutMs: positiveInt(env, 'WHISPER_TIMEOUT_MS', 10 * 60 * 1000),
      modelBaseUrl:
        env.WHISPER_MODEL_BASE_URL || 'https://huggingface.co/ggerganov/whisper.cpp/resolve/main',
    },

    upload: {
      maxFileSizeBytes: positiveInt(env, 'UPLOAD_MAX_MB', 100) * 1024 * 1024,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;
