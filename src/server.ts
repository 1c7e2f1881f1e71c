/**
 * Startup sequence: resolve (and if needed download) the whisper model, then
 * serve the HTTP API. Kept apart from index.ts so it can run under test.
 */
import { createServer, Server } from 'http';
import { createApp } from './api/app';
import type { AppConfig } from './config';
import { logger as defaultLogger, resolveLevel, type Logger } from './config/logger';
import { resolveModelPath } from './services/whisper/models';
import { candidateBinaries } from './services/whisper/runner';
import { WhisperTranscriptionService } from './services/whisper/transcription.service';

export interface StartDeps {
  resolveModel?: typeof resolveModelPath;
  logger?: Logger;
}

export async function startServer(cfg: AppConfig, deps: StartDeps = {}): Promise<Server> {
  const log = deps.logger ?? defaultLogger;
  const resolveModel = deps.resolveModel ?? resolveModelPath;
  const { whisper } = cfg;

  if (resolveLevel(cfg.logLevel) !== cfg.logLevel) {
    log.warn(`Unknown LOG_LEVEL "${cfg.logLevel}", using info`);
  }

  let modelPath: string;
  try {
    modelPath = await resolveModel({
      model: whisper.model,
      modelsDir: whisper.modelsDir,
      baseUrl: whisper.modelBaseUrl,
    });
  } catch (e) {
    log.error('Model resolution failed', e);
    throw e;
  }
  log.info('Whisper model ready', { model: whisper.model, modelPath });

  const runtime = { modelPath, threads: whisper.threads, beamSize: whisper.beamSize };
  const transcriber = new WhisperTranscriptionService({
    runtime,
    binaries: candidateBinaries(whisper.bin),
    timeoutMs: whisper.timeoutMs,
  });

  const app = createApp({
    health: {
      ok: true,
      model: whisper.model,
      model_path: modelPath,
      threads: whisper.threads,
      beam_size: whisper.beamSize,
      bin: whisper.bin,
    },
    transcriber,
    maxFileSizeBytes: cfg.upload.maxFileSizeBytes,
  });

  const server = createServer(app);
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(cfg.port, cfg.host, () => {
      server.off('error', reject);
      resolve();
    });
  });
  log.info(`Server listening on ${cfg.host}:${cfg.port} (env: ${cfg.env})`);
  return server;
}

export interface ShutdownOptions {
  logger?: Logger;
  exit?: (code: number) => void;
  signals?: NodeJS.Signals[];
}

/** Closes the server on SIGINT/SIGTERM and exits. Returns the handler for direct use. */
export function installShutdown(server: Server, opts: ShutdownOptions = {}): (signal: string) => Promise<void> {
  const log = opts.logger ?? defaultLogger;
  const exit = opts.exit ?? ((code: number) => process.exit(code));

  const shutdown = async (signal: string) => {
    log.info(`${signal} received, closing server`);
    try {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
      exit(0);
    } catch (e) {
      log.error('Error while closing server', e);
      exit(1);
    }
  };

  for (const signal of opts.signals ?? ['SIGINT', 'SIGTERM']) {
    process.once(signal, () => void shutdown(signal));
  }
  return shutdown;
}
