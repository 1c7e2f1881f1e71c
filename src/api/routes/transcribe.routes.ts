import { Router, Request, Response, NextFunction } from 'express';
import { body } from 'express-validator';
import multer from 'multer';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger';
import { HttpError } from '../../services/whisper/errors';
import type { Transcriber, TranscriptionRequest } from '../../services/whisper/types';
import { validate } from '../middleware/validate';

const TRUE_WORDS = ['true', 't', '1', 'yes', 'y', 'on'];
const FALSE_WORDS = ['false', 'f', '0', 'no', 'n', 'off'];

export interface TranscribeRouteOptions {
  maxFileSizeBytes: number;
  uploadDir?: string;
}

/** Upload lands in a temp file that keeps its extension; whisper.cpp picks the decoder from it. */
function createUpload(opts: TranscribeRouteOptions) {
  return multer({
    storage: multer.diskStorage({
      destination: opts.uploadDir ?? os.tmpdir(),
      filename: (_req, file, cb) => {
        const ext = path.extname(file.originalname || '') || '.wav';
        cb(null, `upload_${uuidv4()}${ext}`);
      },
    }),
    limits: { fileSize: opts.maxFileSizeBytes, files: 1 },
  });
}

async function removeUpload(uploaded: string): Promise<void> {
  try {
    await fs.promises.rm(uploaded, { force: true });
  } catch (e) {
    logger.warn('[transcribe] could not remove upload', { path: uploaded, error: String(e) });
  }
}

/**
 * Deletes the stored upload when the response closes before the handler took
 * it over (validation errors). Once transcription starts the handler owns it.
 */
function removeUploadWhenDone(req: Request, res: Response, next: NextFunction): void {
  const uploaded = req.file?.path;
  if (uploaded) {
    res.on('close', () => {
      if (res.locals.transcribing === true) return;
      void removeUpload(uploaded);
    });
  }
  next();
}

const fieldRules = [
  body('language')
    .optional({ values: 'falsy' })
    .isString()
    .trim()
    .matches(/^[A-Za-z-]{1,16}$/)
    .withMessage('language must be a language code such as "en" or "auto"'),
  body('task')
    .optional({ values: 'falsy' })
    .isIn(['transcribe', 'translate'])
    .withMessage('task must be "transcribe" or "translate"'),
  body('word_ts')
    .optional({ values: 'falsy' })
    .trim()
    .toLowerCase()
    .isIn([...TRUE_WORDS, ...FALSE_WORDS])
    .withMessage('word_ts must be a boolean'),
];

export function parseTranscriptionFields(fields: Record<string, unknown>): TranscriptionRequest {
  const language = typeof fields.language === 'string' ? fields.language.trim() : '';
  const wordTs = typeof fields.word_ts === 'string' ? fields.word_ts.trim().toLowerCase() : '';
  return {
    language: language || undefined,
    task: fields.task === 'translate' ? 'translate' : 'transcribe',
    wordTimestamps: TRUE_WORDS.includes(wordTs),
  };
}

export function createTranscribeRoutes(transcriber: Transcriber, opts: TranscribeRouteOptions): Router {
  const router = Router();
  const upload = createUpload(opts);

  /** POST /transcribe - multipart: file (required), language, task, word_ts */
  router.post(
    '/',
    upload.single('file'),
    removeUploadWhenDone,
    validate(fieldRules),
    async (req: Request, res: Response, next: NextFunction) => {
      const file = req.file;
      if (!file) {
        return res.status(400).json({ error: 'Audio file is required (field: file)' });
      }

      const fields: Record<string, unknown> = req.body ?? {};
      const request = parseTranscriptionFields(fields);
      logger.info('[transcribe] file received', {
        originalname: file.originalname,
        mimetype: file.mimetype,
        size: file.size,
        language: request.language ?? 'auto',
        task: request.task,
        wordTimestamps: request.wordTimestamps,
      });

      // Client hung up: stop whisper.cpp instead of letting it run to the timeout.
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) controller.abort();
      });
      res.locals.transcribing = true;

      try {
        const result = await transcriber.transcribe(file.path, request, controller.signal);
        logger.info('[transcribe] done', {
          usedBin: result.used_bin,
          segments: result.segments.length,
          transcriptPreview: result.text.slice(0, 120),
        });
        return res.json(result);
      } catch (e) {
        if (controller.signal.aborted) {
          logger.warn('[transcribe] client disconnected, run aborted', { originalname: file.originalname });
          return;
        }
        if (e instanceof HttpError) {
          next(e);
          return;
        }
        const message = e instanceof Error ? e.message : String(e);
        logger.error('[transcribe] route failed', { error: message });
        return res.status(500).json({ error: 'Transcription failed', details: message });
      } finally {
        await removeUpload(file.path);
      }
    }
  );

  return router;
}
