import axios from 'axios';
import * as fs from 'fs';
import * as path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { logger } from '../../config/logger';
import { ModelNotFoundError, UnknownModelError } from './errors';

/** Model aliases accepted in WHISPER_MODEL and the ggml file each one downloads. */
export const GGML_MODELS: Readonly<Record<string, string>> = {
  tiny: 'ggml-tiny.bin',
  'tiny.en': 'ggml-tiny.en.bin',
  base: 'ggml-base.bin',
  'base.en': 'ggml-base.en.bin',
  small: 'ggml-small.bin',
  'small.en': 'ggml-small.en.bin',
  medium: 'ggml-medium.bin',
  'medium.en': 'ggml-medium.en.bin',
  'large-v1': 'ggml-large-v1.bin',
  'large-v2': 'ggml-large-v2.bin',
  'large-v3': 'ggml-large-v3.bin',
};

export interface ModelSource {
  model: string;
  modelsDir: string;
  baseUrl: string;
}

export type ModelDownloader = (url: string, destination: string) => Promise<void>;

/** Stream `url` into `destination` via a `.part` file so a crash never leaves a truncated model behind. */
export async function downloadModel(url: string, destination: string): Promise<void> {
  const partial = `${destination}.part`;
  try {
    const response = await axios.get<Readable>(url, { responseType: 'stream' });
    await pipeline(response.data, fs.createWriteStream(partial));
    await fs.promises.rename(partial, destination);
  } catch (e) {
    await fs.promises.rm(partial, { force: true });
    throw e;
  }
}

function exists(p: string): boolean {
  return fs.existsSync(p);
}

export async function resolveModelPath(
  source: ModelSource,
  download: ModelDownloader = downloadModel
): Promise<string> {
  if (source.model.includes(path.sep)) {
    if (!exists(source.model)) throw new ModelNotFoundError(source.model);
    return source.model;
  }

  const fileName = Object.prototype.hasOwnProperty.call(GGML_MODELS, source.model)
    ? GGML_MODELS[source.model]
    : undefined;
  if (!fileName) throw new UnknownModelError(source.model);

  const target = path.join(source.modelsDir, fileName);
  if (exists(target)) return target;

  await fs.promises.mkdir(source.modelsDir, { recursive: true });
  const url = `${source.baseUrl.replace(/\/+$/, '')}/${fileName}`;
  logger.info(`Downloading model ${source.model}`, { url, target });
  await download(url, target);
  logger.info('Model download complete', { target });
  return target;
}
