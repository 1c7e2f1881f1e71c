import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios, { AxiosHeaders } from 'axios';
import { ModelNotFoundError, UnknownModelError } from './errors';
import { GGML_MODELS, downloadModel, resolveModelPath, type ModelDownloader } from './models';

const baseUrl = 'https://models.test/whisper';

describe('resolveModelPath', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'whisper-models-test-'));
  });

  afterEach(async () => {
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  it('maps every alias to its ggml file', () => {
    expect(GGML_MODELS['base.en']).toBe('ggml-base.en.bin');
    expect(GGML_MODELS['large-v3']).toBe('ggml-large-v3.bin');
    expect(Object.keys(GGML_MODELS)).toHaveLength(11);
  });

  it('returns an existing model path as is', async () => {
    const modelFile = path.join(root, 'custom.bin');
    fs.writeFileSync(modelFile, 'weights');
    const download = vi.fn<ModelDownloader>();

    await expect(resolveModelPath({ model: modelFile, modelsDir: '/unused', baseUrl }, download)).resolves.toBe(modelFile);
    expect(download).not.toHaveBeenCalled();
  });

  it('rejects a model path that does not exist', async () => {
    const missing = path.join(root, 'nope.bin');
    await expect(resolveModelPath({ model: missing, modelsDir: root, baseUrl })).rejects.toThrow(
      new ModelNotFoundError(missing).message
    );
  });

  it('rejects an unknown alias', async () => {
    const attempt = resolveModelPath({ model: 'gigantic', modelsDir: root, baseUrl });
    await expect(attempt).rejects.toBeInstanceOf(UnknownModelError);
    await expect(attempt).rejects.toThrow('Unknown model alias: gigantic');
  });

  it('does not treat inherited object keys as aliases', async () => {
    await expect(resolveModelPath({ model: 'toString', modelsDir: root, baseUrl })).rejects.toBeInstanceOf(
      UnknownModelError
    );
  });

  it('uses an already downloaded alias without fetching', async () => {
    fs.writeFileSync(path.join(root, 'ggml-tiny.bin'), 'weights');
    const download = vi.fn<ModelDownloader>();

    await expect(resolveModelPath({ model: 'tiny', modelsDir: root, baseUrl }, download)).resolves.toBe(
      path.join(root, 'ggml-tiny.bin')
    );
    expect(download).not.toHaveBeenCalled();
  });

  it('creates the models directory and downloads a missing alias', async () => {
    const modelsDir = path.join(root, 'nested', 'models');
    const download = vi.fn<ModelDownloader>(async (_url, destination) => {
      fs.writeFileSync(destination, 'weights');
    });

    const resolved = await resolveModelPath({ model: 'base.en', modelsDir, baseUrl: `${baseUrl}/` }, download);

    expect(resolved).toBe(path.join(modelsDir, 'ggml-base.en.bin'));
    expect(download).toHaveBeenCalledWith(`${baseUrl}/ggml-base.en.bin`, resolved);
    expect(fs.readFileSync(resolved, 'utf8')).toBe('weights');
  });
});

describe('downloadModel', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'whisper-download-test-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  it('streams the body to the destination', async () => {
    const get = vi.spyOn(axios, 'get').mockResolvedValue({
      data: Readable.from([Buffer.from('ggml'), Buffer.from('-bytes')]),
      status: 200,
      statusText: 'OK',
      headers: {},
      config: { headers: new AxiosHeaders() },
    });
    const destination = path.join(root, 'ggml-tiny.bin');

    await downloadModel(`${baseUrl}/ggml-tiny.bin`, destination);

    expect(get).toHaveBeenCalledWith(`${baseUrl}/ggml-tiny.bin`, { responseType: 'stream' });
    expect(fs.readFileSync(destination, 'utf8')).toBe('ggml-bytes');
    expect(fs.existsSync(`${destination}.part`)).toBe(false);
  });

  it('leaves nothing behind when the request fails', async () => {
    vi.spyOn(axios, 'get').mockRejectedValue(new Error('Request failed with status code 404'));
    const destination = path.join(root, 'ggml-tiny.bin');

    await expect(downloadModel(`${baseUrl}/ggml-tiny.bin`, destination)).rejects.toThrow(
      'Request failed with status code 404'
    );
    expect(fs.readdirSync(root)).toEqual([]);
  });
});
