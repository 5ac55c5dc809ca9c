import { createHash, randomUUID } from 'node:crypto';
import { createReadStream, createWriteStream, promises as fs } from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import axios from 'axios';
import type { Logger } from './logger';

export interface ModelWeightsOptions {
  name: string;
  url: string;
  checksum: string | null;
  dir: string;
}

export const md5File = async (filePath: string): Promise<string> => {
  const hash = createHash('md5');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
};

const fileExists = async (filePath: string) => {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile() && stat.size > 0;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
};

export type DownloadStream = (url: string) => Promise<NodeJS.ReadableStream>;

export const downloadWithAxios: DownloadStream = async (url) => {
  const response = await axios.get<NodeJS.ReadableStream>(url, {
    responseType: 'stream',
    maxRedirects: 10,
    timeout: 5 * 60 * 1000
  });
  return response.data;
};

/**
 * Returns the path of the ONNX weights file, downloading it into `dir` the
 * first time. A cached file that fails the checksum is fetched again.
 */
export const ensureModelWeights = async (
  options: ModelWeightsOptions,
  logger: Logger,
  download: DownloadStream = downloadWithAxios
): Promise<string> => {
  const modelPath = path.join(options.dir, `${options.name}.onnx`);

  if (await fileExists(modelPath)) {
    if (!options.checksum || (await md5File(modelPath)) === options.checksum) {
      logger.debug('Using cached model weights', { modelPath });
      return modelPath;
    }
    logger.warn('Cached model weights failed checksum, downloading again', { modelPath });
  }

  await fs.mkdir(options.dir, { recursive: true });
  const tempPath = path.join(options.dir, `${options.name}-${randomUUID()}.download`);
  logger.info('Downloading model weights', { url: options.url, modelPath });

  try {
    await pipeline(await download(options.url), createWriteStream(tempPath));
    if (options.checksum) {
      const actual = await md5File(tempPath);
      if (actual !== options.checksum) {
        throw new Error(`Checksum mismatch for ${options.name}: expected ${options.checksum}, got ${actual}`);
      }
    }
    await fs.rename(tempPath, modelPath);
  } finally {
    await fs.rm(tempPath, { force: true });
  }

  return modelPath;
};
