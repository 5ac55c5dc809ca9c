import * as ort from 'onnxruntime-node';
import sharp from 'sharp';
import { ImageRejectedError, InferenceFailedError, ModelNotReadyError, StartupFailureError } from './errors';
import { MAX_IMAGE_PIXELS } from './config';
import type { Logger } from './logger';
import { SerialQueue } from './serialQueue';

/**
 * Process-wide handle on the segmentation model. Loaded once before the
 * worker is marked ready and released on shutdown; read-only in between.
 */
export interface ModelHandle {
  readonly modelName: string;
  isLoaded(): boolean;
  load(): Promise<void>;
  /** Returns PNG bytes whose alpha channel is the foreground matte. */
  removeBackground(image: Buffer, signal?: AbortSignal): Promise<Buffer>;
  release(): Promise<void>;
}

export interface TensorLike {
  readonly data: unknown;
  readonly dims: readonly number[];
}

/** The part of `ort.InferenceSession` the handle relies on. */
export interface SegmentationSession {
  readonly inputNames: readonly string[];
  readonly outputNames: readonly string[];
  run(feeds: Record<string, ort.Tensor>): Promise<Record<string, TensorLike>>;
  release(): Promise<void>;
}

export type SessionFactory = (modelPath: string) => Promise<SegmentationSession>;

export interface OnnxModelHandleOptions {
  name: string;
  resolveWeights: () => Promise<string>;
  logger: Logger;
  createSession?: SessionFactory;
  /** Largest width × height accepted for decoding. */
  maxImagePixels?: number;
}

export const MODEL_INPUT_SIZE = 320;
const MEAN = [0.485, 0.456, 0.406] as const;
const STD = [0.229, 0.224, 0.225] as const;

const createOrtSession: SessionFactory = (modelPath) =>
  ort.InferenceSession.create(modelPath, {
    executionProviders: ['cpu'],
    graphOptimizationLevel: 'all'
  });

interface RgbImage {
  pixels: Buffer;
  width: number;
  height: number;
}

const decodeRgb = async (input: Buffer, maxPixels: number): Promise<RgbImage> => {
  // rotate() with no angle applies the EXIF orientation
  const { data, info } = await sharp(input, { limitInputPixels: maxPixels })
    .rotate()
    .removeAlpha()
    .toColourspace('srgb')
    .raw()
    .toBuffer({ resolveWithObject: true });
  if (info.channels !== 3) {
    throw new Error(`Expected 3 colour channels after decoding, got ${info.channels}`);
  }
  return { pixels: data, width: info.width, height: info.height };
};

const toInputTensor = async ({ pixels, width, height }: RgbImage): Promise<ort.Tensor> => {
  const resized = await sharp(pixels, { raw: { width, height, channels: 3 } })
    .resize(MODEL_INPUT_SIZE, MODEL_INPUT_SIZE, { fit: 'fill', kernel: 'lanczos3' })
    .raw()
    .toBuffer();

  let peak = 0;
  for (const value of resized) {
    if (value > peak) {
      peak = value;
    }
  }
  const scale = Math.max(peak, 1e-6);

  const plane = MODEL_INPUT_SIZE * MODEL_INPUT_SIZE;
  const data = new Float32Array(plane * 3);
  for (let i = 0; i < plane; i += 1) {
    for (let c = 0; c < 3; c += 1) {
      data[c * plane + i] = (resized[i * 3 + c] / scale - MEAN[c]) / STD[c];
    }
  }
  return new ort.Tensor('float32', data, [1, 3, MODEL_INPUT_SIZE, MODEL_INPUT_SIZE]);
};

/** Min-max normalizes the first prediction map into an 8-bit alpha plane at the image size. */
export const predictionToAlpha = async (output: TensorLike, width: number, height: number): Promise<Buffer> => {
  if (!(output.data instanceof Float32Array)) {
    throw new Error('Model output is not a float32 tensor');
  }
  const [, , maskHeight = MODEL_INPUT_SIZE, maskWidth = MODEL_INPUT_SIZE] = output.dims;
  const plane = maskWidth * maskHeight;
  if (output.data.length < plane) {
    throw new Error(`Model output has ${output.data.length} values, expected at least ${plane}`);
  }
  const prediction = output.data.subarray(0, plane);

  let min = Infinity;
  let max = -Infinity;
  for (const value of prediction) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  const range = max - min;

  const mask = Buffer.alloc(plane);
  if (range > 0) {
    for (let i = 0; i < plane; i += 1) {
      mask[i] = Math.trunc(((prediction[i] - min) / range) * 255);
    }
  }

  return sharp(mask, { raw: { width: maskWidth, height: maskHeight, channels: 1 } })
    .resize(width, height, { fit: 'fill', kernel: 'lanczos3' })
    .extractChannel(0)
    .raw()
    .toBuffer();
};

const encodeCutout = ({ pixels, width, height }: RgbImage, alpha: Buffer) =>
  sharp(pixels, { raw: { width, height, channels: 3 } })
    .joinChannel(alpha, { raw: { width, height, channels: 1 } })
    .png({ compressionLevel: 9 })
    .toBuffer();

/**
 * U²-Net background removal on onnxruntime-node.
 *
 * Only the image header is read before queueing. Decoding, inference and
 * encoding run inside a SerialQueue, so a worker holds at most one decoded
 * image and never runs two inferences on the same session at once.
 */
export class OnnxModelHandle implements ModelHandle {
  readonly modelName: string;
  private session: SegmentationSession | null = null;
  private loading: Promise<void> | null = null;
  private readonly queue = new SerialQueue();
  private readonly maxImagePixels: number;

  constructor(private readonly options: OnnxModelHandleOptions) {
    this.modelName = options.name;
    this.maxImagePixels = options.maxImagePixels ?? MAX_IMAGE_PIXELS;
  }

  isLoaded() {
    return this.session !== null;
  }

  load(): Promise<void> {
    if (!this.loading) {
      this.loading = this.open();
    }
    return this.loading;
  }

  private async open() {
    const startedAt = Date.now();
    try {
      const modelPath = await this.options.resolveWeights();
      const createSession = this.options.createSession ?? createOrtSession;
      this.session = await createSession(modelPath);
      this.options.logger.info('Model loaded', {
        model: this.modelName,
        modelPath,
        durationMs: Date.now() - startedAt
      });
    } catch (error) {
      throw new StartupFailureError(`Failed to load model ${this.modelName}`, { cause: error });
    }
  }

  async removeBackground(image: Buffer, signal?: AbortSignal): Promise<Buffer> {
    const session = this.session;
    if (!session) {
      throw new ModelNotReadyError();
    }
    await this.checkDimensions(image);
    return this.queue.run(() => this.process(session, image), signal);
  }

  private async checkDimensions(image: Buffer) {
    let width: number | undefined;
    let height: number | undefined;
    try {
      ({ width, height } = await sharp(image).metadata());
    } catch (error) {
      throw new InferenceFailedError('Could not decode image', { cause: error });
    }
    if (!width || !height) {
      throw new InferenceFailedError('Could not decode image');
    }
    if (width * height > this.maxImagePixels) {
      throw new ImageRejectedError(
        'TooLarge',
        `Image dimensions too large. Maximum: ${this.maxImagePixels} pixels`
      );
    }
  }

  private async process(session: SegmentationSession, image: Buffer): Promise<Buffer> {
    let decoded: RgbImage;
    let input: ort.Tensor;
    try {
      decoded = await decodeRgb(image, this.maxImagePixels);
      input = await toInputTensor(decoded);
    } catch (error) {
      throw new InferenceFailedError('Could not decode image', { cause: error });
    }

    let outputs: Record<string, TensorLike>;
    try {
      outputs = await session.run({ [session.inputNames[0]]: input });
    } catch (error) {
      throw new InferenceFailedError('Model inference failed', { cause: error });
    }

    try {
      const output = outputs[session.outputNames[0]];
      if (!output) {
        throw new Error(`Model produced no "${session.outputNames[0]}" output`);
      }
      const alpha = await predictionToAlpha(output, decoded.width, decoded.height);
      return await encodeCutout(decoded, alpha);
    } catch (error) {
      throw new InferenceFailedError('Could not encode result', { cause: error });
    }
  }

  async release(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    this.session = null;
    await this.queue.drain();
    await session.release();
    this.options.logger.info('Model released', { model: this.modelName });
  }
}
