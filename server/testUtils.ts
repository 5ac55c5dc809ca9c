import sharp from 'sharp';
import { InferenceFailedError, ModelNotReadyError } from './errors';
import type { ModelHandle } from './modelHandle';
import { SerialQueue } from './serialQueue';

type Rgb = { r: number; g: number; b: number };

export const makePng = (width: number, height: number, background: Rgb = { r: 200, g: 40, b: 40 }) =>
  sharp({ create: { width, height, channels: 3, background } }).png().toBuffer();

export const makeJpeg = (width: number, height: number, background: Rgb = { r: 40, g: 120, b: 200 }) =>
  sharp({ create: { width, height, channels: 3, background } }).jpeg({ quality: 90 }).toBuffer();

/**
 * Stand-in for the ONNX model: keeps the pixels, adds an opaque alpha
 * channel. Load can be held open with `holdLoad()` to observe the
 * not-ready state.
 */
export class FakeModelHandle implements ModelHandle {
  readonly modelName = 'fake';
  calls = 0;
  released = false;
  failWith: Error | null = null;
  delayMs = 0;
  private loaded = false;
  private gate: Promise<void> | null = null;
  private openGate: (() => void) | null = null;
  private readonly queue = new SerialQueue();

  constructor(options: { loaded?: boolean } = {}) {
    this.loaded = options.loaded ?? false;
  }

  holdLoad() {
    this.gate = new Promise<void>((resolve) => {
      this.openGate = resolve;
    });
  }

  finishLoad() {
    this.openGate?.();
  }

  /** Requests running or waiting on the queue. */
  get queued() {
    return this.queue.size;
  }

  isLoaded() {
    return this.loaded;
  }

  async load() {
    if (this.gate) {
      await this.gate;
    }
    if (this.failWith) {
      throw this.failWith;
    }
    this.loaded = true;
  }

  async removeBackground(image: Buffer, signal?: AbortSignal) {
    if (!this.loaded) {
      throw new ModelNotReadyError();
    }
    return this.queue.run(async () => {
      this.calls += 1;
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }
      if (this.failWith) {
        throw new InferenceFailedError('Model inference failed', { cause: this.failWith });
      }
      return sharp(image).ensureAlpha().png().toBuffer();
    }, signal);
  }

  async release() {
    this.released = true;
    this.loaded = false;
  }
}
