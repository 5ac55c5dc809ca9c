import { Router, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { ImageRejectedError, ModelNotReadyError, type RejectionReason } from './errors';
import { formatMegabytes, validateImage } from './imageValidator';
import type { Logger } from './logger';
import type { ModelHandle } from './modelHandle';

export const UPLOAD_FIELD = 'file';

export interface RemoveBackgroundDeps {
  model: ModelHandle;
  maxFileSize: number;
  logger: Logger;
}

type ErrorBody = { message: string; reason?: RejectionReason };

const reject = (res: Response, reason: RejectionReason, message: string) =>
  res.status(400).json({ message, reason } satisfies ErrorBody);

export const resultFilename = (original?: string) => {
  const base = original?.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  const stem = (dot > 0 ? base.slice(0, dot) : dot === 0 ? '' : base).replace(/[^A-Za-z0-9._-]/g, '_');
  return `nobg_${stem || 'image'}.png`;
};

export const createRemoveBackgroundRouter = ({ model, maxFileSize, logger }: RemoveBackgroundDeps) => {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxFileSize, files: 1 }
  }).single(UPLOAD_FIELD);

  const receiveUpload = (req: Request, res: Response, next: NextFunction) => {
    upload(req, res, (error?: unknown) => {
      if (!error) {
        next();
        return;
      }
      if (error instanceof multer.MulterError && error.code === 'LIMIT_FILE_SIZE') {
        reject(res, 'TooLarge', `File too large. Maximum size: ${formatMegabytes(maxFileSize)}`);
        return;
      }
      const message = error instanceof Error ? error.message : 'Invalid multipart body';
      logger.warn('Upload could not be parsed', { error });
      reject(res, 'Malformed', `Invalid upload: ${message}`);
    });
  };

  router.post('/remove-bg', receiveUpload, async (req, res) => {
    const file = req.file;
    if (!file) {
      return reject(res, 'EmptyPayload', 'No file uploaded');
    }

    const context = { filename: file.originalname, mediaType: file.mimetype, size: file.size };
    logger.info('Received image', context);

    const validation = validateImage(file.buffer, file.mimetype, {
      maxFileSize,
      filename: file.originalname
    });
    if (!validation.ok) {
      logger.info('Rejected image', { ...context, reason: validation.reason });
      return reject(res, validation.reason, validation.message);
    }

    if (!model.isLoaded()) {
      return res.status(503).json({ message: 'Model is still loading' } satisfies ErrorBody);
    }

    // Abandon queued inference when the client goes away; a run already in progress finishes.
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) {
        controller.abort(new Error('Client disconnected'));
      }
    };
    res.on('close', onClose);

    const startedAt = Date.now();
    try {
      const output = await model.removeBackground(validation.image.buffer, controller.signal);
      if (controller.signal.aborted) {
        logger.info('Client disconnected before the result was sent', context);
        return;
      }
      logger.info('Removed background', { ...context, outputSize: output.length, durationMs: Date.now() - startedAt });
      res.status(200).set({
        'Content-Type': 'image/png',
        'Content-Disposition': `attachment; filename="${resultFilename(file.originalname)}"`
      });
      return res.send(output);
    } catch (error) {
      if (controller.signal.aborted) {
        logger.info('Client disconnected before inference started', context);
        return;
      }
      if (error instanceof ImageRejectedError) {
        logger.info('Rejected image', { ...context, reason: error.reason });
        return reject(res, error.reason, error.message);
      }
      if (error instanceof ModelNotReadyError) {
        return res.status(503).json({ message: error.message } satisfies ErrorBody);
      }
      logger.error('Background removal failed', { ...context, error });
      return res.status(500).json({ message: 'Failed to process image' } satisfies ErrorBody);
    } finally {
      res.off('close', onClose);
    }
  });

  return router;
};
