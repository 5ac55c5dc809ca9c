import { Router } from 'express';
import type { ModelHandle } from './modelHandle';

export type HealthStatus = {
  status: 'ok' | 'degraded';
  modelLoaded: boolean;
};

export const getHealthStatus = (model: ModelHandle): HealthStatus => {
  const modelLoaded = model.isLoaded();
  return { status: modelLoaded ? 'ok' : 'degraded', modelLoaded };
};

// Answers 200 as long as the process serves HTTP; readiness is carried in the body.
export const createHealthRouter = (model: ModelHandle) => {
  const router = Router();
  router.get('/health', (_req, res) => {
    res.json(getHealthStatus(model));
  });
  return router;
};
