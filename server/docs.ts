import { Router } from 'express';
import redoc from 'redoc-express';
import swaggerUi from 'swagger-ui-express';
import { REJECTION_REASONS } from './errors';
import { formatMegabytes } from './imageValidator';
import { UPLOAD_FIELD } from './removeBackground';

export const API_TITLE = 'Background Removal API';
export const API_VERSION = '1.0.0';
export const OPENAPI_PATH = '/openapi.json';

const errorBody = {
  type: 'object',
  required: ['message'],
  properties: {
    message: { type: 'string' },
    reason: { type: 'string', enum: [...REJECTION_REASONS] }
  }
};

export const buildOpenApiDocument = ({ maxFileSize }: { maxFileSize: number }) => ({
  openapi: '3.0.3',
  info: {
    title: API_TITLE,
    version: API_VERSION,
    description: 'Removes the background from JPEG and PNG images with a U²-Net segmentation model.'
  },
  paths: {
    '/api/remove-bg': {
      post: {
        summary: 'Remove the background from an image',
        requestBody: {
          required: true,
          content: {
            'multipart/form-data': {
              schema: {
                type: 'object',
                required: [UPLOAD_FIELD],
                properties: {
                  [UPLOAD_FIELD]: {
                    type: 'string',
                    format: 'binary',
                    description: `JPEG or PNG image, at most ${formatMegabytes(maxFileSize)}`
                  }
                }
              }
            }
          }
        },
        responses: {
          '200': {
            description: 'Transparent PNG',
            content: { 'image/png': { schema: { type: 'string', format: 'binary' } } }
          },
          '400': {
            description: 'Empty, oversized, unsupported or malformed upload',
            content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } }
          },
          '500': {
            description: 'Inference or encoding failure',
            content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } }
          },
          '503': {
            description: 'Model still loading',
            content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } }
          }
        }
      }
    },
    '/health': {
      get: {
        summary: 'Liveness and model readiness',
        responses: {
          '200': {
            description: 'Process is alive',
            content: { 'application/json': { schema: { $ref: '#/components/schemas/HealthStatus' } } }
          }
        }
      }
    }
  },
  components: {
    schemas: {
      Error: errorBody,
      HealthStatus: {
        type: 'object',
        required: ['status', 'modelLoaded'],
        properties: {
          status: { type: 'string', enum: ['ok', 'degraded'] },
          modelLoaded: { type: 'boolean' }
        }
      }
    }
  }
});

export const createDocsRouter = (options: { maxFileSize: number }) => {
  const router = Router();
  const document = buildOpenApiDocument(options);

  router.get(OPENAPI_PATH, (_req, res) => {
    res.json(document);
  });
  router.use('/docs', swaggerUi.serve, swaggerUi.setup(document, { customSiteTitle: API_TITLE }));
  router.get('/redoc', redoc({ title: API_TITLE, specUrl: OPENAPI_PATH }));

  return router;
};
