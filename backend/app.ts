import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import swaggerUi from 'swagger-ui-express';
import * as fs from 'fs';
import * as path from 'path';
import { UPLOAD_CONFIG } from './config/model';
import type { UploadConfig } from './config/model';
import { isFirebaseAvailable } from './config/firebase';
import { createPredictionRouter } from './routes/predictions';
import { createUserRouter } from './routes/users';
import type { ModelRegistry } from './services/prediction/ModelRegistry';
import type { PredictionPipeline } from './services/prediction/PredictionPipeline';
import { ErrorHandler } from './utils/errorHandler';

export const API_VERSION = '1.0.0';

export interface AppDependencies {
  registry: ModelRegistry;
  pipeline: PredictionPipeline;
  uploadConfig?: UploadConfig;
  corsOrigins?: string[];
  apiSpecPath?: string;
}

const DEFAULT_CORS_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:5173',
  'http://127.0.0.1:3000',
  'http://127.0.0.1:5173'
];

const corsOriginsFromEnv = (): string[] => {
  const configured = process.env['CORS_ORIGINS'];
  if (!configured) {
    return DEFAULT_CORS_ORIGINS;
  }
  return configured.split(',').map(origin => origin.trim()).filter(Boolean);
};

const isJsonObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

interface BodyParserError {
  type: string;
  status: number;
}

// express.json() failures carry a `type` and a 4xx `status`
const isBodyParserError = (err: unknown): err is BodyParserError => {
  if (!isJsonObject(err)) {
    return false;
  }
  const { type, status } = err;
  return typeof type === 'string' && typeof status === 'number' && status >= 400 && status < 500;
};

const mountApiDocs = (app: express.Express, apiSpecPath: string): void => {
  try {
    if (!fs.existsSync(apiSpecPath)) {
      console.warn('⚠️  API spec not found at:', apiSpecPath);
      return;
    }
    const apiSpec: unknown = JSON.parse(fs.readFileSync(apiSpecPath, 'utf8'));
    if (!isJsonObject(apiSpec)) {
      console.warn('⚠️  API spec is not a JSON object:', apiSpecPath);
      return;
    }

    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(apiSpec, {
      customCss: '.swagger-ui .topbar { display: none }',
      customSiteTitle: 'Brain Scan Classifier API Documentation',
      swaggerOptions: {
        displayRequestDuration: true,
        docExpansion: 'list'
      }
    }));
  } catch (error) {
    console.error('❌ Failed to setup Swagger UI:', ErrorHandler.describe(error));
  }
};

export const createApp = (deps: AppDependencies): express.Express => {
  const { registry, pipeline } = deps;
  const uploadConfig = deps.uploadConfig ?? UPLOAD_CONFIG;
  const app = express();

  // Trust proxy for rate limiting (needed for X-Forwarded-For header)
  app.set('trust proxy', 1);

  // Security middleware
  app.use(helmet());

  app.use(rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    limit: 1000
  }));

  app.use(cors({
    origin: deps.corsOrigins ?? corsOriginsFromEnv(),
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization']
  }));

  app.use(express.json({ limit: '1mb' }));

  mountApiDocs(app, deps.apiSpecPath ?? path.join(process.cwd(), 'backend', 'api-spec.json'));

  app.use('/api/predictions', createPredictionRouter(registry, pipeline, uploadConfig));
  app.use('/api/users', createUserRouter());

  app.get('/', (_req, res) => {
    res.json({
      message: 'Brain Scan Classifier API',
      version: API_VERSION,
      status: 'running',
      timestamp: new Date().toISOString(),
      endpoints: {
        predictions: '/api/predictions',
        users: '/api/users',
        health: '/api/health',
        docs: '/api-docs'
      }
    });
  });

  // Liveness
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'OK', timestamp: new Date().toISOString() });
  });

  app.get('/api/health', (_req, res) => {
    const { loaded, detail } = registry.status();
    res.status(loaded ? 200 : 503).json({
      status: loaded ? 'healthy' : 'unhealthy',
      ai_model: loaded ? 'loaded' : 'not_loaded',
      model_kind: detail.kind,
      auth: isFirebaseAvailable() ? 'available' : 'unavailable',
      timestamp: new Date().toISOString(),
      version: API_VERSION
    });
  });

  app.get('/docs', (_req, res) => {
    res.redirect('/api-docs');
  });

  // Error handling middleware
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParserError(err)) {
      console.warn(`⚠️ Rejected request body (${err.type}):`, ErrorHandler.describe(err));
      res.status(err.status).json(err.type === 'entity.parse.failed'
        ? { error: 'Invalid JSON', message: 'Request body must contain valid JSON data' }
        : { error: 'Invalid request body', message: ErrorHandler.describe(err) });
      return;
    }
    console.error('❌ Unhandled error:', err instanceof Error ? err.stack : err);
    res.status(500).json({
      error: 'Something went wrong!',
      message: process.env['NODE_ENV'] === 'development' ? ErrorHandler.describe(err) : 'Internal server error'
    });
  });

  // 404 handler
  app.use('*', (_req, res) => {
    res.status(404).json({ error: 'Route not found' });
  });

  return app;
};
