/**
 * Prediction Router
 * Brain scan analysis, PDF reports and model lifecycle endpoints
 */

import express from 'express';
import type { UploadConfig } from '../config/model';
import { PredictionController } from '../controllers/PredictionController';
import { authenticateUser, requireAdmin } from '../middleware/auth';
import { createScanUpload } from '../middleware/upload';
import type { ModelRegistry } from '../services/prediction/ModelRegistry';
import type { PredictionPipeline } from '../services/prediction/PredictionPipeline';

export const createPredictionRouter = (
  registry: ModelRegistry,
  pipeline: PredictionPipeline,
  uploadConfig: UploadConfig
): express.Router => {
  const router = express.Router();
  const controller = new PredictionController(registry, pipeline, uploadConfig);

  /**
   * POST /api/predictions/predict
   * Multipart upload, field `image`
   */
  router.post('/predict',
    authenticateUser,
    createScanUpload(uploadConfig.maxFileSizeBytes),
    controller.predict
  );

  /**
   * POST /api/predictions/generate-report
   * JSON body { results, filename? } -> application/pdf
   */
  router.post('/generate-report', authenticateUser, controller.generateReport);

  router.get('/model-status', controller.modelStatus);

  /**
   * POST /api/predictions/reload-model
   * Admin only; body { placeholder?: boolean }
   */
  router.post('/reload-model', authenticateUser, requireAdmin, controller.reloadModel);

  router.get('/health', controller.health);
  router.get('/test', controller.test);

  return router;
};
