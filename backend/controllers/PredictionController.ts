import path from 'path';
import type { Request, Response, NextFunction } from 'express';
import { UPLOAD_CONFIG } from '../config/model';
import type { UploadConfig } from '../config/model';
import { displayNameOf } from '../middleware/auth';
import { ReportPdfService } from '../services/pdf/ReportPdfService';
import type { ModelRegistry } from '../services/prediction/ModelRegistry';
import type { PredictionPipeline } from '../services/prediction/PredictionPipeline';
import { ErrorHandler } from '../utils/errorHandler';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export class PredictionController {
  constructor(
    private readonly registry: ModelRegistry,
    private readonly pipeline: PredictionPipeline,
    private readonly uploadConfig: UploadConfig = UPLOAD_CONFIG
  ) {}

  /**
   * POST /api/predictions/predict
   */
  predict = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const file = req.file;
      if (!file) {
        res.status(400).json({
          success: false,
          error: 'No file uploaded',
          message: 'Please upload an image file'
        });
        return;
      }

      if (!file.originalname) {
        res.status(400).json({
          success: false,
          error: 'No file selected',
          message: 'Please select an image file'
        });
        return;
      }

      const extension = path.extname(file.originalname).slice(1).toLowerCase();
      if (!this.uploadConfig.allowedExtensions.includes(extension)) {
        res.status(400).json({
          success: false,
          error: 'Invalid file type',
          message: `Allowed file types: ${this.uploadConfig.allowedExtensions.join(', ')}`
        });
        return;
      }

      const outcome = await this.pipeline.predict(
        { buffer: file.buffer, contentType: file.mimetype, filename: file.originalname },
        { userId: displayNameOf(req.user) }
      );
      res.status(outcome.status).json(outcome.body);
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/predictions/generate-report
   */
  generateReport = async (req: Request, res: Response): Promise<void> => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body) || Object.keys(body).length === 0) {
        res.status(400).json({
          error: 'No data provided',
          message: 'Request body must contain analysis results'
        });
        return;
      }

      const results = ReportPdfService.parseResults(body['results']);
      if (!results) {
        res.status(400).json({
          error: 'Missing results',
          message: 'Analysis results are required to generate report'
        });
        return;
      }

      const generatedAt = new Date();
      const modelVersion = this.registry.getHandleState().version ?? 'unknown';
      const pdf = await ReportPdfService.render({
        results,
        patient: { name: displayNameOf(req.user), email: req.user?.email || 'Unknown' },
        modelVersion,
        generatedAt
      });
      const filename = ReportPdfService.reportFilename(body['filename'], generatedAt);

      console.log(`📄 [REPORT] Generated ${filename} for ${req.user?.uid ?? 'unknown user'}`);
      res.setHeader('Content-Type', 'application/pdf');
      res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
      res.status(200).send(Buffer.from(pdf));
    } catch (error) {
      console.error('❌ Report generation error:', ErrorHandler.describe(error));
      res.status(500).json({
        error: 'Report generation failed',
        message: ErrorHandler.describe(error)
      });
    }
  };

  /**
   * GET /api/predictions/model-status
   */
  modelStatus = (_req: Request, res: Response): void => {
    res.status(200).json(this.registry.status());
  };

  /**
   * POST /api/predictions/reload-model
   */
  reloadModel = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body: unknown = req.body;
      const placeholder = isRecord(body) && body['placeholder'] === true;
      console.log(`🔄 [MODEL] Reload requested by ${req.user?.email || 'unknown'}${placeholder ? ' (placeholder)' : ''}`);

      const state = await this.registry.reload({ placeholder });
      res.status(state.state === 'loaded' ? 200 : 503).json({
        success: state.state === 'loaded',
        ...state
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/predictions/health
   */
  health = (_req: Request, res: Response): void => {
    const { loaded, detail } = this.registry.status();
    res.status(loaded ? 200 : 503).json({
      status: loaded ? 'healthy' : 'unhealthy',
      service: 'prediction_service',
      model_loaded: loaded,
      model_kind: detail.kind,
      model_file_exists: detail.fileExists,
      timestamp: new Date().toISOString()
    });
  };

  /**
   * GET /api/predictions/test
   */
  test = (_req: Request, res: Response): void => {
    res.status(200).json({
      message: 'Prediction routes are working',
      timestamp: new Date().toISOString(),
      endpoints: [
        { path: '/predict', method: 'POST', auth: 'user' },
        { path: '/generate-report', method: 'POST', auth: 'user' },
        { path: '/model-status', method: 'GET', auth: 'none' },
        { path: '/reload-model', method: 'POST', auth: 'admin' },
        { path: '/health', method: 'GET', auth: 'none' },
        { path: '/test', method: 'GET', auth: 'none' }
      ]
    });
  };
}
