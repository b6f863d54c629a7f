/**
 * PredictionPipeline
 * preprocess → infer → map → assemble, with every per-request error turned into a failure document.
 */

import { DIAGNOSIS_LABELS } from '../../config/labels';
import type {
  FailureDocument,
  LabelTable,
  PredictionResponseDocument
} from '../../types';
import { InferenceFailureError, ModelUnavailableError, PredictionError } from '../../types';
import { ErrorHandler } from '../../utils/errorHandler';
import { PipelineAuditLogger } from '../../utils/LoggerUtils';
import { ImagePreprocessor } from './ImagePreprocessor';
import type { PreprocessConstraints } from './ImagePreprocessor';
import { InferenceEngine } from './InferenceEngine';
import type { ModelLease, ModelRegistry } from './ModelRegistry';
import { ResponseAssembler } from './ResponseAssembler';
import type { AssembleOptions } from './ResponseAssembler';
import { ResultMapper } from './ResultMapper';

export interface PredictionUpload {
  buffer: Buffer;
  contentType: string;
  filename: string;
}

export interface Requester {
  userId: string;
}

export type PipelineOutcome =
  | { status: 200; body: PredictionResponseDocument }
  | { status: number; body: FailureDocument };

export interface PipelineOptions {
  labels?: LabelTable;
  constraints?: (contentType: string) => PreprocessConstraints;
  assemble?: AssembleOptions;
}

export class PredictionPipeline {
  private readonly labels: LabelTable;
  private readonly constraintsFor: (contentType: string) => PreprocessConstraints;
  private readonly assembleOptions: AssembleOptions;

  constructor(private readonly registry: ModelRegistry, options: PipelineOptions = {}) {
    this.labels = options.labels ?? DIAGNOSIS_LABELS;
    this.constraintsFor = options.constraints ?? ((contentType) => ImagePreprocessor.defaultConstraints(contentType));
    this.assembleOptions = options.assemble ?? {};
  }

  async predict(upload: PredictionUpload, requester: Requester): Promise<PipelineOutcome> {
    const startTime = Date.now();
    let lease: ModelLease | null = null;

    try {
      const tensor = await ImagePreprocessor.preprocess(upload.buffer, this.constraintsFor(upload.contentType));
      PipelineAuditLogger.stage(upload.filename, 'preprocess', startTime);
      if (!tensor.success) {
        return this.fail(tensor.error);
      }

      lease = this.registry.acquire();
      if (!lease) {
        const { lastError } = this.registry.getHandleState();
        return this.fail(new ModelUnavailableError(
          lastError ? `AI model is not loaded: ${lastError}` : 'AI model is not loaded. Please contact support.'
        ));
      }
      const handle = lease.handle;

      const inferStart = Date.now();
      const vector = await InferenceEngine.infer(handle, tensor.data, this.labels.length);
      PipelineAuditLogger.stage(upload.filename, 'infer', inferStart);
      if (!vector.success) {
        if (vector.error.code === 'CONFIG_MISMATCH') {
          await this.registry.markFailed(handle, vector.error);
        }
        return this.fail(vector.error);
      }

      const result = ResultMapper.map(vector.data, this.labels);
      const body = ResponseAssembler.assemble(result, {
        filename: upload.filename,
        fileSizeBytes: upload.buffer.length,
        userId: requester.userId,
        modelVersion: handle.version,
        modelKind: handle.kind,
        processingTimeMs: Date.now() - startTime
      }, this.assembleOptions);

      console.log(`✅ [PIPELINE] ${upload.filename}: ${result.name} (${result.primaryConfidence}%) using ${handle.kind} model`);
      return { status: 200, body };
    } catch (error) {
      const failure = error instanceof PredictionError
        ? error
        : new InferenceFailureError(`Failed to process image: ${ErrorHandler.describe(error)}`);
      if (failure.code === 'CONFIG_MISMATCH' && lease) {
        await this.registry.markFailed(lease.handle, failure);
      }
      return this.fail(failure);
    } finally {
      if (lease) {
        await lease.release();
      }
    }
  }

  private fail(error: PredictionError): { status: number; body: FailureDocument } {
    console.error(ErrorHandler.getLogMessage(error, 'Prediction'));
    return { status: ErrorHandler.toHttpStatus(error), body: ErrorHandler.toFailureDocument(error) };
  }
}
