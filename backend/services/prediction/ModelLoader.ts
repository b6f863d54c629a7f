/**
 * ModelLoader
 * Reads the classifier artifact and builds a ModelHandle, or a placeholder when asked for one.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { MODEL_CONFIG } from '../../config/model';
import type { ModelConfig } from '../../config/model';
import { DIAGNOSIS_LABELS } from '../../config/labels';
import type {
  LabelTable,
  ModelHandle,
  ModelRuntime,
  ModelSession,
  PlaceholderModelHandle,
  Result,
  TensorShape
} from '../../types';
import { ConfigMismatchError, ModelUnavailableError } from '../../types';
import { ErrorHandler } from '../../utils/errorHandler';

export interface LoadRequest {
  placeholder?: boolean;
}

export type LoadError = ModelUnavailableError | ConfigMismatchError;

export const PLACEHOLDER_VERSION = 'placeholder';

export class ModelLoader {
  constructor(
    private readonly runtime: ModelRuntime,
    private readonly config: ModelConfig = MODEL_CONFIG,
    private readonly labels: LabelTable = DIAGNOSIS_LABELS
  ) {}

  get modelPath(): string {
    return this.config.modelPath;
  }

  get inputShape(): TensorShape {
    return [1, this.config.inputSize, this.config.inputSize, 3];
  }

  modelFileExists(): boolean {
    return existsSync(this.config.modelPath);
  }

  async load(request: LoadRequest = {}): Promise<Result<ModelHandle, LoadError>> {
    if (request.placeholder) {
      console.warn('⚠️ [MODEL] Using placeholder model - predictions are not real');
      return { success: true, data: this.createPlaceholder() };
    }

    const modelPath = this.config.modelPath;
    if (!this.modelFileExists()) {
      return this.unavailable(`Model file not found at: ${modelPath}`);
    }

    let modelBytes: Uint8Array;
    try {
      modelBytes = await readFile(modelPath);
    } catch (error) {
      return this.unavailable(`Model file could not be read: ${ErrorHandler.describe(error)}`);
    }

    let session: ModelSession;
    try {
      session = await this.runtime.createSession(modelBytes);
    } catch (error) {
      return this.unavailable(`Model runtime rejected ${modelPath}: ${ErrorHandler.describe(error)}`);
    }

    const verification = await this.verifyOutputSize(session);
    if (!verification.success) {
      await this.releaseQuietly(session);
      return verification;
    }

    console.log(`✅ [MODEL] Loaded ${this.config.modelVersion} from ${modelPath} (${this.runtime.name})`);
    return {
      success: true,
      data: {
        kind: 'real',
        id: uuidv4(),
        version: this.config.modelVersion,
        loadedAt: new Date().toISOString(),
        inputShape: this.inputShape,
        path: modelPath,
        runtime: this.runtime.name,
        session
      }
    };
  }

  private createPlaceholder(): PlaceholderModelHandle {
    return {
      kind: 'placeholder',
      id: uuidv4(),
      version: PLACEHOLDER_VERSION,
      loadedAt: new Date().toISOString(),
      inputShape: this.inputShape
    };
  }

  /**
   * Warm-up run on a blank tensor; the output length must match the label table.
   */
  private async verifyOutputSize(session: ModelSession): Promise<Result<number, LoadError>> {
    const shape = this.inputShape;
    const blank = new Float32Array(shape[1] * shape[2] * shape[3]);

    let output: ArrayLike<number>;
    try {
      output = await session.run({ data: blank, shape });
    } catch (error) {
      return this.unavailable(`Model warm-up failed: ${ErrorHandler.describe(error)}`);
    }

    if (output.length !== this.labels.length) {
      const error = new ConfigMismatchError(
        `Model produces ${output.length} classes but ${this.labels.length} labels are configured`
      );
      console.error(ErrorHandler.getLogMessage(error, 'Model load'));
      return { success: false, error };
    }
    return { success: true, data: output.length };
  }

  private unavailable(message: string): Result<never, ModelUnavailableError> {
    const error = new ModelUnavailableError(message);
    console.error(`❌ [MODEL] Error loading model: ${message}`);
    return { success: false, error };
  }

  private async releaseQuietly(session: ModelSession): Promise<void> {
    try {
      await session.release();
    } catch (error) {
      console.warn('⚠️ [MODEL] Failed to release rejected session:', ErrorHandler.describe(error));
    }
  }
}
