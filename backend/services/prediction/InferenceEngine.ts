import type { ImageTensor, ModelHandle, PredictionVector, Result } from '../../types';
import { ConfigMismatchError, InferenceFailureError } from '../../types';
import { ErrorHandler } from '../../utils/errorHandler';

export type InferenceError = InferenceFailureError | ConfigMismatchError;

const DISTRIBUTION_TOLERANCE = 1e-3;

/**
 * InferenceEngine - runs a tensor through a handle and returns class probabilities.
 * Never mutates the handle.
 */
export class InferenceEngine {

  static async infer(
    handle: ModelHandle | null,
    tensor: ImageTensor,
    classCount: number
  ): Promise<Result<PredictionVector, InferenceError>> {
    if (!handle) {
      return { success: false, error: new InferenceFailureError('No model handle available for inference') };
    }

    if (handle.kind === 'placeholder') {
      return { success: true, data: Array.from({ length: classCount }, () => 1 / classCount) };
    }

    let output: ArrayLike<number>;
    try {
      output = await handle.session.run(tensor);
    } catch (error) {
      return {
        success: false,
        error: new InferenceFailureError(`Prediction failed: ${ErrorHandler.describe(error)}`)
      };
    }

    const values = Array.from(output);
    if (values.length !== classCount) {
      return {
        success: false,
        error: new ConfigMismatchError(
          `Model returned ${values.length} probabilities but ${classCount} labels are configured`
        )
      };
    }

    if (values.some(value => !Number.isFinite(value))) {
      return { success: false, error: new InferenceFailureError('Model returned non-finite values') };
    }

    return { success: true, data: this.isDistribution(values) ? values : this.softmax(values) };
  }

  static isDistribution(values: readonly number[]): boolean {
    const inRange = values.every(value => value >= 0 && value <= 1);
    const total = values.reduce((sum, value) => sum + value, 0);
    return inRange && Math.abs(total - 1) <= DISTRIBUTION_TOLERANCE;
  }

  /**
   * Converts raw logits into probabilities
   */
  static softmax(logits: readonly number[]): number[] {
    const max = Math.max(...logits);
    const exps = logits.map(value => Math.exp(value - max));
    const total = exps.reduce((sum, value) => sum + value, 0);
    return exps.map(value => value / total);
  }
}
