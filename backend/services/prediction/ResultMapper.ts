import type { DiagnosisResult, LabelTable, PredictionVector } from '../../types';
import { ConfigMismatchError } from '../../types';

/**
 * Probability (0-1) to a percentage with two decimals
 */
export const toPercentage = (probability: number): number => Math.round(probability * 10000) / 100;

export class ResultMapper {
  /**
   * Select the most probable class (lowest index wins ties) and attach its label details.
   * @throws ConfigMismatchError when the vector and label table lengths differ
   */
  static map(vector: PredictionVector, labels: LabelTable): DiagnosisResult {
    if (vector.length !== labels.length || labels.length === 0) {
      throw new ConfigMismatchError(
        `Prediction vector has ${vector.length} entries but ${labels.length} labels are configured`
      );
    }

    let best = 0;
    vector.forEach((probability, index) => {
      if (probability > (vector[best] ?? 0)) {
        best = index;
      }
    });

    const confidence: Record<string, number> = {};
    labels.forEach((label, index) => {
      confidence[label.key] = toPercentage(vector[index] ?? 0);
    });

    const selected = labels[best];
    if (!selected) {
      throw new ConfigMismatchError(`No label configured for class index ${best}`);
    }

    return Object.freeze({
      classIndex: best,
      name: selected.id,
      fullName: selected.fullName,
      description: selected.description,
      recommendation: selected.recommendation,
      confidence: Object.freeze(confidence),
      primaryConfidence: toPercentage(vector[best] ?? 0)
    });
  }
}
