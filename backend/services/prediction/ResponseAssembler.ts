import { v4 as uuidv4 } from 'uuid';
import { MEDICAL_DISCLAIMER } from '../../config/model';
import type { DiagnosisResult, PredictionResponseDocument, RequestMetadata } from '../../types';

export interface AssembleOptions {
  now?: () => Date;
  generateId?: () => string;
}

export class ResponseAssembler {
  /**
   * Build the JSON document returned for a successful analysis
   */
  static assemble(
    result: DiagnosisResult,
    metadata: RequestMetadata,
    options: AssembleOptions = {}
  ): PredictionResponseDocument {
    const now = options.now ?? (() => new Date());
    const generateId = options.generateId ?? uuidv4;

    return {
      success: true,
      prediction: {
        name: result.name,
        full_name: result.fullName,
        description: result.description,
        recommendation: result.recommendation,
        confidence: { ...result.confidence },
        primary_confidence: result.primaryConfidence
      },
      metadata: {
        filename: metadata.filename,
        file_size_bytes: metadata.fileSizeBytes,
        timestamp: now().toISOString(),
        model_version: metadata.modelVersion,
        model_kind: metadata.modelKind,
        user_id: metadata.userId,
        analysis_id: generateId(),
        processing_time_ms: metadata.processingTimeMs
      },
      disclaimer: MEDICAL_DISCLAIMER
    };
  }
}
