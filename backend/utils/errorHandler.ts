/**
 * Unified error handling utilities for the prediction service
 */

import type { FailureDocument, PredictionErrorCode } from '../types';
import { PredictionError } from '../types';

interface ErrorInfo {
  status: number;
  title: string;
}

const ERROR_INFO: Record<PredictionErrorCode, ErrorInfo> = {
  MODEL_UNAVAILABLE: { status: 503, title: 'Model not available' },
  INVALID_IMAGE: { status: 400, title: 'Invalid image' },
  INFERENCE_FAILURE: { status: 500, title: 'Inference failed' },
  CONFIG_MISMATCH: { status: 500, title: 'Configuration mismatch' }
};

export class ErrorHandler {
  /**
   * HTTP status for a pipeline error
   */
  static toHttpStatus(error: PredictionError): number {
    return ERROR_INFO[error.code].status;
  }

  /**
   * Structured body returned to the caller instead of a fault
   */
  static toFailureDocument(error: PredictionError): FailureDocument {
    return {
      success: false,
      error: ERROR_INFO[error.code].title,
      message: error.message
    };
  }

  /**
   * Message of anything thrown
   */
  static describe(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return typeof error === 'string' ? error : 'Unknown error';
  }

  /**
   * Get appropriate log message for error type
   */
  static getLogMessage(error: Error, context: string): string {
    if (!(error instanceof PredictionError)) {
      return `❌ [ERROR] ${context} failed with unknown error: ${error.message}`;
    }

    switch (error.code) {
      case 'MODEL_UNAVAILABLE':
        return `⚠️ [MODEL UNAVAILABLE] ${context}: ${error.message}`;
      case 'INVALID_IMAGE':
        return `⚠️ [INVALID IMAGE] ${context}: ${error.message}`;
      case 'INFERENCE_FAILURE':
        return `❌ [INFERENCE FAILURE] ${context}: ${error.message}`;
      case 'CONFIG_MISMATCH':
        return `🛑 [CONFIG MISMATCH] ${context}: ${error.message}`;
    }
  }
}
