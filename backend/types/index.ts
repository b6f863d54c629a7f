/**
 * Shared types for the brain scan prediction service
 */

// Utility types
export type Result<T, E = Error> =
  | { success: true; data: T }
  | { success: false; error: E };

// Model runtime abstraction (ONNX in production, fakes in tests)
export interface ModelSession {
  readonly inputNames: readonly string[];
  readonly outputNames: readonly string[];
  run(tensor: ImageTensor): Promise<ArrayLike<number>>;
  release(): Promise<void>;
}

export interface ModelRuntime {
  readonly name: string;
  createSession(modelBytes: Uint8Array): Promise<ModelSession>;
}

export type TensorShape = readonly [1, number, number, 3];

interface ModelHandleBase {
  id: string;
  version: string;
  loadedAt: string;
  inputShape: TensorShape;
}

export interface RealModelHandle extends ModelHandleBase {
  kind: 'real';
  path: string;
  runtime: string;
  session: ModelSession;
}

/** Stand-in handle for non-production use; only created on explicit request */
export interface PlaceholderModelHandle extends ModelHandleBase {
  kind: 'placeholder';
}

export type ModelHandle = RealModelHandle | PlaceholderModelHandle;
export type ModelKind = ModelHandle['kind'];

export type ModelState = 'unloaded' | 'loaded' | 'failed';

export interface HandleState {
  state: ModelState;
  kind: ModelKind | null;
  version: string | null;
  lastError: string | null;
  errorCode: PredictionErrorCode | null;
}

export interface ModelStatusDetail extends HandleState {
  path: string;
  fileExists: boolean;
  runtime: string | null;
  inputShape: TensorShape | null;
  labels: string[];
  loadedAt: string | null;
}

export interface ModelStatus {
  loaded: boolean;
  detail: ModelStatusDetail;
}

// Pipeline values
export interface ImageTensor {
  data: Float32Array;
  shape: TensorShape;
}

export type PredictionVector = readonly number[];

export interface DiagnosisLabel {
  id: string;                // "CONTROL", "AD", "PD"
  key: string;               // confidence key: "control", "alzheimer", "parkinson"
  fullName: string;
  conditionName: string;     // row label in reports
  description: string;
  recommendation: string;
}

export type LabelTable = readonly DiagnosisLabel[];

export interface DiagnosisResult {
  readonly classIndex: number;
  readonly name: string;
  readonly fullName: string;
  readonly description: string;
  readonly recommendation: string;
  readonly confidence: Readonly<Record<string, number>>;
  readonly primaryConfidence: number;
}

export interface RequestMetadata {
  filename: string;
  fileSizeBytes: number;
  userId: string;
  modelVersion: string;
  modelKind: ModelKind;
  processingTimeMs: number;
}

export interface PredictionResponseDocument {
  success: true;
  prediction: {
    name: string;
    full_name: string;
    description: string;
    recommendation: string;
    confidence: Record<string, number>;
    primary_confidence: number;
  };
  metadata: {
    filename: string;
    file_size_bytes: number;
    timestamp: string;
    model_version: string;
    model_kind: ModelKind;
    user_id: string;
    analysis_id: string;
    processing_time_ms: number;
  };
  disclaimer: string;
}

export interface FailureDocument {
  success: false;
  error: string;
  message: string;
}

export type PredictionErrorCode =
  | 'MODEL_UNAVAILABLE'
  | 'INVALID_IMAGE'
  | 'INFERENCE_FAILURE'
  | 'CONFIG_MISMATCH';

// Error types
export class PredictionError extends Error {
  public readonly code: PredictionErrorCode;

  constructor(message: string, code: PredictionErrorCode) {
    super(message);
    this.name = 'PredictionError';
    this.code = code;
  }
}

export class ModelUnavailableError extends PredictionError {
  constructor(message: string) {
    super(message, 'MODEL_UNAVAILABLE');
    this.name = 'ModelUnavailableError';
  }
}

export class InvalidImageError extends PredictionError {
  constructor(message: string) {
    super(message, 'INVALID_IMAGE');
    this.name = 'InvalidImageError';
  }
}

export class InferenceFailureError extends PredictionError {
  constructor(message: string) {
    super(message, 'INFERENCE_FAILURE');
    this.name = 'InferenceFailureError';
  }
}

/** Label table and model output disagree; fatal for the handle, not the request */
export class ConfigMismatchError extends PredictionError {
  constructor(message: string) {
    super(message, 'CONFIG_MISMATCH');
    this.name = 'ConfigMismatchError';
  }
}
