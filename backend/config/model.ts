/**
 * Model & Upload Configuration
 * Settings for the classifier artifact, its input tensor and accepted uploads
 */

import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: '.env.local' });

export interface ModelConfig {
  modelPath: string;
  modelVersion: string;
  inputSize: number;      // square input edge in pixels
  pixelScale: number;     // multiplier applied to 0-255 channel values
  usePlaceholder: boolean;
}

export interface UploadConfig {
  maxFileSizeBytes: number;
  allowedContentTypes: readonly string[];
  allowedFormats: readonly string[];     // decoded formats as reported by sharp
  allowedExtensions: readonly string[];
  colourPhotoThreshold: number;          // mean pairwise channel difference
}

const readNumber = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    console.warn(`⚠️ Ignoring invalid ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
};

export const MODEL_CONFIG: ModelConfig = {
  modelPath: process.env['MODEL_PATH']
    ? path.resolve(process.env['MODEL_PATH'])
    : path.join(process.cwd(), 'backend', 'models', 'brain_scan_classifier.onnx'),
  modelVersion: process.env['MODEL_VERSION'] || 'EfficientNetB0',
  inputSize: Math.round(readNumber('MODEL_INPUT_SIZE', 150)),
  pixelScale: readNumber('MODEL_PIXEL_SCALE', 1),
  usePlaceholder: process.env['MODEL_USE_PLACEHOLDER'] === 'true'
};

export const UPLOAD_CONFIG: UploadConfig = {
  maxFileSizeBytes: Math.round(readNumber('MAX_UPLOAD_MB', 16) * 1024 * 1024),
  allowedContentTypes: ['image/png', 'image/jpeg', 'image/jpg', 'image/gif', 'image/tiff', 'image/webp'],
  allowedFormats: ['png', 'jpeg', 'gif', 'tiff', 'webp'],
  allowedExtensions: ['png', 'jpg', 'jpeg', 'gif', 'tif', 'tiff', 'webp'],
  colourPhotoThreshold: 20
};

export const MEDICAL_DISCLAIMER =
  'This AI analysis is for informational purposes only and should not replace professional medical diagnosis. ' +
  'Please consult with a qualified healthcare provider for proper medical evaluation.';
