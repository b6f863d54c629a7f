import sharp from 'sharp';
import { MODEL_CONFIG, UPLOAD_CONFIG } from '../../config/model';
import type { ImageTensor, Result, TensorShape } from '../../types';
import { InvalidImageError } from '../../types';
import { ErrorHandler } from '../../utils/errorHandler';

const COLOUR_SAMPLE_EDGE = 512;

export interface PreprocessConstraints {
  contentType?: string;
  maxBytes: number;
  allowedContentTypes: readonly string[];
  allowedFormats: readonly string[];
  inputSize: number;
  pixelScale: number;
  colourPhotoThreshold: number;
}

/**
 * ImagePreprocessor - turns uploaded bytes into the classifier's input tensor
 */
export class ImagePreprocessor {

  static defaultConstraints(contentType?: string): PreprocessConstraints {
    return {
      contentType,
      maxBytes: UPLOAD_CONFIG.maxFileSizeBytes,
      allowedContentTypes: UPLOAD_CONFIG.allowedContentTypes,
      allowedFormats: UPLOAD_CONFIG.allowedFormats,
      inputSize: MODEL_CONFIG.inputSize,
      pixelScale: MODEL_CONFIG.pixelScale,
      colourPhotoThreshold: UPLOAD_CONFIG.colourPhotoThreshold
    };
  }

  /**
   * Validate, decode, resize and scale an image into an NHWC float tensor.
   * @param rawBytes Uploaded file contents
   * @param constraints Size, type and shape requirements
   */
  static async preprocess(
    rawBytes: Buffer,
    constraints: PreprocessConstraints
  ): Promise<Result<ImageTensor, InvalidImageError>> {
    if (rawBytes.length === 0) {
      return this.invalid('Uploaded image is empty');
    }

    if (rawBytes.length > constraints.maxBytes) {
      const limitMb = constraints.maxBytes / (1024 * 1024);
      return this.invalid(`Image exceeds the maximum size of ${limitMb} MB`);
    }

    const contentType = constraints.contentType?.toLowerCase();
    if (contentType && !constraints.allowedContentTypes.includes(contentType)) {
      return this.invalid(`Unsupported content type: ${contentType}`);
    }

    let format: string | undefined;
    try {
      format = (await sharp(rawBytes).metadata()).format;
    } catch (error) {
      return this.invalid(`Could not decode image: ${ErrorHandler.describe(error)}`);
    }

    if (!format || !constraints.allowedFormats.includes(format)) {
      return this.invalid(`Unsupported image format: ${format ?? 'unknown'}`);
    }

    // Colour is judged on a sample near full resolution, not on the resized tensor.
    let colourDifference: number;
    try {
      const sample = await this.decodeRgb(
        sharp(rawBytes).rotate().resize(COLOUR_SAMPLE_EDGE, COLOUR_SAMPLE_EDGE, { fit: 'inside', withoutEnlargement: true })
      );
      colourDifference = this.meanChannelDifference(sample);
    } catch (error) {
      return this.invalid(`Could not decode image: ${ErrorHandler.describe(error)}`);
    }
    if (colourDifference > constraints.colourPhotoThreshold) {
      return this.invalid(
        'This appears to be a color photograph. Please upload a medical scan (MRI, CT, X-ray, etc.).'
      );
    }

    const size = constraints.inputSize;
    let rgb: Uint8Array;
    try {
      rgb = await this.decodeRgb(sharp(rawBytes).rotate().resize(size, size, { fit: 'fill' }));
    } catch (error) {
      return this.invalid(`Could not decode image: ${ErrorHandler.describe(error)}`);
    }

    const pixelCount = size * size;
    const data = new Float32Array(pixelCount * 3);
    for (let i = 0; i < data.length; i++) {
      data[i] = (rgb[i] ?? 0) * constraints.pixelScale;
    }

    const shape: TensorShape = [1, size, size, 3];
    return { success: true, data: { data, shape } };
  }

  /**
   * Raw 8-bit RGB pixels; greyscale output carries one channel, repeated into R, G and B.
   */
  private static async decodeRgb(pipeline: sharp.Sharp): Promise<Uint8Array> {
    const { data, info } = await pipeline
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });

    const pixelCount = info.width * info.height;
    const channels = info.channels;
    const rgb = new Uint8Array(pixelCount * 3);
    for (let i = 0; i < pixelCount; i++) {
      for (let c = 0; c < 3; c++) {
        rgb[i * 3 + c] = data[i * channels + (channels >= 3 ? c : 0)] ?? 0;
      }
    }
    return rgb;
  }

  /**
   * Sum of the mean absolute R-G, G-B and R-B differences over all pixels.
   */
  static meanChannelDifference(rgb: Uint8Array): number {
    const pixelCount = rgb.length / 3;
    if (pixelCount === 0) {
      return 0;
    }

    let rg = 0;
    let gb = 0;
    let rb = 0;
    for (let i = 0; i < rgb.length; i += 3) {
      const r = rgb[i] ?? 0;
      const g = rgb[i + 1] ?? 0;
      const b = rgb[i + 2] ?? 0;
      rg += Math.abs(r - g);
      gb += Math.abs(g - b);
      rb += Math.abs(r - b);
    }
    return (rg + gb + rb) / pixelCount;
  }

  private static invalid(message: string): Result<never, InvalidImageError> {
    return { success: false, error: new InvalidImageError(message) };
  }
}
