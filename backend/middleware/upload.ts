import multer from 'multer';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { UPLOAD_CONFIG } from '../config/model';
import { InvalidImageError } from '../types';
import { ErrorHandler } from '../utils/errorHandler';

/**
 * Single-file `image` upload kept in memory.
 * Size overflow is reported as an invalid image, the same as the pipeline's own check.
 */
export const createScanUpload = (maxFileSizeBytes: number = UPLOAD_CONFIG.maxFileSizeBytes): RequestHandler => {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxFileSizeBytes,
      files: 1
    }
  }).single('image');

  return (req: Request, res: Response, next: NextFunction) => {
    upload(req, res, (error?: unknown) => {
      if (!error) {
        next();
        return;
      }

      if (error instanceof multer.MulterError) {
        if (error.code === 'LIMIT_FILE_SIZE') {
          const limitMb = maxFileSizeBytes / (1024 * 1024);
          const failure = new InvalidImageError(`Image exceeds the maximum size of ${limitMb} MB`);
          res.status(ErrorHandler.toHttpStatus(failure)).json(ErrorHandler.toFailureDocument(failure));
          return;
        }
        res.status(400).json({
          success: false,
          error: 'Upload failed',
          message: error.message
        });
        return;
      }

      next(error);
    });
  };
};
