/**
 * Multipart upload handling (memory storage; bytes go straight to the model).
 */

import type { Request } from 'express';
import multer from 'multer';
import { BadRequestError } from './http';

export function createUploader(maxUploadBytes: number): multer.Multer {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadBytes,
    },
  });
}

/**
 * First file of an upload.array() field.
 */
export function firstFile(req: Request): Express.Multer.File {
  const files = req.files;
  const file = Array.isArray(files) ? files[0] : undefined;

  if (!file || file.buffer.length === 0) {
    throw new BadRequestError('missing_file', 'A document file is required in field "files"');
  }
  return file;
}

/**
 * Single file of an upload.fields() field.
 */
export function namedFile(req: Request, field: string): Express.Multer.File {
  const files = req.files;
  const file = files && !Array.isArray(files) ? files[field]?.[0] : undefined;

  if (!file || file.buffer.length === 0) {
    throw new BadRequestError('missing_file', `A document file is required in field "${field}"`);
  }
  return file;
}
