/**
 * Request/response helpers shared by the route handlers.
 */

import type { Response } from 'express';
import {
  isDocumentType,
  isJsonObject,
  type DocumentImage,
  type DocumentType,
  type ErrorEnvelope,
  type ExtractionStrategy,
} from '@idverify/shared';

export const DEFAULT_MIME_TYPE = 'image/jpeg';

export class BadRequestError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly status: number = 400
  ) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export function correlationIdOf(res: Response): string {
  const id: unknown = res.locals.correlationId;
  return typeof id === 'string' ? id : '';
}

export function sendError(res: Response, status: number, code: string, message: string): void {
  const envelope: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
    },
  };
  res.status(status).json(envelope);
}

/**
 * Read a string field from a JSON or multipart body.
 */
export function bodyField(body: unknown, key: string): string | undefined {
  if (!isJsonObject(body)) {
    return undefined;
  }
  const value = body[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

export function requireDocumentType(body: unknown, key = 'doc_type'): DocumentType {
  const value = bodyField(body, key);
  if (!isDocumentType(value)) {
    throw new BadRequestError(
      'invalid_doc_type',
      `${key} must be one of: passport, drivers_license`
    );
  }
  return value;
}

export function optionalStrategy(body: unknown): ExtractionStrategy | undefined {
  const value = bodyField(body, 'strategy');
  if (value === undefined) {
    return undefined;
  }
  if (value !== 'direct' && value !== 'ocr_assisted') {
    throw new BadRequestError('invalid_strategy', 'strategy must be one of: direct, ocr_assisted');
  }
  return value;
}

export function toDocumentImage(file: Express.Multer.File): DocumentImage {
  return {
    bytes: file.buffer,
    mimeType: file.mimetype || DEFAULT_MIME_TYPE,
  };
}
