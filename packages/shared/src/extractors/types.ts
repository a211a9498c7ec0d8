/**
 * Document Extractor Types
 *
 * Each document type gets its own extractor. An extractor holds only its
 * template; the model gateway arrives with every call in the context.
 */

import type { ExtractionStrategy } from '../config';
import type { DocumentImage, DocumentType, FieldRecord } from '../types';
import type { ExtractionTemplate } from '../templates/types';
import type { ModelGateway } from '../gateway/model-gateway';
import type { JsonObject } from './response-parser';

export type { ExtractionStrategy };

/**
 * Context passed to extractors during extraction
 */
export interface ExtractionContext {
  gateway: ModelGateway;
  /** Defaults to 'direct' */
  strategy?: ExtractionStrategy;
  /** Max OCR characters appended to the prompt (ocr_assisted only) */
  ocrTextLimit?: number;
}

/**
 * Result returned by an extractor
 */
export interface ExtractorResult<R extends FieldRecord = FieldRecord> {
  record: R;
  strategy: ExtractionStrategy;
  /** True when a gateway or parse failure was absorbed into the empty record */
  absorbedFailure: boolean;
  metadata: ExtractorMetadata;
}

export interface ExtractorMetadata {
  model: string;
  durationMs: number;
  /** Code points of OCR text sent with the prompt (ocr_assisted only) */
  ocrTextLength?: number;
}

export interface DocumentExtractor<R extends FieldRecord = FieldRecord> {
  readonly documentType: DocumentType;

  /** Human-readable description of what this extractor does */
  readonly description: string;

  extract(image: DocumentImage, ctx: ExtractionContext): Promise<ExtractorResult<R>>;

  /** Map a parsed model reply onto this document's field set */
  toRecord(raw: JsonObject): R;

  /** Every field present and null */
  emptyRecord(): R;

  getTemplate(): ExtractionTemplate;
}
