/**
 * Prompt Template Types
 *
 * Each document type has one extraction template (which fields to read and in
 * what format) and one authenticity template (what tampering to look for).
 */

import type { DocumentType, FieldName } from '../types';

export interface ExtractionTemplate {
  /** The document type this template handles */
  documentType: DocumentType;

  /** Fields the model must return, in prompt order */
  fields: readonly FieldName[];

  /** Extraction instructions sent alongside the document image */
  prompt: string;

  /**
   * Prompt used when OCR text accompanies the image. Placeholders:
   * - {{prompt}}: the extraction prompt above
   * - {{ocr_text}}: transcribed text, already truncated
   */
  ocrPromptTemplate: string;

  /** Human-readable description of what this template extracts */
  description: string;
}

export interface AuthenticityTemplate {
  documentType: DocumentType;

  /** Human-readable document name used inside the prompt ("passport", "driver's license") */
  displayName: string;

  prompt: string;
}
