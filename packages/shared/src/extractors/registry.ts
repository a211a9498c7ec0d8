/**
 * Extractor Registry
 *
 * Maps each document type to its extractor.
 */

import type { DocumentType } from '../types';
import type { DocumentExtractor } from './types';
import { logger } from '../logger';

const extractorRegistry = new Map<DocumentType, DocumentExtractor>();

/**
 * Register an extractor for a document type.
 * Overwrites any existing extractor for that type.
 */
export function registerExtractor(extractor: DocumentExtractor): void {
  extractorRegistry.set(extractor.documentType, extractor);

  logger.debug('Registered extractor', {
    document_type: extractor.documentType,
    description: extractor.description,
  });
}

export function getExtractor(documentType: DocumentType): DocumentExtractor | undefined {
  return extractorRegistry.get(documentType);
}

/**
 * Get the extractor for a document type, throwing if not found.
 *
 * @throws Error if no extractor is registered for that type
 */
export function getExtractorOrThrow(documentType: DocumentType): DocumentExtractor {
  const extractor = extractorRegistry.get(documentType);
  if (!extractor) {
    throw new Error(`No extractor registered for document type: ${documentType}`);
  }
  return extractor;
}

export function hasExtractor(documentType: DocumentType): boolean {
  return extractorRegistry.has(documentType);
}

export function getRegisteredTypes(): DocumentType[] {
  return Array.from(extractorRegistry.keys());
}

/**
 * Clear all registered extractors.
 * Useful for testing.
 */
export function clearRegistry(): void {
  extractorRegistry.clear();
}
