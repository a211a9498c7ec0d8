/**
 * Document Extractors Module
 *
 * One extractor per document type, each running one of two strategies:
 * - 'direct': image + field prompt to the vision model
 * - 'ocr_assisted': transcribe first, then send the OCR text along with the image
 */

// Core types and interfaces
export type {
  DocumentExtractor,
  ExtractionStrategy,
  ExtractionContext,
  ExtractorResult,
  ExtractorMetadata,
} from './types';

// Base class
export { BaseExtractor, readField } from './base-extractor';

// Registry
export {
  registerExtractor,
  getExtractor,
  getExtractorOrThrow,
  hasExtractor,
  getRegisteredTypes,
  clearRegistry,
} from './registry';

// Response parsing
export {
  parseJsonObject,
  parseResponse,
  stripCodeFence,
  isJsonObject,
  type JsonObject,
} from './response-parser';

// Individual extractors
export { PassportExtractor, passportExtractor } from './passport';
export { DriversLicenseExtractor, driversLicenseExtractor } from './drivers-license';

// Import for registration
import { registerExtractor } from './registry';
import { passportExtractor } from './passport';
import { driversLicenseExtractor } from './drivers-license';

/**
 * Register all built-in extractors.
 */
export function registerAllExtractors(): void {
  registerExtractor(passportExtractor);
  registerExtractor(driversLicenseExtractor);
}

// Auto-register all extractors on module load
registerAllExtractors();
