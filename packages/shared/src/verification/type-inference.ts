/**
 * Document Type Inference
 *
 * Classifies OCR text as passport, driver's license or unknown using the
 * keyword rules in templates/classification, and compares the result to the
 * type the uploader declared.
 */

import { CLASSIFICATION_RULES, type ClassificationRule } from '../templates/classification';
import type { DocumentType, InferredDocumentType, TypeInferenceResult } from '../types';

export function classifyTranscript(
  text: string,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): InferredDocumentType {
  const upper = text.toUpperCase();

  const hit = rules.find((rule) => rule.indicators.some((indicator) => upper.includes(indicator)));
  return hit?.documentType ?? 'unknown';
}

export function inferDocumentType(text: string, declaredType: DocumentType): TypeInferenceResult {
  const inferredType = classifyTranscript(text);

  return {
    expected_type: declaredType,
    inferred_type: inferredType,
    match: inferredType === declaredType,
  };
}
