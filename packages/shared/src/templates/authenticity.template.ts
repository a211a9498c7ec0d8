/**
 * Authenticity Assessment Templates
 *
 * The model is told to flag a document that does not look like the declared
 * type. Nothing downstream re-checks that; the instruction lives only here.
 */

import type { DocumentType } from '../types';
import type { AuthenticityTemplate } from './types';

function buildAuthenticityPrompt(displayName: string, validityHint: string): string {
  return `You are a cautious identity verification assistant.
You are shown an image of a ${displayName}.
Your task is to assess whether the document appears authentic or suspicious.

Return ONLY JSON with the following fields:
{
  "is_suspected_fraud": true | false,
  "confidence": 0.0-1.0,
  "explanation": "short rationale"
}
If the document is not a ${displayName}, return "is_suspected_fraud": true with high confidence and explain.

Guidelines:
- Look for tampering: mismatched fonts, cut-and-paste artifacts, blurred text, misaligned photo, missing hologram/barcode/MRZ.
- Look for validity: ${validityHint}, consistent fonts, correct placement of fields.
- If uncertain, return "is_suspected_fraud": false with low confidence and explain.
- Do not hallucinate security features that are not visible.`;
}

function authenticityTemplate(
  documentType: DocumentType,
  displayName: string,
  validityHint: string
): AuthenticityTemplate {
  return { documentType, displayName, prompt: buildAuthenticityPrompt(displayName, validityHint) };
}

export const PASSPORT_AUTHENTICITY_TEMPLATE = authenticityTemplate(
  'passport',
  'passport',
  'presence of MRZ lines (passport)'
);

export const DRIVERS_LICENSE_AUTHENTICITY_TEMPLATE = authenticityTemplate(
  'drivers_license',
  "driver's license",
  'presence of PDF417 barcode (DL)'
);

const AUTHENTICITY_TEMPLATES: Record<DocumentType, AuthenticityTemplate> = {
  passport: PASSPORT_AUTHENTICITY_TEMPLATE,
  drivers_license: DRIVERS_LICENSE_AUTHENTICITY_TEMPLATE,
};

export function getAuthenticityTemplate(documentType: DocumentType): AuthenticityTemplate {
  return AUTHENTICITY_TEMPLATES[documentType];
}
