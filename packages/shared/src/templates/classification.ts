/**
 * Document Type Classification
 *
 * Keyword rules applied to OCR text to decide which document was uploaded.
 * Rules are checked in order and the first hit wins, so passport is tested
 * before license.
 */

import type { DocumentType } from '../types';

export interface ClassificationRule {
  documentType: DocumentType;
  /** Uppercase substrings; any one is enough */
  indicators: readonly string[];
}

/**
 * "DL" is a bare substring match and also hits words such as "HANDLE".
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { documentType: 'passport', indicators: ['PASSPORT'] },
  { documentType: 'drivers_license', indicators: ['DRIVER', 'DL'] },
];
