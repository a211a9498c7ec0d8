/**
 * Passport Extraction Template
 *
 * Document semantics:
 * - Biographic data page holds name, date of birth, passport number and expiry
 * - Issuing country is the ISO 3166-1 alpha-3 code printed on the page and in the MRZ
 * - The MRZ (two lines of OCR-B text at the bottom) repeats every field and wins
 *   over the visual zone when the two disagree
 */

import { PASSPORT_FIELDS } from '../types';
import type { ExtractionTemplate } from './types';

export const PASSPORT_TEMPLATE: ExtractionTemplate = {
  documentType: 'passport',
  fields: PASSPORT_FIELDS,
  description: 'Passport biographic data page - extracts holder name, DOB, passport number, expiry and issuing country',

  prompt: `Extract the following fields from this Passport.
Return only JSON with keys: name, dob (YYYY-MM-DD), issuing_country (ISO3),
id_number, expiry_date (YYYY-MM-DD).
If a field is missing, set it to null.
Ensure the output is only a valid JSON object.`,

  ocrPromptTemplate: `{{prompt}}

OCR_TEXT:
{{ocr_text}}`,
};
