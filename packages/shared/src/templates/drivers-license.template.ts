/**
 * Driver's License Extraction Template
 *
 * Document semantics:
 * - US state-issued card; issuing state is the two-letter USPS code
 * - The residential address is printed on the front under the holder name
 * - Dates on US licenses are printed MM/DD/YYYY and must be converted to ISO
 */

import { DRIVERS_LICENSE_FIELDS } from '../types';
import type { ExtractionTemplate } from './types';

export const DRIVERS_LICENSE_TEMPLATE: ExtractionTemplate = {
  documentType: 'drivers_license',
  fields: DRIVERS_LICENSE_FIELDS,
  description: "Driver's license front - extracts holder name, DOB, license number, expiry, issuing state and address",

  prompt: `Extract the following fields from this ID document.
Return only JSON with keys: name, dob (YYYY-MM-DD), issuing_state (USPS),
id_number, expiry_date (YYYY-MM-DD), address.
If a field is missing, set it to null.
Ensure the output is only a valid JSON object.`,

  ocrPromptTemplate: `{{prompt}}

OCR_TEXT:
{{ocr_text}}`,
};
