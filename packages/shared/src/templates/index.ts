/**
 * Prompt Templates
 *
 * Extraction and authenticity prompts per document type, plus the keyword
 * rules used to classify OCR text.
 */

import type { ExtractionTemplate } from './types';
import { PASSPORT_TEMPLATE } from './passport.template';
import { DRIVERS_LICENSE_TEMPLATE } from './drivers-license.template';

export type { ExtractionTemplate, AuthenticityTemplate } from './types';

export { CLASSIFICATION_RULES, type ClassificationRule } from './classification';

export {
  PASSPORT_AUTHENTICITY_TEMPLATE,
  DRIVERS_LICENSE_AUTHENTICITY_TEMPLATE,
  getAuthenticityTemplate,
} from './authenticity.template';

export { NAME_MATCH_PROMPT_TEMPLATE, buildNameMatchPrompt } from './name-match.template';

export { PASSPORT_TEMPLATE, DRIVERS_LICENSE_TEMPLATE };

/**
 * Build the OCR-assisted prompt. Truncation is the caller's job.
 */
export function renderOcrPrompt(template: ExtractionTemplate, ocrText: string): string {
  return template.ocrPromptTemplate
    .replace('{{prompt}}', () => template.prompt)
    .replace('{{ocr_text}}', () => ocrText);
}
