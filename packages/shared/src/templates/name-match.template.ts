/**
 * Name Match Template
 *
 * Asked only after the token-set rule has already failed.
 */

export const NAME_MATCH_PROMPT_TEMPLATE = `You are verifying if two ID records refer to the same person based ONLY on name.
Return ONLY JSON: {"same_person": true|false}.

Passport name: {{passport_name}}
License name: {{license_name}}
Consider minor OCR differences, diacritics, and order of tokens equivalent.`;

export function buildNameMatchPrompt(passportName: string, licenseName: string): string {
  return NAME_MATCH_PROMPT_TEMPLATE.replace('{{passport_name}}', () => passportName).replace(
    '{{license_name}}',
    () => licenseName
  );
}
