/**
 * Passport Extractor
 *
 * Reads the biographic data page through the vision model.
 */

import { BaseExtractor, readField } from '../base-extractor';
import { PASSPORT_TEMPLATE } from '../../templates/passport.template';
import type { ExtractionTemplate } from '../../templates/types';
import type { DocumentType, PassportRecord } from '../../types';
import type { JsonObject } from '../response-parser';

export class PassportExtractor extends BaseExtractor<PassportRecord> {
  readonly documentType: DocumentType = 'passport';
  readonly description = PASSPORT_TEMPLATE.description;

  getTemplate(): ExtractionTemplate {
    return PASSPORT_TEMPLATE;
  }

  toRecord(raw: JsonObject): PassportRecord {
    return Object.freeze({
      name: readField(raw, 'name'),
      dob: readField(raw, 'dob'),
      expiry_date: readField(raw, 'expiry_date'),
      id_number: readField(raw, 'id_number'),
      issuing_country: readField(raw, 'issuing_country')?.toUpperCase() ?? null,
    });
  }
}

export const passportExtractor = new PassportExtractor();
