/**
 * Driver's License Extractor
 */

import { BaseExtractor, readField } from '../base-extractor';
import { DRIVERS_LICENSE_TEMPLATE } from '../../templates/drivers-license.template';
import type { ExtractionTemplate } from '../../templates/types';
import type { DocumentType, DriversLicenseRecord } from '../../types';
import type { JsonObject } from '../response-parser';

export class DriversLicenseExtractor extends BaseExtractor<DriversLicenseRecord> {
  readonly documentType: DocumentType = 'drivers_license';
  readonly description = DRIVERS_LICENSE_TEMPLATE.description;

  getTemplate(): ExtractionTemplate {
    return DRIVERS_LICENSE_TEMPLATE;
  }

  toRecord(raw: JsonObject): DriversLicenseRecord {
    return Object.freeze({
      name: readField(raw, 'name'),
      dob: readField(raw, 'dob'),
      expiry_date: readField(raw, 'expiry_date'),
      id_number: readField(raw, 'id_number'),
      issuing_state: readField(raw, 'issuing_state')?.toUpperCase() ?? null,
      address: readField(raw, 'address'),
    });
  }
}

export const driversLicenseExtractor = new DriversLicenseExtractor();
