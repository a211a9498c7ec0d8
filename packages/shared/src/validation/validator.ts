/**
 * Document Validator
 *
 * Rule set per document type:
 * - required:<field>  pass when the field holds text, fail otherwise
 * - expiry_future     pass when expiry_date is today or later; warn when it
 *                     is missing or unreadable
 * - age_check         pass when the holder is at least the minimum age;
 *                     warn when dob is missing or unreadable
 *
 * Output depends only on the record, the document type and the clock.
 */

import { config, type AgeComputation } from '../config';
import { ValidationAmbiguous, recordAbsorbed } from '../errors';
import {
  fieldsForDocumentType,
  type DocumentType,
  type FieldName,
  type PartialFieldRecord,
  type ValidationOutcome,
  type ValidationStatus,
} from '../types';
import {
  ageInCalendarYears,
  ageInDays365,
  formatIsoDate,
  parseIsoDate,
  utcCalendarDate,
  type CalendarDate,
} from './dates';

export interface ValidatorOptions {
  /** Clock used for "today"; defaults to the system clock */
  now?: () => Date;
  minimumAge?: number;
  ageComputation?: AgeComputation;
}

export function outcome(name: string, status: ValidationStatus): ValidationOutcome {
  return Object.freeze({ name, status });
}

export function requiredFieldsFor(documentType: DocumentType): readonly FieldName[] {
  return fieldsForDocumentType(documentType);
}

function readValue(record: PartialFieldRecord, field: FieldName): string | null {
  const value = record[field];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

function ambiguous(field: FieldName, value: string, rule: string): ValidationOutcome {
  recordAbsorbed(
    new ValidationAmbiguous(`${field} is not a YYYY-MM-DD date`, field, value),
    'validation',
    { rule, field }
  );
  return outcome(rule, 'warn');
}

export class DocumentValidator {
  private readonly now: () => Date;
  private readonly minimumAge: number;
  private readonly ageComputation: AgeComputation;

  constructor(options: ValidatorOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.minimumAge = options.minimumAge ?? config.minimumAge;
    this.ageComputation = options.ageComputation ?? config.ageComputation;
  }

  validate(record: PartialFieldRecord, documentType: DocumentType): ValidationOutcome[] {
    const today = utcCalendarDate(this.now());

    return [
      ...this.checkRequired(record, documentType),
      this.checkExpiry(record, formatIsoDate(today)),
      this.checkAge(record, today),
    ];
  }

  private checkRequired(record: PartialFieldRecord, documentType: DocumentType): ValidationOutcome[] {
    return requiredFieldsFor(documentType).map((field) =>
      outcome(`required:${field}`, readValue(record, field) !== null ? 'pass' : 'fail')
    );
  }

  private checkExpiry(record: PartialFieldRecord, todayIso: string): ValidationOutcome {
    const raw = readValue(record, 'expiry_date');
    if (raw === null) {
      return outcome('expiry_future', 'warn');
    }

    const expiry = parseIsoDate(raw);
    if (!expiry) {
      return ambiguous('expiry_date', raw, 'expiry_future');
    }

    return outcome('expiry_future', formatIsoDate(expiry) >= todayIso ? 'pass' : 'fail');
  }

  private checkAge(record: PartialFieldRecord, today: CalendarDate): ValidationOutcome {
    const raw = readValue(record, 'dob');
    if (raw === null) {
      return outcome('age_check', 'warn');
    }

    const dob = parseIsoDate(raw);
    if (!dob) {
      return ambiguous('dob', raw, 'age_check');
    }

    const age =
      this.ageComputation === 'days365' ? ageInDays365(dob, today) : ageInCalendarYears(dob, today);

    return outcome('age_check', age >= this.minimumAge ? 'pass' : 'fail');
  }
}

/**
 * Validate with default options (system clock, configured age rules).
 */
export function validateRecord(
  record: PartialFieldRecord,
  documentType: DocumentType,
  options?: ValidatorOptions
): ValidationOutcome[] {
  return new DocumentValidator(options).validate(record, documentType);
}

const REVIEW_ORDER: Record<ValidationStatus, number> = { fail: 0, warn: 1, pass: 2 };

/**
 * Fails first, then warns, then passes; order within a status is kept.
 */
export function orderForReview(outcomes: readonly ValidationOutcome[]): ValidationOutcome[] {
  return outcomes
    .map((item, index) => ({ item, index }))
    .sort((a, b) => REVIEW_ORDER[a.item.status] - REVIEW_ORDER[b.item.status] || a.index - b.index)
    .map(({ item }) => item);
}

export function allPassed(outcomes: readonly ValidationOutcome[]): boolean {
  return outcomes.every((item) => item.status === 'pass');
}
