/**
 * Shared TypeScript Types
 *
 * Types for the ID document verification pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Document Types
// ============================================================================

export type DocumentType = 'passport' | 'drivers_license';

export type InferredDocumentType = DocumentType | 'unknown';

export const DOCUMENT_TYPES: readonly DocumentType[] = ['passport', 'drivers_license'];

export function isDocumentType(value: unknown): value is DocumentType {
  return DOCUMENT_TYPES.some((documentType) => documentType === value);
}

/**
 * Raw document bytes as uploaded (image/* or application/pdf)
 */
export interface DocumentImage {
  bytes: Buffer;
  mimeType: string;
}

// ============================================================================
// Field Records
// ============================================================================

export const PASSPORT_FIELDS = [
  'name',
  'dob',
  'expiry_date',
  'id_number',
  'issuing_country',
] as const;

export const DRIVERS_LICENSE_FIELDS = [
  'name',
  'dob',
  'expiry_date',
  'id_number',
  'issuing_state',
  'address',
] as const;

export type PassportField = (typeof PASSPORT_FIELDS)[number];
export type DriversLicenseField = (typeof DRIVERS_LICENSE_FIELDS)[number];
export type FieldName = PassportField | DriversLicenseField;

export type PassportRecord = Readonly<Record<PassportField, string | null>>;
export type DriversLicenseRecord = Readonly<Record<DriversLicenseField, string | null>>;

/**
 * Fields extracted from one document. Records built by an extractor always
 * carry every field of their document type; a value the model could not read is null.
 */
export type FieldRecord = PassportRecord | DriversLicenseRecord;

/**
 * Looser record shape accepted by validation (e.g. a record posted by a caller).
 */
export type PartialFieldRecord = Readonly<Partial<Record<FieldName, string | null>>>;

export function isPassportRecord(record: FieldRecord): record is PassportRecord {
  return 'issuing_country' in record;
}

export function isDriversLicenseRecord(record: FieldRecord): record is DriversLicenseRecord {
  return 'issuing_state' in record;
}

export function fieldsForDocumentType(documentType: DocumentType): readonly FieldName[] {
  return documentType === 'passport' ? PASSPORT_FIELDS : DRIVERS_LICENSE_FIELDS;
}

// ============================================================================
// Validation
// ============================================================================

export type ValidationStatus = 'pass' | 'fail' | 'warn';

export interface ValidationOutcome {
  readonly name: string;
  readonly status: ValidationStatus;
}

// ============================================================================
// Type Inference & Authenticity
// ============================================================================

export interface TypeInferenceResult {
  expected_type: DocumentType;
  inferred_type: InferredDocumentType;
  match: boolean;
}

export interface AuthenticityVerdict {
  is_suspected_fraud: boolean;
  /** 0-1 */
  confidence: number;
  explanation: string;
}

/** Returned when the model reply could not be read; callers treat it as "no flag raised". */
export type EmptyVerdict = Record<string, never>;

export type AuthenticityResult = AuthenticityVerdict | EmptyVerdict;

// ============================================================================
// Verification Reports
// ============================================================================

export type FinalStatus = 'pass' | 'fail';

export interface VerificationReport {
  doc_id: string;
  doc_type: DocumentType;
  model: string;
  extracted: FieldRecord;
  validators: ValidationOutcome[];
  /** Reserved; always 0 */
  score: number;
  final_status: FinalStatus;
}

export interface PairVerificationReport {
  doc_id: string;
  doc_type: 'both';
  model: string;
  extracted: {
    passport: PassportRecord;
    drivers_license: DriversLicenseRecord;
  };
  validators: ValidationOutcome[];
  score: number;
  final_status: FinalStatus;
}

// ============================================================================
// API Types
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
