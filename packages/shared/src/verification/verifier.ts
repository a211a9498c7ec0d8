/**
 * Document Verifier
 *
 * Entry point for callers (HTTP service, tests). Wires one injected model
 * gateway into extraction, type inference, authenticity and, when
 * configured, name matching. Holds no per-request state.
 */

import { ulid } from 'ulid';
import { config as defaultConfig, type Config, type ExtractionStrategy } from '../config';
import { getContext, getCorrelationId, runWithContextAsync } from '../context';
import { absorb } from '../errors';
import { getExtractorOrThrow } from '../extractors';
import { callModel, type ModelGateway } from '../gateway/model-gateway';
import { logger } from '../logger';
import { validationOutcomesCounter } from '../metrics';
import {
  isDriversLicenseRecord,
  isPassportRecord,
  type AuthenticityResult,
  type DocumentImage,
  type DocumentType,
  type FieldRecord,
  type PairVerificationReport,
  type PartialFieldRecord,
  type TypeInferenceResult,
  type ValidationOutcome,
  type VerificationReport,
} from '../types';
import { ConsistencyChecker } from '../validation/consistency';
import { createNameMatcher, type NameMatcher } from '../validation/name-matchers';
import { DocumentValidator, allPassed, type ValidatorOptions } from '../validation/validator';
import { assessAuthenticity } from './authenticity';
import { inferDocumentType } from './type-inference';

export interface DocumentVerifierOptions {
  gateway: ModelGateway;
  /** Defaults to exact token-set matching */
  nameMatcher?: NameMatcher;
  validator?: ValidatorOptions;
  /** Default strategy when a call does not pick one */
  extractionStrategy?: ExtractionStrategy;
  ocrTextLimit?: number;
}

export interface ExtractOptions {
  strategy?: ExtractionStrategy;
}

export interface ReportOptions extends ExtractOptions {
  caseId?: string;
}

export class DocumentVerifier {
  private readonly gateway: ModelGateway;
  private readonly validator: DocumentValidator;
  private readonly consistency: ConsistencyChecker;
  private readonly defaultStrategy: ExtractionStrategy;
  private readonly ocrTextLimit: number | undefined;

  constructor(options: DocumentVerifierOptions) {
    this.gateway = options.gateway;
    this.validator = new DocumentValidator(options.validator);
    this.consistency = new ConsistencyChecker(options.nameMatcher);
    this.defaultStrategy = options.extractionStrategy ?? 'direct';
    this.ocrTextLimit = options.ocrTextLimit;
  }

  /**
   * Build a verifier whose strategy, name matcher and age rules come from configuration.
   */
  static fromConfig(gateway: ModelGateway, cfg: Config = defaultConfig): DocumentVerifier {
    return new DocumentVerifier({
      gateway,
      nameMatcher: createNameMatcher(cfg.nameMatcher, gateway),
      validator: { minimumAge: cfg.minimumAge, ageComputation: cfg.ageComputation },
      extractionStrategy: cfg.extractionStrategy,
      ocrTextLimit: cfg.ocrTextLimit,
    });
  }

  get model(): string {
    return this.gateway.visionModel;
  }

  async extract(
    image: DocumentImage,
    documentType: DocumentType,
    options: ExtractOptions = {}
  ): Promise<FieldRecord> {
    const result = await getExtractorOrThrow(documentType).extract(image, {
      gateway: this.gateway,
      strategy: options.strategy ?? this.defaultStrategy,
      ocrTextLimit: this.ocrTextLimit,
    });
    return result.record;
  }

  validate(record: PartialFieldRecord, documentType: DocumentType): ValidationOutcome[] {
    return this.validator.validate(record, documentType);
  }

  checkConsistency(
    passport: PartialFieldRecord,
    driversLicense: PartialFieldRecord
  ): Promise<ValidationOutcome[]> {
    return this.consistency.check(passport, driversLicense);
  }

  /**
   * Transcribe the image and classify the text. A failed transcription
   * classifies as unknown.
   */
  async inferType(image: DocumentImage, declaredType: DocumentType): Promise<TypeInferenceResult> {
    const transcript = await callModel('transcribe', () => this.gateway.transcribe(image));
    const text = absorb(transcript, '', 'type_inference', { declared_type: declaredType });

    const result = inferDocumentType(text, declaredType);

    logger.info('Document type inferred', {
      declared_type: declaredType,
      inferred_type: result.inferred_type,
      match: result.match,
    });

    return result;
  }

  assessAuthenticity(image: DocumentImage, documentType: DocumentType): Promise<AuthenticityResult> {
    return assessAuthenticity(this.gateway, image, documentType);
  }

  /**
   * Extract and validate one document.
   */
  async verifyDocument(
    image: DocumentImage,
    documentType: DocumentType,
    options: ReportOptions = {}
  ): Promise<VerificationReport> {
    const docId = options.caseId || ulid();

    return this.withCase<VerificationReport>(docId, documentType, async () => {
      const extracted = await this.extract(image, documentType, options);
      const validators = this.validate(extracted, documentType);
      this.countOutcomes(documentType, validators);

      return {
        doc_id: docId,
        doc_type: documentType,
        model: this.model,
        extracted,
        validators,
        score: 0,
        final_status: allPassed(validators) ? 'pass' : 'fail',
      };
    });
  }

  /**
   * Extract both documents concurrently, validate each, then cross-check them.
   * Validators are ordered passport, license, consistency.
   */
  async verifyPair(
    passportImage: DocumentImage,
    licenseImage: DocumentImage,
    options: ReportOptions = {}
  ): Promise<PairVerificationReport> {
    const docId = options.caseId || ulid();
    const strategy = options.strategy ?? this.defaultStrategy;
    const ctx = { gateway: this.gateway, strategy, ocrTextLimit: this.ocrTextLimit };

    return this.withCase<PairVerificationReport>(docId, 'both', async () => {
      const [passport, license] = await Promise.all([
        getExtractorOrThrow('passport').extract(passportImage, ctx),
        getExtractorOrThrow('drivers_license').extract(licenseImage, ctx),
      ]);

      const passportRecord = passport.record;
      const licenseRecord = license.record;
      if (!isPassportRecord(passportRecord) || !isDriversLicenseRecord(licenseRecord)) {
        throw new Error('Registered extractors returned records of the wrong document type');
      }

      const passportOutcomes = this.validate(passportRecord, 'passport');
      const licenseOutcomes = this.validate(licenseRecord, 'drivers_license');
      const consistencyOutcomes = await this.checkConsistency(passportRecord, licenseRecord);

      this.countOutcomes('passport', passportOutcomes);
      this.countOutcomes('drivers_license', licenseOutcomes);
      this.countOutcomes('both', consistencyOutcomes);

      const validators = [...passportOutcomes, ...licenseOutcomes, ...consistencyOutcomes];

      return {
        doc_id: docId,
        doc_type: 'both',
        model: this.model,
        extracted: {
          passport: passportRecord,
          drivers_license: licenseRecord,
        },
        validators,
        score: 0,
        final_status: allPassed(validators) ? 'pass' : 'fail',
      };
    });
  }

  private withCase<T>(caseId: string, documentType: string, fn: () => Promise<T>): Promise<T> {
    return runWithContextAsync(
      { ...getContext(), correlationId: getCorrelationId(), caseId, documentType },
      fn
    );
  }

  private countOutcomes(documentType: string, outcomes: readonly ValidationOutcome[]): void {
    for (const item of outcomes) {
      validationOutcomesCounter.inc({
        document_type: documentType,
        rule: item.name.split(':')[0],
        status: item.status,
      });
    }
  }
}
