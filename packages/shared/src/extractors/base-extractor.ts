/**
 * Base Document Extractor
 *
 * Runs the direct or OCR-assisted extraction path for one document type and
 * maps the model reply onto the type's field set. A gateway or parse failure
 * ends up as the empty record; the caller sees it only as failed checks.
 */

import { config } from '../config';
import { absorb, type Result } from '../errors';
import { callModel } from '../gateway/model-gateway';
import { logger } from '../logger';
import { extractionDurationHistogram } from '../metrics';
import { renderOcrPrompt } from '../templates';
import type { ExtractionTemplate } from '../templates/types';
import type { DocumentImage, DocumentType, FieldRecord } from '../types';
import { parseJsonObject, type JsonObject } from './response-parser';
import type {
  DocumentExtractor,
  ExtractionContext,
  ExtractionStrategy,
  ExtractorResult,
} from './types';

/**
 * Read one field from a parsed reply. Strings are trimmed, numbers kept as
 * text; blanks, the literal "null" and anything else become null.
 */
export function readField(raw: JsonObject, key: string): string | null {
  const value = raw[key];

  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed === '' || trimmed.toLowerCase() === 'null') {
    return null;
  }
  return trimmed;
}

export abstract class BaseExtractor<R extends FieldRecord> implements DocumentExtractor<R> {
  abstract readonly documentType: DocumentType;
  abstract readonly description: string;

  abstract getTemplate(): ExtractionTemplate;

  abstract toRecord(raw: JsonObject): R;

  emptyRecord(): R {
    return this.toRecord({});
  }

  async extract(image: DocumentImage, ctx: ExtractionContext): Promise<ExtractorResult<R>> {
    const strategy: ExtractionStrategy = ctx.strategy ?? 'direct';
    const startTime = Date.now();
    const logContext = {
      document_type: this.documentType,
      strategy,
      mime_type: image.mimeType,
      size_bytes: image.bytes.length,
    };

    logger.info('Starting extraction', logContext);

    const template = this.getTemplate();
    let prompt = template.prompt;
    let ocrTextLength: number | undefined;

    if (strategy === 'ocr_assisted') {
      const ocrText = await this.transcribeForPrompt(image, ctx);
      ocrTextLength = Array.from(ocrText).length;
      prompt = renderOcrPrompt(template, ocrText);
    }

    const reply = await callModel('infer', () => ctx.gateway.infer(image, prompt));
    const parsed: Result<JsonObject> = reply.ok ? parseJsonObject(reply.value) : reply;
    const raw = absorb(parsed, {}, 'extraction', logContext);
    const record = this.toRecord(raw);

    const durationMs = Date.now() - startTime;
    extractionDurationHistogram.observe(
      { document_type: this.documentType, strategy },
      durationMs / 1000
    );

    logger.info('Extraction complete', {
      ...logContext,
      absorbed_failure: !parsed.ok,
      fields_found: template.fields.filter((field) => readField(raw, field) !== null).length,
      fields_expected: template.fields.length,
      duration_ms: durationMs,
    });

    return {
      record,
      strategy,
      absorbedFailure: !parsed.ok,
      metadata: {
        model: ctx.gateway.visionModel,
        durationMs,
        ...(ocrTextLength !== undefined ? { ocrTextLength } : {}),
      },
    };
  }

  /**
   * Transcribe the image and cut the text to the prompt budget, counted in
   * code points so a surrogate pair is never split. A failed transcription
   * leaves the OCR block empty; the vision call still runs.
   */
  protected async transcribeForPrompt(
    image: DocumentImage,
    ctx: ExtractionContext
  ): Promise<string> {
    const limit = ctx.ocrTextLimit ?? config.ocrTextLimit;
    const transcript = await callModel('transcribe', () => ctx.gateway.transcribe(image));
    const text = absorb(transcript, '', 'transcription', { document_type: this.documentType });

    const codePoints = Array.from(text);
    if (codePoints.length > limit) {
      logger.debug('Truncating OCR text for prompt', {
        document_type: this.documentType,
        original_length: codePoints.length,
        limit,
      });
    }

    return codePoints.slice(0, limit).join('');
  }
}
