/**
 * Authenticity Assessment
 *
 * Asks the vision model whether the document looks tampered with. A reply
 * that cannot be read comes back as {}, which callers must treat as "no flag
 * raised": unreadable replies bias towards false negatives.
 */

import { MalformedResponse, absorb, err, ok, type Result } from '../errors';
import { parseJsonObject } from '../extractors/response-parser';
import { callModel, type ModelGateway } from '../gateway/model-gateway';
import { logger } from '../logger';
import { fraudFlagsCounter } from '../metrics';
import { checkVerdict } from '../schemas';
import { getAuthenticityTemplate } from '../templates';
import type {
  AuthenticityResult,
  AuthenticityVerdict,
  DocumentImage,
  DocumentType,
  EmptyVerdict,
} from '../types';

export function readVerdict(text: string): Result<AuthenticityVerdict> {
  const parsed = parseJsonObject(text);
  if (!parsed.ok) {
    return parsed;
  }

  const checked = checkVerdict(parsed.value);
  if (!checked.valid) {
    return err(
      new MalformedResponse(`Authenticity reply does not match schema: ${checked.errors.join('; ')}`, text)
    );
  }

  const { is_suspected_fraud, confidence, explanation } = checked.verdict;
  return ok({ is_suspected_fraud, confidence, explanation });
}

export function isEmptyVerdict(result: AuthenticityResult): result is EmptyVerdict {
  return !('is_suspected_fraud' in result);
}

/**
 * True only for a readable verdict that flags the document.
 */
export function isFlaggedAsFraud(result: AuthenticityResult): boolean {
  return !isEmptyVerdict(result) && result.is_suspected_fraud;
}

export async function assessAuthenticity(
  gateway: ModelGateway,
  image: DocumentImage,
  documentType: DocumentType
): Promise<AuthenticityResult> {
  const template = getAuthenticityTemplate(documentType);

  const reply = await callModel('infer', () => gateway.infer(image, template.prompt));
  const verdict: Result<AuthenticityResult> = reply.ok ? readVerdict(reply.value) : reply;
  const empty: EmptyVerdict = {};
  const result = absorb(verdict, empty, 'authenticity', { document_type: documentType });

  const outcome = isEmptyVerdict(result)
    ? 'unreadable'
    : result.is_suspected_fraud
      ? 'suspected'
      : 'clear';
  fraudFlagsCounter.inc({ document_type: documentType, outcome });

  logger.info('Authenticity assessed', {
    document_type: documentType,
    document_name: template.displayName,
    outcome,
    confidence: isEmptyVerdict(result) ? undefined : result.confidence,
  });

  return result;
}
