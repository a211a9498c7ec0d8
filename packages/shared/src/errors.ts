/**
 * Pipeline Errors and Results
 *
 * Fallible steps return a Result instead of throwing. A failed Result is
 * turned into its documented default by absorb(), which is also where the
 * failure gets logged and counted.
 */

import { logger, type LogContext } from './logger';
import { absorbedFailuresCounter } from './metrics';

export type FailureKind = 'gateway_failure' | 'malformed_response' | 'validation_ambiguous';

export abstract class VerificationError extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The model call itself failed or timed out. */
export class GatewayFailure extends VerificationError {
  readonly kind = 'gateway_failure' as const;
}

/** The model answered, but not with the structure we asked for. */
export class MalformedResponse extends VerificationError {
  readonly kind = 'malformed_response' as const;

  constructor(
    message: string,
    readonly rawText: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** A field a rule needs is present but cannot be parsed. */
export class ValidationAmbiguous extends VerificationError {
  readonly kind = 'validation_ambiguous' as const;

  constructor(
    message: string,
    readonly field: string,
    readonly value: string
  ) {
    super(message);
  }
}

export type Result<T, E extends Error = VerificationError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Pipeline stages where failures are absorbed
 */
export type AbsorptionStage =
  | 'extraction'
  | 'transcription'
  | 'type_inference'
  | 'authenticity'
  | 'name_matching'
  | 'validation';

/**
 * Unwrap a Result, or log + count the failure and fall back.
 */
export function absorb<T>(
  result: Result<T>,
  fallback: T,
  stage: AbsorptionStage,
  context?: LogContext
): T {
  if (result.ok) {
    return result.value;
  }

  recordAbsorbed(result.error, stage, context);
  return fallback;
}

export function recordAbsorbed(
  error: VerificationError,
  stage: AbsorptionStage,
  context?: LogContext
): void {
  absorbedFailuresCounter.inc({ stage, kind: error.kind });

  logger.warn('Absorbed pipeline failure', {
    stage,
    kind: error.kind,
    reason: error.message,
    ...(error.cause !== undefined ? { cause: describeCause(error.cause) } : {}),
    ...context,
  });
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
}
