/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export type ExtractionStrategy = 'direct' | 'ocr_assisted';
export type NameMatcherKind = 'exact' | 'model_assisted';
export type AgeComputation = 'calendar' | 'days365';

export interface Config {
  // LLM (any OpenAI-compatible chat completions endpoint)
  llmApiKey: string;
  llmBaseUrl: string | undefined;
  llmModelVision: string;
  llmModelOcr: string;
  llmRequestTimeoutMs: number;

  // Pipeline behaviour
  extractionStrategy: ExtractionStrategy;
  nameMatcher: NameMatcherKind;
  ageComputation: AgeComputation;
  minimumAge: number;
  ocrTextLimit: number;

  // HTTP
  port: number;
  maxUploadBytes: number;
}

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const match = allowed.find((candidate) => candidate === value);
  return match ?? fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    // LLM
    llmApiKey: env.LLM_API_KEY || env.OPENAI_API_KEY || '',
    llmBaseUrl: env.LLM_BASE_URL || undefined,
    llmModelVision: env.LLM_MODEL_VISION || 'gpt-4o',
    llmModelOcr: env.LLM_MODEL_OCR || env.LLM_MODEL_VISION || 'gpt-4o',
    llmRequestTimeoutMs: parseInt(env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),

    // Pipeline behaviour
    extractionStrategy: oneOf(env.EXTRACTION_STRATEGY, ['direct', 'ocr_assisted'], 'direct'),
    nameMatcher: oneOf(env.NAME_MATCHER, ['exact', 'model_assisted'], 'exact'),
    ageComputation: oneOf(env.AGE_COMPUTATION, ['calendar', 'days365'], 'calendar'),
    minimumAge: parseInt(env.MINIMUM_AGE || '18', 10),
    ocrTextLimit: parseInt(env.OCR_TEXT_LIMIT || '12000', 10),

    // HTTP
    port: parseInt(env.PORT || '8080', 10),
    maxUploadBytes: parseInt(env.MAX_UPLOAD_BYTES || '10485760', 10), // 10MB
  };
}

export const config: Config = loadConfig();
