/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export {
  config,
  loadConfig,
  type Config,
  type ExtractionStrategy,
  type NameMatcherKind,
  type AgeComputation,
} from './config';

// Types
export * from './types';

// Errors
export {
  VerificationError,
  GatewayFailure,
  MalformedResponse,
  ValidationAmbiguous,
  absorb,
  recordAbsorbed,
  ok,
  err,
  type Result,
  type FailureKind,
  type AbsorptionStage,
} from './errors';

// Metrics
export {
  register,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  extractionDurationHistogram,
  absorbedFailuresCounter,
  validationOutcomesCounter,
  fraudFlagsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export { checkVerdict, validateReport, type ValidationResult } from './schemas';

// Model gateway
export {
  callModel,
  toDataUrl,
  type ModelGateway,
  type GatewayOperation,
} from './gateway/model-gateway';
export {
  OpenAiModelGateway,
  TRANSCRIPTION_PROMPT,
  type ChatCompletionClient,
  type OpenAiGatewayOptions,
} from './gateway/openai-gateway';

// Templates
export {
  getAuthenticityTemplate,
  renderOcrPrompt,
  buildNameMatchPrompt,
  CLASSIFICATION_RULES,
  PASSPORT_TEMPLATE,
  DRIVERS_LICENSE_TEMPLATE,
  PASSPORT_AUTHENTICITY_TEMPLATE,
  DRIVERS_LICENSE_AUTHENTICITY_TEMPLATE,
  NAME_MATCH_PROMPT_TEMPLATE,
  type ExtractionTemplate,
  type AuthenticityTemplate,
  type ClassificationRule,
} from './templates';

// Document Extractors
export {
  type DocumentExtractor,
  type ExtractionContext,
  type ExtractorResult,
  type ExtractorMetadata,
  BaseExtractor,
  readField,
  registerExtractor,
  getExtractor,
  getExtractorOrThrow,
  hasExtractor,
  getRegisteredTypes,
  clearRegistry,
  registerAllExtractors,
  parseJsonObject,
  parseResponse,
  stripCodeFence,
  isJsonObject,
  type JsonObject,
  PassportExtractor,
  passportExtractor,
  DriversLicenseExtractor,
  driversLicenseExtractor,
} from './extractors';

// Validation
export * from './validation';

// Verification
export * from './verification';
