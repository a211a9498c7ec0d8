/**
 * Verify API - process entry point
 */

import { config, logger, DocumentVerifier, OpenAiModelGateway } from '@idverify/shared';
import { createApp } from './app';

if (!config.llmApiKey) {
  logger.warn('LLM_API_KEY is not set; model calls will fail and be reported as failed checks');
}

const gateway = OpenAiModelGateway.fromConfig(config);
const verifier = DocumentVerifier.fromConfig(gateway, config);
const app = createApp(verifier, { maxUploadBytes: config.maxUploadBytes });

const server = app.listen(config.port, () => {
  logger.info('Verify API started', {
    port: config.port,
    vision_model: gateway.visionModel,
    ocr_model: gateway.ocrModel,
    extraction_strategy: config.extractionStrategy,
    name_matcher: config.nameMatcher,
  });
});

// Graceful shutdown
function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
