/**
 * Verify API
 *
 * POST /extract       - Extract and validate one document
 * POST /extract/both  - Extract a passport and a license, validate and cross-check
 * POST /verify_type   - Compare the declared document type with the OCR text
 * POST /verify        - Authenticity assessment
 * POST /validate      - Validate a field record supplied as JSON
 * POST /consistency   - Cross-check two field records supplied as JSON
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  runWithContextAsync,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  validateReport,
  getExtractorOrThrow,
  passportExtractor,
  driversLicenseExtractor,
  isJsonObject,
  type DocumentVerifier,
  type JsonObject,
} from '@idverify/shared';
import {
  BadRequestError,
  bodyField,
  correlationIdOf,
  optionalStrategy,
  requireDocumentType,
  sendError,
  toDocumentImage,
} from './lib/http';
import { createUploader, firstFile, namedFile } from './lib/uploads';

export interface AppOptions {
  maxUploadBytes?: number;
}

type Handler = (req: Request, res: Response) => Promise<void>;

/**
 * Run a handler inside the request's correlation context and turn thrown
 * errors into the error envelope.
 */
function route(name: string, handler: Handler) {
  return (req: Request, res: Response): void => {
    const correlationId = correlationIdOf(res);

    runWithContextAsync({ correlationId }, () => handler(req, res)).catch((error: unknown) => {
      if (error instanceof BadRequestError) {
        sendError(res, error.status, error.code, error.message);
        return;
      }

      logger.error(`${name} failed`, error, { correlationId });
      sendError(res, 500, 'internal_error', `${name} failed`);
    });
  };
}

function objectField(body: unknown, key: string): JsonObject {
  const value = isJsonObject(body) ? body[key] : undefined;
  if (!isJsonObject(value)) {
    throw new BadRequestError('invalid_request', `${key} must be an object`);
  }
  return value;
}

function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }
  const status = error.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(verifier: DocumentVerifier, options: AppOptions = {}): Express {
  const app = express();
  const upload = createUploader(options.maxUploadBytes ?? config.maxUploadBytes);

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get('x-correlation-id') || ulid();
    res.locals.correlationId = correlationId;
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? routePath : req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        correlationId: correlationIdOf(res),
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Parsed after correlation so body errors carry the request's ID
  app.use(express.json({ limit: '1mb' }));

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'verify-api',
      model: verifier.model,
      timestamp: new Date().toISOString(),
    });
  });

  // Metrics endpoint
  app.get(
    '/metrics',
    route('Metrics', async (req, res) => {
      const metrics = await getMetrics();
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(metrics);
    })
  );

  app.post(
    '/extract',
    upload.array('files', 1),
    route('Extraction', async (req, res) => {
      const documentType = requireDocumentType(req.body);
      const strategy = optionalStrategy(req.body);
      const image = toDocumentImage(firstFile(req));

      const report = await verifier.verifyDocument(image, documentType, {
        caseId: bodyField(req.body, 'case_id'),
        strategy,
      });

      validateReport(report);
      res.json(report);
    })
  );

  app.post(
    '/extract/both',
    upload.fields([
      { name: 'passport', maxCount: 1 },
      { name: 'drivers_license', maxCount: 1 },
    ]),
    route('Pair extraction', async (req, res) => {
      const passport = toDocumentImage(namedFile(req, 'passport'));
      const license = toDocumentImage(namedFile(req, 'drivers_license'));

      const report = await verifier.verifyPair(passport, license, {
        caseId: bodyField(req.body, 'case_id'),
        strategy: optionalStrategy(req.body),
      });

      validateReport(report);
      res.json(report);
    })
  );

  app.post(
    '/verify_type',
    upload.array('files', 1),
    route('Type verification', async (req, res) => {
      const documentType = requireDocumentType(req.body);
      const image = toDocumentImage(firstFile(req));

      res.json(await verifier.inferType(image, documentType));
    })
  );

  app.post(
    '/verify',
    upload.array('files', 1),
    route('Authenticity verification', async (req, res) => {
      const documentType = requireDocumentType(req.body);
      const image = toDocumentImage(firstFile(req));

      res.json(await verifier.assessAuthenticity(image, documentType));
    })
  );

  app.post(
    '/validate',
    route('Validation', async (req, res) => {
      const documentType = requireDocumentType(req.body);
      const record = getExtractorOrThrow(documentType).toRecord(objectField(req.body, 'record'));

      res.json({ doc_type: documentType, validators: verifier.validate(record, documentType) });
    })
  );

  app.post(
    '/consistency',
    route('Consistency check', async (req, res) => {
      const validators = await verifier.checkConsistency(
        passportExtractor.toRecord(objectField(req.body, 'passport')),
        driversLicenseExtractor.toRecord(objectField(req.body, 'drivers_license'))
      );

      res.json({ validators });
    })
  );

  // Upload and body-parser errors
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      sendError(res, status, 'invalid_upload', error.message);
      return;
    }

    // body-parser sets a 4xx status (413 for a body over the JSON limit)
    const status = clientErrorStatus(error) ?? 400;
    logger.warn('Rejected request', {
      status,
      error: error instanceof Error ? error.message : String(error),
    });
    sendError(res, status, 'invalid_request', error instanceof Error ? error.message : 'Invalid request');
  });

  return app;
}
