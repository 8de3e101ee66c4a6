import * as Sentry from '@sentry/node';
import express, {type NextFunction, type Request, type Response} from 'express';
import multer from 'multer';
import {z} from 'zod';

import {imageSource} from 'src/image-source';
import {pdfSource} from 'src/pdf-source';
import {NO_INPUT_REASON, textSource} from 'src/text-source';

import {detectAmounts} from './detect';
import type {Env} from './env';
import {errorMessage, RequestError} from './errors';
import type {DocumentRequest, ErrorResponse, InputSource} from './types';

let INPUT_SOURCES: InputSource[] = [imageSource, pdfSource, textSource];

/**
 * Used in tests. replaces all input sources
 */
export function overrideSources(sources: InputSource[]) {
  INPUT_SOURCES = sources;
}

const REQUEST_BODY = z.object({
  document_text: z.string().optional(),
  image_base64: z.string().optional(),
});

function toDocumentRequest(req: Request): DocumentRequest {
  if (req.file !== undefined) {
    return {kind: 'upload', contentType: req.file.mimetype, data: req.file.buffer};
  }

  if (Buffer.isBuffer(req.body)) {
    return {kind: 'upload', contentType: req.get('content-type') ?? '', data: req.body};
  }

  const body = REQUEST_BODY.safeParse(req.body ?? {});

  if (!body.success) {
    const details = body.error.issues
      .map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join(', ');
    throw new RequestError(400, `Invalid request body: ${details}`);
  }

  return {kind: 'json', body: body.data};
}

async function handleDetect(req: Request, res: Response, env: Env) {
  const request = toDocumentRequest(req);
  const source = INPUT_SOURCES.find(candidate => candidate.matchRequest(request));

  if (source === undefined) {
    throw new RequestError(400, NO_INPUT_REASON);
  }

  console.log(`Reading document with the ${source.identifier} source`);

  const text = await source.extractText(request, env);
  const result = await detectAmounts(text, env);

  res.json(result);
}

/**
 * Status of an error raised by express or multer themselves, such as a
 * malformed JSON body or one over the size limit
 */
function clientErrorStatus(error: unknown): number | null {
  if (error instanceof multer.MulterError) {
    return error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
  }

  if (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  ) {
    return error.status;
  }

  return null;
}

function handleError(error: unknown, _req: Request, res: Response, _next: NextFunction) {
  const status = error instanceof RequestError ? error.status : clientErrorStatus(error);

  if (status !== null) {
    console.warn('Rejected request', {status, reason: errorMessage(error)});
    const body: ErrorResponse = {status: 'error', reason: errorMessage(error)};
    res.status(status).json(body);
    return;
  }

  console.error('Failed to detect amounts', error);
  const body: ErrorResponse = {status: 'error', reason: 'Internal error'};
  res.status(500).json(body);
}

/**
 * Builds the HTTP application exposing the amount detection pipeline
 */
export function createApp(env: Env) {
  const app = express();

  app.use(express.json({limit: env.BODY_LIMIT}));
  app.use(express.raw({type: ['image/*', 'application/pdf'], limit: env.BODY_LIMIT}));

  app.get('/health', (_req, res) => {
    res.json({status: 'ok'});
  });

  // Multipart forms carry the document as a file under `file`
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {fileSize: env.BODY_LIMIT, files: 1},
  });

  app.post('/detect-amounts', upload.single('file'), (req, res, next) => {
    handleDetect(req, res, env).catch(next);
  });

  Sentry.setupExpressErrorHandler(app);
  app.use(handleError);

  return app;
}
