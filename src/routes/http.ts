import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import type { ZodIssue } from 'zod';

import { describeFailure, isOptimizationError } from '../errors';
import type { FailureCategory, FailureKind } from '../errors';
import { OptimizationPipeline } from '../pipeline/optimize';

type ErrorBody = {
  error: {
    kind: FailureKind | 'Unexpected';
    category: FailureCategory;
    message: string;
    hint?: string;
  };
};

const PERSISTENCE_WARNING = 'The optimization succeeded but could not be saved to history.';

/** App settings the routers read their collaborators from. */
export const PIPELINE_SETTING = 'pipeline';
export const UPLOAD_LIMIT_SETTING = 'upload max bytes';

const DEFAULT_UPLOAD_MAX_BYTES = 5 * 1024 * 1024;

export const pipelineOf = (req: Request): OptimizationPipeline => {
  const pipeline: unknown = req.app.get(PIPELINE_SETTING);

  if (!(pipeline instanceof OptimizationPipeline)) {
    throw new Error('No optimization pipeline is registered on the app.');
  }

  return pipeline;
};

export const uploadLimitOf = (req: Request): number => {
  const limit: unknown = req.app.get(UPLOAD_LIMIT_SETTING);
  return typeof limit === 'number' ? limit : DEFAULT_UPLOAD_MAX_BYTES;
};

export const asyncRoute =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };

export const sendValidationErrors = (res: Response, issues: ZodIssue[]): void => {
  res.status(400).json({
    errors: issues.map((issue) => ({
      path: issue.path.join('.') || undefined,
      message: issue.message,
    })),
  });
};

const inputError = (message: string): ErrorBody => ({
  error: { kind: 'InvalidRequest', category: 'input', message },
});

const clientStatusOf = (error: unknown): number | undefined => {
  if (typeof error !== 'object' || error === null || !('status' in error) || typeof error.status !== 'number') {
    return undefined;
  }

  return error.status >= 400 && error.status < 500 ? error.status : undefined;
};

export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
  const route = `${req.method} ${req.originalUrl}`;

  if (isOptimizationError(error)) {
    const { category, status, hint } = describeFailure(error.kind);
    const body: ErrorBody = { error: { kind: error.kind, category, message: error.message, hint } };

    if (error.kind === 'PersistenceError' && error.record) {
      console.error(`[HTTP] ${route} -> ${status} ${error.kind}; returning unsaved result`);
      res.status(status).json({ ...body, result: error.record, warning: PERSISTENCE_WARNING });
      return;
    }

    console.warn(`[HTTP] ${route} -> ${status} ${error.kind}`);
    res.status(status).json(body);
    return;
  }

  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') {
      console.warn(`[HTTP] ${route} -> 413 upload too large`);
      res.status(413).json(inputError(`Resume file exceeds the ${uploadLimitOf(req)} byte upload limit.`));
      return;
    }

    console.warn(`[HTTP] ${route} -> 400 ${error.code}`);
    res.status(400).json(inputError(`Invalid upload: ${error.message}.`));
    return;
  }

  // body-parser failures (malformed JSON, oversized body) carry their own 4xx status.
  const clientStatus = clientStatusOf(error);

  if (clientStatus !== undefined) {
    console.warn(`[HTTP] ${route} -> ${clientStatus} malformed request body`);
    res.status(clientStatus).json(inputError('The request body could not be parsed.'));
    return;
  }

  console.error(`[HTTP] ${route} -> 500`, error);
  res.status(500).json({
    error: { kind: 'Unexpected', category: 'system', message: 'Unexpected server error.' },
  } satisfies ErrorBody);
};
