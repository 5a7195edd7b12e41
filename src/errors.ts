import type { OptimizationRecord, PipelineStage } from './types';

export type FailureKind =
  | 'InvalidRequest'
  | 'UnreadableDocument'
  | 'EmptyInput'
  | 'FetchBlocked'
  | 'FetchTimeout'
  | 'ProviderUnavailable'
  | 'ProviderThrottled'
  | 'ProviderRejected'
  | 'ProviderTimeout'
  | 'MalformedModelOutput'
  | 'PersistenceError'
  | 'NotFound';

export type FailureCategory = 'input' | 'transient' | 'system' | 'not_found';

type OptimizationErrorOptions = {
  cause?: unknown;
  stage?: PipelineStage;
  record?: OptimizationRecord;
};

export class OptimizationError extends Error {
  readonly kind: FailureKind;

  stage?: PipelineStage;

  /** Result that was computed but could not be persisted. */
  readonly record?: OptimizationRecord;

  constructor(kind: FailureKind, message: string, options: OptimizationErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'OptimizationError';
    this.kind = kind;
    this.stage = options.stage;
    this.record = options.record;
  }
}

export const isOptimizationError = (error: unknown): error is OptimizationError =>
  error instanceof OptimizationError;

export const messageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const hasKind = (error: unknown, ...kinds: FailureKind[]): boolean =>
  isOptimizationError(error) && kinds.includes(error.kind);

type FailureDescription = {
  category: FailureCategory;
  status: number;
  hint: string;
};

const FAILURES: Record<FailureKind, FailureDescription> = {
  InvalidRequest: {
    category: 'input',
    status: 400,
    hint: 'Provide exactly one resume (file or text) and exactly one job posting (URL or text).',
  },
  UnreadableDocument: {
    category: 'input',
    status: 422,
    hint: 'The resume file has no extractable text. Upload a text-based PDF or paste the resume instead.',
  },
  EmptyInput: {
    category: 'input',
    status: 422,
    hint: 'The resume or job posting is empty.',
  },
  FetchBlocked: {
    category: 'input',
    status: 422,
    hint: 'The job posting page could not be retrieved. Paste the job description text instead.',
  },
  FetchTimeout: {
    category: 'input',
    status: 422,
    hint: 'The job posting page took too long to respond. Paste the job description text instead.',
  },
  ProviderThrottled: {
    category: 'transient',
    status: 429,
    hint: 'The model provider is rate limiting requests. Try again shortly.',
  },
  ProviderTimeout: {
    category: 'transient',
    status: 504,
    hint: 'The model provider did not answer in time. Try again shortly.',
  },
  ProviderUnavailable: {
    category: 'system',
    status: 502,
    hint: 'The model provider is unavailable.',
  },
  ProviderRejected: {
    category: 'system',
    status: 502,
    hint: 'The model provider rejected the request. Check the API key and model configuration.',
  },
  MalformedModelOutput: {
    category: 'system',
    status: 502,
    hint: 'The model reply did not follow the expected format.',
  },
  PersistenceError: {
    category: 'system',
    status: 500,
    hint: 'The optimization history could not be updated.',
  },
  NotFound: {
    category: 'not_found',
    status: 404,
    hint: 'Optimization not found.',
  },
};

export const describeFailure = (kind: FailureKind): FailureDescription => FAILURES[kind];
