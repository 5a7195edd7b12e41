import { v4 as uuidv4 } from 'uuid';

import { OptimizationError, hasKind, isOptimizationError, messageOf } from '../errors';
import type { FailureKind } from '../errors';
import type { ModelInvoker } from '../llm/client';
import type { HistoryStore } from '../store/optimizations';
import type {
  InputBundle,
  OptimizationRecord,
  OptimizationSummary,
  OptimizeRequest,
  PipelineStage,
  ResumeFormat,
} from '../types';
import { retryWithFixedBackoff } from '../util/retry';
import { DEFAULT_PROMPT_LIMITS, buildPrompt } from './buildPrompt';
import type { PromptLimits } from './buildPrompt';
import { parseModelResponse } from './parseResponse';
import type { ContentResolver } from './resolveContent';

type ActiveStage = Exclude<PipelineStage, 'complete' | 'failed'>;

export type PipelineDeps = {
  resolver: Pick<ContentResolver, 'resolveResume' | 'resolveJob'>;
  invoker: ModelInvoker;
  store: HistoryStore;
  promptLimits?: PromptLimits;
  retryBackoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  generateId?: () => string;
};

export type OptimizeOptions = {
  onStageChange?: (stage: PipelineStage) => void;
};

/** One retry in total per request, and only for failures that a second attempt can plausibly fix. */
const MAX_MODEL_ATTEMPTS = 2;
const RETRYABLE_KINDS: FailureKind[] = ['ProviderThrottled', 'ProviderTimeout', 'MalformedModelOutput'];

const FALLBACK_KIND: Record<ActiveStage, FailureKind> = {
  resolving: 'UnreadableDocument',
  prompting: 'InvalidRequest',
  invoking: 'ProviderUnavailable',
  parsing: 'MalformedModelOutput',
  persisting: 'PersistenceError',
};

const MAX_HISTORY_PAGE = 100;

const invalid = (message: string): OptimizationError => new OptimizationError('InvalidRequest', message);

const isProvided = (value: string | undefined): value is string => value !== undefined && value !== '';

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d]; // %PDF-

export const detectResumeFormat = (file: NonNullable<OptimizeRequest['resumeFile']>): ResumeFormat => {
  if (file.filename?.toLowerCase().endsWith('.pdf') || file.mimeType === 'application/pdf') {
    return 'pdf';
  }

  return PDF_MAGIC.every((byte, index) => file.bytes[index] === byte) ? 'pdf' : 'text';
};

const assertHttpUrl = (value: string): string => {
  let url: URL;

  try {
    url = new URL(value.trim());
  } catch {
    throw invalid(`"${value}" is not a valid URL.`);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw invalid('Only http and https job posting URLs are supported.');
  }

  return url.toString();
};

/** Checks that exactly one resume source and exactly one job source were supplied. */
export const validateRequest = (request: OptimizeRequest): InputBundle => {
  const hasResumeFile = request.resumeFile !== undefined;
  const hasResumeText = isProvided(request.resumeText);
  const hasJobUrl = isProvided(request.jobUrl);
  const hasJobText = isProvided(request.jobText);

  if (hasResumeFile === hasResumeText) {
    throw invalid('Provide either a resume file or resume text, not both and not neither.');
  }

  if (hasJobUrl === hasJobText) {
    throw invalid('Provide either a job posting URL or job posting text, not both and not neither.');
  }

  const resume: InputBundle['resume'] = request.resumeFile
    ? {
      kind: 'file',
      bytes: request.resumeFile.bytes,
      format: detectResumeFormat(request.resumeFile),
      filename: request.resumeFile.filename,
    }
    : { kind: 'text', text: request.resumeText ?? '' };

  const job: InputBundle['job'] = isProvided(request.jobUrl)
    ? { kind: 'url', url: assertHttpUrl(request.jobUrl) }
    : { kind: 'text', text: request.jobText ?? '' };

  return { resume, job };
};

export class OptimizationPipeline {
  private readonly deps: PipelineDeps;

  constructor(deps: PipelineDeps) {
    this.deps = deps;
  }

  async optimize(request: OptimizeRequest, options: OptimizeOptions = {}): Promise<OptimizationRecord> {
    const { resolver, invoker, store } = this.deps;
    const runId = this.deps.generateId ? this.deps.generateId() : uuidv4();
    let stage: ActiveStage = 'resolving';

    const enter = (next: PipelineStage): void => {
      options.onStageChange?.(next);
      console.info(`[PIPELINE] ${runId} ${next}`);
    };

    try {
      enter(stage);
      const bundle = validateRequest(request);
      const resumeText = await resolver.resolveResume(bundle.resume);
      const jobText = await resolver.resolveJob(bundle.job);
      console.info(`[PIPELINE] ${runId} resolved resume (${resumeText.length} chars) and job (${jobText.length} chars)`);

      stage = 'prompting';
      enter(stage);
      const prompt = buildPrompt(jobText, resumeText, this.deps.promptLimits ?? DEFAULT_PROMPT_LIMITS);

      const parsed = await retryWithFixedBackoff(
        async () => {
          stage = 'invoking';
          enter(stage);
          const raw = await invoker.invoke(prompt.text);

          stage = 'parsing';
          enter(stage);
          return parseModelResponse(raw);
        },
        {
          maxAttempts: MAX_MODEL_ATTEMPTS,
          delayMs: this.deps.retryBackoffMs ?? 2000,
          sleep: this.deps.sleep,
          shouldRetry: (error) => hasKind(error, ...RETRYABLE_KINDS),
          onRetry: (error, attempt, delayMs) => {
            const kind = isOptimizationError(error) ? error.kind : 'unknown';
            console.warn(`[PIPELINE] ${runId} attempt ${attempt} failed (${kind}); retrying in ${delayMs}ms`);
          },
        },
      );

      const record: OptimizationRecord = {
        id: runId,
        created_at: (this.deps.now ? this.deps.now() : new Date()).toISOString(),
        job_url: bundle.job.kind === 'url' ? bundle.job.url : null,
        job_posting_content: jobText,
        resume_source_text: resumeText,
        optimized_resume: parsed.optimizedResume,
        suggestions: parsed.suggestions,
        match_score: parsed.matchScore,
        truncation: prompt.truncation,
      };

      stage = 'persisting';
      enter(stage);

      try {
        await store.save(record);
      } catch (error) {
        throw new OptimizationError('PersistenceError', messageOf(error), { cause: error, record });
      }

      enter('complete');
      return record;
    } catch (error) {
      const failure = isOptimizationError(error)
        ? error
        : new OptimizationError(FALLBACK_KIND[stage], messageOf(error), { cause: error });

      failure.stage = stage;
      enter('failed');
      console.error(`[PIPELINE] ${runId} failed while ${stage}: ${failure.kind} - ${failure.message}`);

      throw failure;
    }
  }

  listHistory(limit = 10, offset = 0): Promise<OptimizationSummary[]> {
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_HISTORY_PAGE) {
      return Promise.reject(invalid(`limit must be an integer between 1 and ${MAX_HISTORY_PAGE}.`));
    }

    if (!Number.isInteger(offset) || offset < 0) {
      return Promise.reject(invalid('offset must be a non-negative integer.'));
    }

    return this.deps.store.list(limit, offset);
  }

  getRecord(id: string): Promise<OptimizationRecord> {
    return this.deps.store.get(id);
  }

  deleteRecord(id: string): Promise<void> {
    return this.deps.store.delete(id);
  }
}
