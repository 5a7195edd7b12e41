export type PipelineStage =
  | 'resolving'
  | 'prompting'
  | 'invoking'
  | 'parsing'
  | 'persisting'
  | 'complete'
  | 'failed';

export type ResumeFormat = 'pdf' | 'text';

export type ResumeSource =
  | { kind: 'file'; bytes: Uint8Array; format: ResumeFormat; filename?: string }
  | { kind: 'text'; text: string };

export type JobSource =
  | { kind: 'url'; url: string }
  | { kind: 'text'; text: string };

export interface InputBundle {
  resume: ResumeSource;
  job: JobSource;
}

/** Raw, unvalidated request as handed over by the HTTP layer. */
export interface OptimizeRequest {
  resumeFile?: {
    bytes: Uint8Array;
    filename?: string;
    mimeType?: string;
  };
  resumeText?: string;
  jobUrl?: string;
  jobText?: string;
}

export interface ParsedOptimization {
  optimizedResume: string;
  suggestions: string[];
  matchScore: number;
}

export interface Truncation {
  job_posting: boolean;
  resume: boolean;
}

export interface OptimizationRecord {
  id: string;
  created_at: string;
  job_url: string | null;
  job_posting_content: string;
  resume_source_text: string;
  optimized_resume: string;
  suggestions: string[];
  match_score: number; // 0..1
  truncation: Truncation;
}

export interface OptimizationSummary {
  id: string;
  created_at: string;
  job_url: string | null;
  job_posting_preview: string;
  match_score: number;
  suggestion_count: number;
}
