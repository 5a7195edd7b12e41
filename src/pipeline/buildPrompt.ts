import { RESUME_OPTIMIZATION_PROMPT, TRUNCATION_NOTICE } from '../llm/prompts';
import type { Truncation } from '../types';

export type PromptLimits = {
  maxJobChars: number;
  maxResumeChars: number;
};

export type BuiltPrompt = {
  text: string;
  truncation: Truncation;
};

export const DEFAULT_PROMPT_LIMITS: PromptLimits = {
  maxJobChars: 6000,
  maxResumeChars: 6000,
};

/** Keeps the head of the text; postings and resumes front-load what matters. */
export const truncateHead = (text: string, maxChars: number): { text: string; truncated: boolean } => {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }

  return { text: text.slice(0, Math.max(0, maxChars)), truncated: true };
};

const block = (title: string, body: string, truncated: boolean): string =>
  [`--- ${title} ---`, body, ...(truncated ? [TRUNCATION_NOTICE] : []), `--- END ${title} ---`].join('\n');

export const buildPrompt = (
  jobText: string,
  resumeText: string,
  limits: PromptLimits = DEFAULT_PROMPT_LIMITS,
): BuiltPrompt => {
  const job = truncateHead(jobText, limits.maxJobChars);
  const resume = truncateHead(resumeText, limits.maxResumeChars);

  const text = [
    RESUME_OPTIMIZATION_PROMPT,
    '',
    block('JOB POSTING', job.text, job.truncated),
    '',
    block('CURRENT RESUME', resume.text, resume.truncated),
  ].join('\n');

  return {
    text,
    truncation: {
      job_posting: job.truncated,
      resume: resume.truncated,
    },
  };
};
