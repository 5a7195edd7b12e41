export const SECTION_LABELS = {
  resume: 'OPTIMIZED RESUME',
  suggestions: 'SUGGESTIONS',
  score: 'MATCH SCORE',
  end: 'END',
} as const;

export const delimiter = (label: string): string => `=== ${label} ===`;

export const RESUME_OPTIMIZATION_PROMPT = `You are an expert resume writer. Rewrite the candidate resume below so it aligns better with the job posting.
Rules:
1. Emphasize the skills and experience most relevant to the job and use the posting's keywords where they truthfully apply.
2. Stay factually accurate. Only reorganize, rephrase and emphasize what the resume already contains. Never invent employers, titles, dates, degrees, certifications or skills.
3. Follow common resume practice: concise bullet points, strong action verbs, quantified results where the resume provides numbers.

Respond using exactly these four delimiter lines, in this order, each on its own line:
${delimiter(SECTION_LABELS.resume)}
<the complete rewritten resume as plain text>
${delimiter(SECTION_LABELS.suggestions)}
<a numbered list of specific improvements, most important first, one per line>
${delimiter(SECTION_LABELS.score)}
<a single number between 0.00 and 1.00 estimating how well the resume matches the job, e.g. 0.72>
${delimiter(SECTION_LABELS.end)}
Do not write anything outside these sections.`;

export const TRUNCATION_NOTICE = '[Truncated to fit the input limit.]';
