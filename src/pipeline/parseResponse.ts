import { z } from 'zod';

import { OptimizationError } from '../errors';
import type { ParsedOptimization } from '../types';

type SectionKey = 'resume' | 'suggestions' | 'score';

type ParserState = 'preamble' | SectionKey | 'ignored' | 'done';

type LabelMatch = { label: SectionKey | 'end'; inline: string };

const LABEL_PATTERN =
  /^(optimi[sz]ed[\s-]*resume|suggestions|match[\s-]*score|end(?:\s+of\s+(?:response|output))?)\s*(?::\s*(.*))?$/i;

const LIST_MARKER = /^(?:\(?\d{1,3}[.)]|[-*•–])(?:\s+|$)/;

const SCORE_TOKEN = /(-?\d+(?:\.\d+)?|-?\.\d+)\s*(%|\/\s*(\d+(?:\.\d+)?))?/;

const CODE_FENCE = /^\s*```/;

const jsonReplySchema = z.object({
  optimized_resume: z.string(),
  suggestions: z.array(z.string()).default([]),
  match_score: z.union([z.number(), z.string()]),
});

const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);

const toTwoDecimals = (value: number): number =>
  Math.round(value * 100) / 100;

const malformed = (message: string): OptimizationError =>
  new OptimizationError('MalformedModelOutput', message);

const matchLabel = (line: string): LabelMatch | null => {
  const decorated = /[=#*_]/.test(line);
  const candidate = line.replace(/[=#*_]+/g, ' ').replace(/\s+/g, ' ').trim();
  const match = LABEL_PATTERN.exec(candidate);

  if (!match) {
    return null;
  }

  const word = match[1].toLowerCase().replace(/[\s-]+/g, ' ');
  const inline = (match[2] ?? '').trim();

  if (word.startsWith('end')) {
    // A bare "End" line could belong to the resume itself.
    return decorated && !inline ? { label: 'end', inline: '' } : null;
  }

  if (word === 'suggestions') {
    return { label: 'suggestions', inline };
  }

  return { label: word.startsWith('match') ? 'score' : 'resume', inline };
};

/**
 * Normalizes a score to [0, 1]. Fractions like `7/10` divide by their denominator,
 * percentages and bare values above 1 divide by 100.
 */
export const parseScore = (text: string): number | null => {
  const match = SCORE_TOKEN.exec(text);

  if (!match) {
    return null;
  }

  let value = Number.parseFloat(match[1]);
  const denominator = match[3] ? Number.parseFloat(match[3]) : 0;

  if (denominator > 0) {
    value /= denominator;
  } else if (match[2] === '%' || value > 1) {
    value /= 100;
  }

  return toTwoDecimals(clamp(value, 0, 1));
};

export const parseSuggestions = (lines: string[]): string[] => {
  const cleaned = lines.map((line) => line.replace(/\*\*/g, '').trim()).filter(Boolean);

  if (!cleaned.some((line) => LIST_MARKER.test(line))) {
    return cleaned;
  }

  const items: string[] = [];

  for (const line of cleaned) {
    if (LIST_MARKER.test(line)) {
      items.push(line.replace(LIST_MARKER, '').trim());
    } else if (items.length > 0) {
      items[items.length - 1] = `${items[items.length - 1]} ${line}`.trim();
    }
  }

  return items.filter(Boolean);
};

const splitSections = (raw: string): Partial<Record<SectionKey, string[]>> => {
  const sections: Partial<Record<SectionKey, string[]>> = {};
  let state: ParserState = 'preamble';

  for (const line of raw.replace(/\r\n?/g, '\n').split('\n')) {
    if (state === 'done') {
      break;
    }

    if (CODE_FENCE.test(line)) {
      continue;
    }

    const label = matchLabel(line);

    if (label) {
      if (label.label === 'end') {
        state = 'done';
      } else if (sections[label.label]) {
        state = 'ignored';
      } else {
        sections[label.label] = label.inline ? [label.inline] : [];
        state = label.label;
      }
      continue;
    }

    if (state === 'preamble' || state === 'ignored') {
      continue;
    }

    sections[state]?.push(line);
  }

  return sections;
};

const parseJsonReply = (raw: string): ParsedOptimization | null => {
  const candidate = /\{[\s\S]*\}/.exec(raw);

  if (!candidate) {
    return null;
  }

  let data: unknown;

  try {
    data = JSON.parse(candidate[0]);
  } catch {
    return null;
  }

  const parsed = jsonReplySchema.safeParse(data);

  if (!parsed.success) {
    return null;
  }

  const { optimized_resume: optimizedResume, suggestions, match_score: rawScore } = parsed.data;
  const matchScore = parseScore(String(rawScore));

  if (!optimizedResume.trim() || matchScore === null) {
    return null;
  }

  return {
    optimizedResume: optimizedResume.trim(),
    suggestions: suggestions.map((item) => item.trim()).filter(Boolean),
    matchScore,
  };
};

export const parseModelResponse = (raw: string): ParsedOptimization => {
  const sections = splitSections(raw);

  if (!sections.resume && !sections.suggestions && !sections.score) {
    const fromJson = parseJsonReply(raw);

    if (fromJson) {
      return fromJson;
    }

    throw malformed('Model reply contains none of the expected sections.');
  }

  const optimizedResume = (sections.resume ?? []).join('\n').trim();

  if (!optimizedResume) {
    throw malformed('Model reply has no optimized resume section.');
  }

  if (!sections.score) {
    throw malformed('Model reply has no match score section.');
  }

  const matchScore = parseScore(sections.score.join(' '));

  if (matchScore === null) {
    throw malformed('Model reply match score section contains no number.');
  }

  return {
    optimizedResume,
    suggestions: parseSuggestions(sections.suggestions ?? []),
    matchScore,
  };
};
