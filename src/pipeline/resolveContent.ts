import { OptimizationError, messageOf } from '../errors';
import type { JobSource, ResumeSource } from '../types';

export type PdfTextExtractor = (bytes: Uint8Array) => Promise<string>;

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

type ContentResolverOptions = {
  fetchTimeoutMs?: number;
  userAgent?: string;
  fetch?: FetchLike;
  extractPdfText?: PdfTextExtractor;
};

const DEFAULT_FETCH_TIMEOUT_MS = 15_000;
const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; resume-optimizer)';
// Challenge interstitials are short; long pages that merely mention a captcha widget are real postings.
const CHALLENGE_PAGE_MAX_CHARS = 3000;

// Wording shown to visitors of interstitial pages, matched against the title and the visible text.
const CHALLENGE_PHRASES = [
  'captcha',
  'verify you are human',
  'are you a robot',
  'checking your browser',
  'access denied',
  'attention required',
  'just a moment',
];

// Resources that only challenge pages load, matched against the raw markup.
const CHALLENGE_RESOURCES = [
  '/cdn-cgi/challenge-platform',
  'cf-chl',
  'captcha-delivery.com',
  'px-captcha',
  '_incapsula_resource',
];

const extractWithPdfParse: PdfTextExtractor = async (bytes) => {
  // Loaded on demand: pdf-parse probes for a bundled test file when imported outside of a parent module.
  const { default: pdfParse } = await import('pdf-parse');
  const result = await pdfParse(Buffer.from(bytes));
  return result.text ?? '';
};

/** Collapses page breaks and blank lines so that lines are separated by exactly one newline. */
export const collapsePdfText = (text: string): string =>
  text
    .replace(/\r\n?/g, '\n')
    .replace(/\f/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.trim().length > 0)
    .join('\n')
    .trim();

const decodeEntities = (text: string): string =>
  text
    .replace(/&nbsp;|&#160;/gi, ' ')
    .replace(/&quot;/gi, '"')
    .replace(/&#39;|&apos;/gi, "'")
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>')
    .replace(/&amp;/gi, '&');

export const htmlToText = (html: string): string =>
  decodeEntities(
    html
      .replace(/<!--[\s\S]*?-->/g, ' ')
      .replace(/<head\b[^>]*>[\s\S]*?<\/head>/gi, ' ')
      .replace(/<(script|style|noscript|template|svg|iframe|nav|header|footer|aside|form)\b[^>]*>[\s\S]*?<\/\1>/gi, ' ')
      .replace(/<br\s*\/?>/gi, '\n')
      .replace(/<\/(p|div|li|h\d|tr|section|article|main|ul|ol|table)>/gi, '\n')
      .replace(/<li\b[^>]*>/gi, '\n- ')
      .replace(/<[^>]+>/g, ' '),
  )
    .replace(/\u00a0/g, ' ')
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[ \t]+/g, ' ').trim())
    .filter(Boolean)
    .join('\n');

const pageTitle = (html: string): string => /<title\b[^>]*>([\s\S]*?)<\/title>/i.exec(html)?.[1] ?? '';

const looksLikeChallenge = (headers: Headers, body: string, text: string): boolean => {
  if (headers.get('cf-mitigated')?.toLowerCase() === 'challenge') {
    return true;
  }

  if (text.length > CHALLENGE_PAGE_MAX_CHARS) {
    return false;
  }

  const markup = body.toLowerCase();

  if (CHALLENGE_RESOURCES.some((resource) => markup.includes(resource))) {
    return true;
  }

  const visible = `${pageTitle(body)}\n${text}`.toLowerCase();
  return CHALLENGE_PHRASES.some((phrase) => visible.includes(phrase));
};

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Accepts UTF-8 text only; other uploads (Word files, images) are not decodable resumes. */
const decodeTextFile = (bytes: Uint8Array, filename?: string): string => {
  const notText = (cause?: unknown): OptimizationError =>
    new OptimizationError(
      'UnreadableDocument',
      `Could not read ${filename ? `"${filename}"` : 'the uploaded file'}: it is not a PDF or UTF-8 text file.`,
      { cause },
    );
  let text: string;

  try {
    text = utf8.decode(bytes);
  } catch (error) {
    throw notText(error);
  }

  // NUL never occurs in text documents but is common in binary formats that happen to be valid UTF-8.
  if (text.includes('\u0000')) {
    throw notText();
  }

  return text;
};

const requireText = (text: string, label: string): string => {
  const trimmed = text.trim();

  if (!trimmed) {
    throw new OptimizationError('EmptyInput', `The ${label} is empty.`);
  }

  return trimmed;
};

export class ContentResolver {
  private readonly fetchTimeoutMs: number;

  private readonly userAgent: string;

  private readonly fetchImpl: FetchLike;

  private readonly extractPdfText: PdfTextExtractor;

  constructor({ fetchTimeoutMs, userAgent, fetch: fetchImpl, extractPdfText }: ContentResolverOptions = {}) {
    this.fetchTimeoutMs = Math.max(1, fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS);
    this.userAgent = userAgent ?? DEFAULT_USER_AGENT;
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
    this.extractPdfText = extractPdfText ?? extractWithPdfParse;
  }

  async resolveResume(source: ResumeSource): Promise<string> {
    if (source.kind === 'text') {
      return requireText(source.text, 'resume');
    }

    if (source.format === 'text') {
      return requireText(decodeTextFile(source.bytes, source.filename), 'resume file');
    }

    return this.readPdf(source.bytes, source.filename);
  }

  async resolveJob(source: JobSource): Promise<string> {
    if (source.kind === 'text') {
      return requireText(source.text, 'job posting');
    }

    return requireText(await this.fetchPage(source.url), 'job posting page');
  }

  private async readPdf(bytes: Uint8Array, filename?: string): Promise<string> {
    const label = filename ? `"${filename}"` : 'the uploaded PDF';
    let raw: string;

    try {
      raw = await this.extractPdfText(bytes);
    } catch (error) {
      throw new OptimizationError(
        'UnreadableDocument',
        `Could not read ${label}: ${messageOf(error)}`,
        { cause: error },
      );
    }

    const text = collapsePdfText(raw);

    if (!text) {
      throw new OptimizationError(
        'UnreadableDocument',
        `No text could be extracted from ${label}. It may be a scanned image.`,
      );
    }

    return text;
  }

  private async fetchPage(url: string): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.fetchTimeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        redirect: 'follow',
        signal: controller.signal,
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.9',
        },
      });

      if (!response.ok) {
        throw new OptimizationError(
          'FetchBlocked',
          `The job posting URL responded with status ${response.status}.`,
        );
      }

      const contentType = response.headers.get('content-type')?.toLowerCase() ?? '';

      if (contentType && !contentType.includes('text/html') && !contentType.includes('text/plain')
        && !contentType.includes('application/xhtml')) {
        throw new OptimizationError('FetchBlocked', `The job posting URL returned unsupported content (${contentType}).`);
      }

      const body = await response.text();
      const text = contentType.includes('text/plain') ? body : htmlToText(body);

      if (looksLikeChallenge(response.headers, body, text)) {
        throw new OptimizationError('FetchBlocked', 'The job posting site blocks automated access.');
      }

      console.info(`[FETCH] ${url} -> ${text.length} chars`);

      return text;
    } catch (error) {
      if (error instanceof OptimizationError) {
        throw error;
      }

      if (controller.signal.aborted) {
        throw new OptimizationError(
          'FetchTimeout',
          `Timed out after ${this.fetchTimeoutMs}ms while fetching the job posting.`,
          { cause: error },
        );
      }

      throw new OptimizationError(
        'FetchBlocked',
        `The job posting URL could not be reached: ${messageOf(error)}`,
        { cause: error },
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
