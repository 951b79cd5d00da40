import { attempt, fail, ok, ToolError } from '../errors';
import type { Result } from '../errors';
import type { LanguageGuess, SentimentResult, Summary, Translation } from '../types';
import type { TextModel } from './genai';

const MIN_SUMMARY_INPUT = 20;
const MAX_SUMMARY_INPUT = 4000;
const MAX_SENTIMENT_INPUT = 512;
const ENGLISH_RATIO = 0.6;

const LETTER = /\p{L}/u;
const ASCII_LETTER = /[A-Za-z]/;
const ARABIC_SCRIPT = /[\u0600-\u06FF]/;
const ASCII_ONLY = /^[\x00-\x7F]*$/;
const SENTENCE_BREAK = /(?<=[.!?؟])\s+/;

export function isMostlyEnglish(text: string, threshold = ENGLISH_RATIO): boolean {
  const letters = [...text].filter((ch) => LETTER.test(ch));
  if (letters.length === 0) return false;

  const english = letters.filter((ch) => ASCII_LETTER.test(ch)).length;
  return english / letters.length >= threshold;
}

export function guessLanguage(text: string): LanguageGuess {
  if (ARABIC_SCRIPT.test(text)) return 'fa';
  if (ASCII_ONLY.test(text)) return 'en';
  return 'unknown';
}

/**
 * Extractive fallback: the first sentences of the text, cut on a word boundary.
 */
export function simpleSummary(text: string, maxSentences = 3, maxChars = 400): string {
  const trimmed = text.trim();
  if (!trimmed) return '';
  if (trimmed.length <= maxChars) return trimmed;

  let summary = trimmed.split(SENTENCE_BREAK).slice(0, maxSentences).join(' ').trim();

  if (summary.length > maxChars) {
    summary = summary.slice(0, maxChars);
    const lastSpace = summary.lastIndexOf(' ');
    if (lastSpace !== -1) summary = summary.slice(0, lastSpace);
    summary += '...';
  }

  return summary;
}

export class NlpService {
  constructor(private readonly model: TextModel | null) {}

  get hasModel(): boolean {
    return this.model !== null;
  }

  async summarize(text: string): Promise<Result<Summary>> {
    const trimmed = text.trim();
    if (trimmed.length < MIN_SUMMARY_INPUT) {
      return ok({ summary: trimmed, strategy: 'passthrough' });
    }

    const input = trimmed.slice(0, MAX_SUMMARY_INPUT);
    const model = this.model;

    if (model && isMostlyEnglish(input)) {
      return attempt('Summarization model', async () => ({
        summary: await model.summarize(input),
        strategy: 'model' as const,
      }));
    }

    return ok({ summary: simpleSummary(input), strategy: 'extractive' });
  }

  async translate(text: string, targetLang: string): Promise<Result<Translation>> {
    const trimmed = text.trim();
    if (!trimmed) {
      return ok({ sourceLang: null, targetLang, original: '', translated: '' });
    }

    const model = this.model;
    if (!model) {
      return fail(new ToolError('upstream', 'Translation model is not configured.'));
    }

    return attempt('Translation model', async () => {
      const { sourceLang, translated } = await model.translate(trimmed, targetLang);
      return { sourceLang, targetLang, original: trimmed, translated };
    });
  }

  async sentiment(text: string): Promise<Result<SentimentResult>> {
    const trimmed = text.trim();
    if (!trimmed) {
      return ok({ label: 'NEUTRAL', score: 0, note: 'Empty text.', language: 'unknown' });
    }

    const language = guessLanguage(trimmed);
    const model = this.model;

    if (!model || !isMostlyEnglish(trimmed)) {
      return ok({
        label: 'UNKNOWN',
        score: 0,
        note: model
          ? 'Sentiment model is English-only. For non-English text, sentiment is not analyzed.'
          : 'Sentiment model is not configured.',
        language,
      });
    }

    return attempt('Sentiment model', async () => {
      const { label, score } = await model.classifySentiment(trimmed.slice(0, MAX_SENTIMENT_INPUT));
      return { label, score, note: 'English sentiment analyzed by AI model.', language };
    });
  }
}
