import fs from 'fs';
import { z } from 'zod';
import { DEFAULT_FIT_POLICY } from '../config';
import { ToolError, unwrap } from '../errors';
import type { FitPolicy, JobAnalysis, KeywordAnalysis, Vocabulary, VocabularyEntry } from '../types';
import Logger from '../utils/logger';
import type { NlpService } from './nlp';
import { cleanText } from './textTools';

const SERVICE_NAME = 'JobAnalyzer';

export const MIN_SCRAPED_TEXT_LENGTH = 50;

const EntrySchema = z.object({
  term: z.string().min(1),
  aliases: z.array(z.string().min(1)).optional(),
});

const VocabularySchema = z.object({
  skills: z.array(EntrySchema),
  technologies: z.array(EntrySchema),
  languages: z.array(EntrySchema),
});

function freezeEntries(entries: VocabularyEntry[]): readonly VocabularyEntry[] {
  return Object.freeze(
    entries.map((entry) =>
      Object.freeze({
        term: entry.term.toLowerCase(),
        aliases: entry.aliases?.map((alias) => alias.toLowerCase()),
      }),
    ),
  );
}

export function parseVocabulary(raw: unknown): Vocabulary {
  const parsed = VocabularySchema.parse(raw);
  return Object.freeze({
    skills: freezeEntries(parsed.skills),
    technologies: freezeEntries(parsed.technologies),
    languages: freezeEntries(parsed.languages),
  });
}

export function loadVocabulary(filePath: string): Vocabulary {
  const vocabulary = parseVocabulary(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  Logger.info(SERVICE_NAME, 'Vocabulary loaded', {
    skills: vocabulary.skills.length,
    technologies: vocabulary.technologies.length,
    languages: vocabulary.languages.length,
  });
  return vocabulary;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsTerm(haystack: string, needle: string): boolean {
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(needle)}(?![\\p{L}\\p{N}])`, 'u').test(haystack);
}

export function matchTerms(text: string, entries: readonly VocabularyEntry[]): string[] {
  const lower = text.toLowerCase();
  const found = new Set<string>();

  for (const entry of entries) {
    const variants = [entry.term, ...(entry.aliases ?? [])];
    if (variants.some((variant) => containsTerm(lower, variant))) {
      found.add(entry.term);
    }
  }

  return [...found].sort();
}

const clampScore = (value: number) => Math.min(100, Math.max(0, value));

/**
 * Bounded linear fit score over the distinct matched terms.
 * No matches always scores 0; otherwise `base + perTerm * n`, capped at `cap`.
 */
export function scoreFit(matched: Iterable<string>, policy: FitPolicy = DEFAULT_FIT_POLICY): number {
  const count = new Set(matched).size;
  if (count === 0) return 0;

  const cap = clampScore(policy.cap);
  return Math.round(clampScore(Math.min(cap, policy.base + policy.perTerm * count)));
}

export function analyzeJobText(
  text: string,
  vocabulary: Vocabulary,
  policy: FitPolicy = DEFAULT_FIT_POLICY,
): KeywordAnalysis {
  const skills = matchTerms(text, vocabulary.skills);
  const technologies = matchTerms(text, vocabulary.technologies);
  const languages = matchTerms(text, vocabulary.languages);

  return {
    skills,
    technologies,
    languages,
    fitScore: scoreFit([...skills, ...technologies, ...languages], policy),
  };
}

export function prepareJobText(text: string): string {
  const cleaned = cleanText(text);
  if (!cleaned) {
    throw new ToolError('invalid_input', 'Job posting text is empty.');
  }
  return cleaned;
}

/**
 * Guards text pulled from a posting page; too little usually means the page did not render.
 */
export function requireScrapedText(text: string): string {
  const cleaned = cleanText(text);
  if (cleaned.length < MIN_SCRAPED_TEXT_LENGTH) {
    throw new ToolError('invalid_input', 'Could not extract enough text from the posting.');
  }
  return cleaned;
}

export class JobAnalyzer {
  constructor(
    private readonly vocabulary: Vocabulary,
    private readonly nlp: NlpService,
    private readonly policy: FitPolicy = DEFAULT_FIT_POLICY,
  ) {}

  async analyze(rawText: string, options: { translateTo?: string } = {}): Promise<JobAnalysis> {
    const text = prepareJobText(rawText);
    const keywords = analyzeJobText(text, this.vocabulary, this.policy);

    const { summary } = unwrap(await this.nlp.summarize(text));

    let summaryTranslated: string | null = null;
    if (options.translateTo) {
      summaryTranslated = unwrap(await this.nlp.translate(summary, options.translateTo)).translated;
    }

    Logger.debug(SERVICE_NAME, 'Job posting analyzed', {
      skills: keywords.skills.length,
      technologies: keywords.technologies.length,
      fitScore: keywords.fitScore,
    });

    return { text, summary, summaryTranslated, ...keywords };
  }
}
