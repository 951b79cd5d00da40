export interface TextStats {
  characters: number;
  words: number;
}

export interface Joke {
  setup: string;
  punchline: string;
}

export interface ScrapeResult {
  url: string;
  lines: string[];
}

export interface VocabularyEntry {
  term: string;
  aliases?: string[];
}

export interface Vocabulary {
  skills: readonly VocabularyEntry[];
  technologies: readonly VocabularyEntry[];
  languages: readonly VocabularyEntry[];
}

export interface FitPolicy {
  base: number;
  perTerm: number;
  cap: number;
}

export interface KeywordAnalysis {
  skills: string[];
  technologies: string[];
  languages: string[];
  fitScore: number;
}

export interface JobAnalysis extends KeywordAnalysis {
  text: string;
  summary: string;
  summaryTranslated: string | null;
}

export type SummaryStrategy = 'passthrough' | 'model' | 'extractive';

export interface Summary {
  summary: string;
  strategy: SummaryStrategy;
}

export interface Translation {
  sourceLang: string | null;
  targetLang: string;
  original: string;
  translated: string;
}

export type SentimentLabel = 'POSITIVE' | 'NEGATIVE' | 'NEUTRAL' | 'UNKNOWN';
export type LanguageGuess = 'en' | 'fa' | 'unknown';

export interface SentimentResult {
  label: SentimentLabel;
  score: number;
  note: string;
  language: LanguageGuess;
}

export const REPORT_FORMATS = ['txt', 'json', 'csv'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface Report {
  id: string;
  createdAt: string;
  format: ReportFormat;
  path: string;
}

export interface LogEntry {
  timestamp: string;
  endpoint: string;
  input: string;
  status: number;
}

export interface ApiError {
  error: string;
}
