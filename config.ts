import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import type { FitPolicy } from './types';

dotenv.config();

export const ROOT_DIR = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_FIT_POLICY: FitPolicy = { base: 40, perTerm: 7, cap: 95 };
export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

export interface AppConfig {
  port: number;
  reportsDir: string;
  logsDir: string;
  vocabularyPath: string;
  genai: {
    apiKey: string | null;
    model: string;
  };
  scraper: {
    executablePath: string | null;
    timeoutMs: number;
  };
  jokeApiUrl: string;
  maxUploadBytes: number;
  fitPolicy: FitPolicy;
}

type Env = Record<string, string | undefined>;

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readString(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

// A policy must give at least one point to a single matched term.
function readFitPolicy(env: Env): FitPolicy {
  const policy: FitPolicy = {
    base: readInt(env.FIT_BASE, DEFAULT_FIT_POLICY.base),
    perTerm: readInt(env.FIT_PER_TERM, DEFAULT_FIT_POLICY.perTerm),
    cap: readInt(env.FIT_CAP, DEFAULT_FIT_POLICY.cap),
  };
  return policy.cap >= 1 && policy.base + policy.perTerm >= 1 ? policy : DEFAULT_FIT_POLICY;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: readInt(env.PORT, 3000),
    reportsDir: path.resolve(env.REPORTS_DIR ?? 'reports'),
    logsDir: path.resolve(env.LOGS_DIR ?? 'logs'),
    vocabularyPath: env.VOCABULARY_PATH
      ? path.resolve(env.VOCABULARY_PATH)
      : path.join(ROOT_DIR, 'data', 'vocabulary.json'),
    genai: {
      apiKey: readString(env.GEMINI_API_KEY),
      model: readString(env.GENAI_MODEL) ?? 'gemini-2.5-flash',
    },
    scraper: {
      executablePath: readString(env.CHROME_EXECUTABLE_PATH),
      timeoutMs: readInt(env.SCRAPE_TIMEOUT_MS, 60000),
    },
    jokeApiUrl: readString(env.JOKE_API_URL) ?? 'https://official-joke-api.appspot.com/random_joke',
    maxUploadBytes: readInt(env.MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES),
    fitPolicy: readFitPolicy(env),
  };
}
