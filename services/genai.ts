import { GoogleGenAI, Type } from '@google/genai';
import type { GenerateContentParameters } from '@google/genai';
import { z } from 'zod';
import type { AppConfig } from '../config';
import Logger from '../utils/logger';

const SERVICE_NAME = 'GenAI';

export interface ContentGenerator {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

export interface ModelTranslation {
  sourceLang: string;
  translated: string;
}

export interface ModelSentiment {
  label: 'POSITIVE' | 'NEGATIVE';
  score: number;
}

/**
 * The hosted model operations the NLP layer relies on.
 */
export interface TextModel {
  summarize(text: string): Promise<string>;
  translate(text: string, targetLang: string): Promise<ModelTranslation>;
  classifySentiment(text: string): Promise<ModelSentiment>;
}

const TranslationSchema = z.object({
  sourceLang: z.string().min(1),
  translated: z.string(),
});

const SentimentSchema = z.object({
  label: z.enum(['POSITIVE', 'NEGATIVE']),
  score: z.number().min(0).max(1),
});

const createSummaryPrompt = (text: string) => `
  Summarize the following text in two to four sentences.
  Keep the original language of the text. Return only the summary.

  TEXT:
  ${text}
`;

const createTranslationPrompt = (text: string, targetLang: string) => `
  Detect the language of the following text and translate it into the language
  with ISO 639-1 code "${targetLang}". Keep names, numbers and formatting intact.

  Return JSON:
  {
    "sourceLang": string (ISO 639-1 code of the detected language),
    "translated": string
  }

  TEXT:
  ${text}
`;

const createSentimentPrompt = (text: string) => `
  Classify the sentiment of the following English text as POSITIVE or NEGATIVE.

  Return JSON:
  {
    "label": "POSITIVE" | "NEGATIVE",
    "score": number (confidence between 0 and 1)
  }

  TEXT:
  ${text}
`;

export class GeminiTextModel implements TextModel {
  constructor(
    private readonly models: ContentGenerator,
    private readonly model: string,
  ) {}

  private async generateText(contents: string): Promise<string> {
    const response = await this.models.generateContent({ model: this.model, contents });
    const text = response.text?.trim();
    if (!text) throw new Error('Model returned an empty response.');
    return text;
  }

  private async generateJson(contents: string, config: GenerateContentParameters['config']): Promise<unknown> {
    const response = await this.models.generateContent({
      model: this.model,
      contents,
      config: { responseMimeType: 'application/json', ...config },
    });
    return JSON.parse(response.text ?? '');
  }

  async summarize(text: string): Promise<string> {
    return this.generateText(createSummaryPrompt(text));
  }

  async translate(text: string, targetLang: string): Promise<ModelTranslation> {
    const raw = await this.generateJson(createTranslationPrompt(text, targetLang), {
      responseSchema: {
        type: Type.OBJECT,
        properties: {
          sourceLang: { type: Type.STRING },
          translated: { type: Type.STRING },
        },
        required: ['sourceLang', 'translated'],
      },
    });
    return TranslationSchema.parse(raw);
  }

  async classifySentiment(text: string): Promise<ModelSentiment> {
    const raw = await this.generateJson(createSentimentPrompt(text), {
      responseSchema: {
        type: Type.OBJECT,
        properties: {
          label: { type: Type.STRING, enum: ['POSITIVE', 'NEGATIVE'] },
          score: { type: Type.NUMBER },
        },
        required: ['label', 'score'],
      },
    });
    return SentimentSchema.parse(raw);
  }
}

export function createTextModel(config: AppConfig['genai']): TextModel | null {
  if (!config.apiKey) {
    Logger.warn(SERVICE_NAME, 'GEMINI_API_KEY is not set; summaries fall back to extractive mode and translation is unavailable');
    return null;
  }

  const ai = new GoogleGenAI({ apiKey: config.apiKey });
  Logger.info(SERVICE_NAME, `Using model ${config.model}`);
  return new GeminiTextModel(ai.models, config.model);
}
