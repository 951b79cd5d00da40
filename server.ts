import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import cors from 'cors';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { DEFAULT_MAX_UPLOAD_BYTES, loadConfig } from './config';
import type { AppConfig } from './config';
import { ToolError, unwrap } from './errors';
import { REPORT_FORMATS } from './types';
import type { ApiError, JobAnalysis, Joke, ReportFormat } from './types';
import Logger from './utils/logger';
import { createTextModel } from './services/genai';
import { JobAnalyzer, loadVocabulary, requireScrapedText } from './services/jobAnalyzer';
import { EMPTY_JOKE, JokeClient } from './services/jokes';
import type { JokeSource } from './services/jokes';
import { NlpService } from './services/nlp';
import { ReportWriter, scrapeTable } from './services/reports';
import type { ReportContent } from './services/reports';
import { RequestJournal } from './services/requestLog';
import { BrowserScraper } from './services/scraper';
import type { PageScraper } from './services/scraper';
import { extractText } from './services/textExtractor';
import { cleanText, getTextStats, summarizeInput } from './services/textTools';

const SERVICE_NAME = 'Server';

export interface AppOptions {
  maxUploadBytes: number;
}

export interface Toolkit {
  scraper: PageScraper;
  nlp: NlpService;
  jokes: JokeSource;
  reports: ReportWriter;
  journal: RequestJournal;
  analyzer: JobAnalyzer;
}

// --- Setup ---

export function createToolkit(config: AppConfig): Toolkit {
  const nlp = new NlpService(createTextModel(config.genai));
  const vocabulary = loadVocabulary(config.vocabularyPath);

  return {
    scraper: new BrowserScraper(config.scraper),
    nlp,
    jokes: new JokeClient(config.jokeApiUrl),
    reports: new ReportWriter(config.reportsDir),
    journal: RequestJournal.inDirectory(config.logsDir),
    analyzer: new JobAnalyzer(vocabulary, nlp, config.fitPolicy),
  };
}

// --- Request schemas ---

const LanguageCode = z
  .string()
  .trim()
  .regex(/^[a-z]{2,3}(-[A-Za-z]{2,4})?$/, 'Expected a language code such as "en" or "fa".');

const HttpUrl = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'URL must use http or https.');

const TextBody = z.object({ text: z.string() });

const TranslateBody = z.object({
  text: z.string(),
  target_lang: LanguageCode.default('en'),
});

const AiReportBody = z.object({
  text: z.string(),
  translate_to: LanguageCode.nullish(),
});

const UrlBody = z.object({ url: HttpUrl });

const AnalyzeJobBody = z
  .object({
    text: z.string().optional(),
    url: HttpUrl.optional(),
    translate_to: LanguageCode.optional(),
    report: z.enum(REPORT_FORMATS).optional(),
  })
  .refine((body) => (body.text === undefined) !== (body.url === undefined), {
    message: 'Provide either text or url.',
  });

const AnalyzeJobFileQuery = z.object({
  translate_to: LanguageCode.optional(),
});

// --- Helpers ---

function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ToolError('invalid_input', message);
  }
  return result.data;
}

function requireLength(text: string, min: number, message: string): void {
  if (text.trim().length < min) {
    throw new ToolError('invalid_input', message);
  }
}

function requireFile(req: Request): Express.Multer.File {
  if (!req.file) throw new ToolError('invalid_input', 'No file uploaded.');
  return req.file;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function fieldOf(source: unknown, key: string): string | undefined {
  if (!isRecord(source)) return undefined;
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

type Describe = (req: Request) => string;

const describeBody =
  (...keys: string[]): Describe =>
  (req) => {
    const body: unknown = req.body;
    for (const key of keys) {
      const value = fieldOf(body, key);
      if (value !== undefined) return summarizeInput(value);
    }
    return '';
  };

const describeQuery =
  (key: string): Describe =>
  (req) =>
    summarizeInput(fieldOf(req.query, key) ?? '');

const describeFile: Describe = (req) =>
  req.file ? summarizeInput(`${req.file.originalname} (${req.file.size} bytes)`) : '(no file)';

const describeNothing: Describe = () => '';

// Failures raised before an endpoint runs (body parsing, multer).
const describeRejected: Describe = (req) =>
  req.is('multipart/form-data') ? describeFile(req) : describeBody('text', 'url')(req);

interface BodyParserError extends Error {
  status: number;
  type: string;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  if (!(error instanceof Error) || !isRecord(error)) return false;
  const { status, type } = error;
  return typeof status === 'number' && status >= 400 && status < 500 && typeof type === 'string';
}

function toFailure(error: unknown): { status: number; body: ApiError } {
  if (error instanceof ToolError) {
    if (error.kind !== 'invalid_input') {
      Logger.error(SERVICE_NAME, error.message, error.cause);
    }
    return { status: error.status, body: { error: error.message } };
  }
  if (error instanceof multer.MulterError) {
    return { status: 400, body: { error: error.message } };
  }
  if (isBodyParserError(error)) {
    const message = error.type === 'entity.parse.failed' ? 'Malformed JSON body.' : error.message;
    return { status: error.status, body: { error: message } };
  }
  Logger.error(SERVICE_NAME, 'Unhandled error', error);
  return { status: 500, body: { error: 'Internal server error.' } };
}

/**
 * Appends the outcome to the request logs, then responds.
 * A failed log append fails the request even when the handler succeeded.
 */
async function respond(
  journal: RequestJournal,
  describe: Describe,
  req: Request,
  res: Response,
  outcome: { status: number; body: object },
): Promise<void> {
  try {
    await journal.record({
      timestamp: new Date().toISOString(),
      endpoint: `${req.method} ${req.path}`,
      input: describe(req),
      status: outcome.status,
    });
  } catch (error) {
    const failure = toFailure(error);
    res.status(failure.status).json(failure.body);
    return;
  }

  res.status(outcome.status).json(outcome.body);
}

function route(journal: RequestJournal, describe: Describe, handler: (req: Request) => Promise<object>): RequestHandler {
  return async (req: Request, res: Response) => {
    let outcome: { status: number; body: object };

    try {
      outcome = { status: 200, body: await handler(req) };
    } catch (error) {
      outcome = toFailure(error);
    }

    await respond(journal, describe, req, res, outcome);
  };
}

async function jokeOrEmpty(jokes: JokeSource): Promise<Joke> {
  const result = await jokes.random();
  if (result.ok) return result.value;

  Logger.warn(SERVICE_NAME, 'Joke unavailable, continuing without one', { error: result.error.message });
  return EMPTY_JOKE;
}

function jobResponse(analysis: JobAnalysis) {
  const stats = getTextStats(analysis.text);
  return {
    characters: stats.characters,
    words: stats.words,
    summary: analysis.summary,
    summary_translated: analysis.summaryTranslated,
    skills: analysis.skills,
    languages: analysis.languages,
    tech_stack: analysis.technologies,
    job_fit_score: analysis.fitScore,
  };
}

type JobResponse = ReturnType<typeof jobResponse> & { url: string | null };

export function jobReportContent(format: ReportFormat, job: JobResponse): ReportContent {
  switch (format) {
    case 'json':
      return { format, data: job };
    case 'txt':
      return {
        format,
        fields: {
          URL: job.url ?? '-',
          Characters: job.characters,
          Words: job.words,
          Summary: job.summary,
          Skills: job.skills.join(', '),
          Languages: job.languages.join(', '),
          'Tech stack': job.tech_stack.join(', '),
          'Job fit score': job.job_fit_score,
        },
      };
    case 'csv':
      return {
        format,
        columns: ['url', 'characters', 'words', 'summary', 'skills', 'languages', 'tech_stack', 'job_fit_score'],
        rows: [
          [
            job.url ?? '',
            job.characters,
            job.words,
            job.summary,
            job.skills.join(', '),
            job.languages.join(', '),
            job.tech_stack.join(', '),
            job.job_fit_score,
          ],
        ],
      };
  }
}

// --- App ---

export function createApp(
  tools: Toolkit,
  options: AppOptions = { maxUploadBytes: DEFAULT_MAX_UPLOAD_BYTES },
): express.Express {
  const app = express();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: options.maxUploadBytes } });
  const handle = (describe: Describe, handler: (req: Request) => Promise<object>) =>
    route(tools.journal, describe, handler);

  app.use(cors());
  app.use(express.json({ limit: '2mb' }));

  // --- Endpoints ---

  app.get(
    '/',
    handle(describeNothing, async () => ({ message: 'Automation API is running!' })),
  );

  app.get(
    '/process',
    handle(describeQuery('text'), async (req) => {
      const { text } = parseInput(TextBody, req.query);
      const cleaned = cleanText(text);
      const stats = getTextStats(cleaned);
      const joke = await jokeOrEmpty(tools.jokes);

      return { cleaned, ...stats, joke_setup: joke.setup, joke_punchline: joke.punchline };
    }),
  );

  app.post(
    '/process_text',
    handle(describeBody('text'), async (req) => {
      const { text } = parseInput(TextBody, req.body);
      requireLength(text, 3, 'Text is too short.');

      const cleaned = cleanText(text);
      const stats = getTextStats(cleaned);
      const joke = await jokeOrEmpty(tools.jokes);
      const reports = await tools.reports.writeTextReports({ cleaned, ...stats, joke });

      return {
        cleaned,
        ...stats,
        joke_setup: joke.setup,
        joke_punchline: joke.punchline,
        report_txt: reports.txt,
        report_json: reports.json,
        report_csv: reports.csv,
      };
    }),
  );

  app.post(
    '/analyze_only',
    handle(describeBody('text'), async (req) => {
      const { text } = parseInput(TextBody, req.body);
      const cleaned = cleanText(text);
      return { cleaned, ...getTextStats(cleaned) };
    }),
  );

  const processUpload = async (req: Request) => {
    const file = requireFile(req);
    const cleaned = cleanText(await extractText(file));
    const stats = getTextStats(cleaned);
    const joke = await jokeOrEmpty(tools.jokes);
    const reports = await tools.reports.writeTextReports({ cleaned, ...stats, joke });

    return {
      filename: file.originalname,
      cleaned,
      ...stats,
      report_txt: reports.txt,
      report_json: reports.json,
      report_csv: reports.csv,
    };
  };

  app.post('/upload_file', upload.single('file'), handle(describeFile, processUpload));

  app.post(
    '/upload_pdf',
    upload.single('file'),
    handle(describeFile, async (req) => {
      const file = requireFile(req);
      if (!file.originalname.toLowerCase().endsWith('.pdf')) {
        throw new ToolError('invalid_input', 'File must be a PDF.');
      }
      return processUpload(req);
    }),
  );

  app.post(
    '/summarize',
    handle(describeBody('text'), async (req) => {
      const { text } = parseInput(TextBody, req.body);
      requireLength(text, 10, 'Text too short.');

      const { summary, strategy } = unwrap(await tools.nlp.summarize(text));
      return { original: text, summary, strategy };
    }),
  );

  app.post(
    '/translate',
    handle(describeBody('text'), async (req) => {
      const body = parseInput(TranslateBody, req.body);
      const data = unwrap(await tools.nlp.translate(body.text, body.target_lang));

      return {
        source_lang: data.sourceLang,
        target_lang: data.targetLang,
        original: data.original,
        translated: data.translated,
      };
    }),
  );

  app.post(
    '/sentiment',
    handle(describeBody('text'), async (req) => {
      const { text } = parseInput(TextBody, req.body);
      return unwrap(await tools.nlp.sentiment(text));
    }),
  );

  app.post(
    '/ai_report',
    handle(describeBody('text'), async (req) => {
      const body = parseInput(AiReportBody, req.body);
      requireLength(body.text, 3, 'Text is too short.');

      const cleaned = cleanText(body.text);
      const stats = getTextStats(cleaned);
      const { summary } = unwrap(await tools.nlp.summarize(cleaned));
      const joke = await jokeOrEmpty(tools.jokes);

      let translated: string | null = null;
      if (body.translate_to) {
        translated = unwrap(await tools.nlp.translate(cleaned, body.translate_to)).translated;
      }

      const reports = await tools.reports.writeTextReports({ cleaned, ...stats, joke });

      return {
        cleaned,
        ...stats,
        summary,
        joke_setup: joke.setup,
        joke_punchline: joke.punchline,
        translated,
        reports,
      };
    }),
  );

  app.post(
    '/scrape',
    handle(describeBody('url'), async (req) => {
      const { url } = parseInput(UrlBody, req.body);
      return unwrap(await tools.scraper.scrape(url));
    }),
  );

  app.post(
    '/scrape_csv',
    handle(describeBody('url'), async (req) => {
      const { url } = parseInput(UrlBody, req.body);
      const result = unwrap(await tools.scraper.scrape(url));
      const report = await tools.reports.write(scrapeTable(result));

      return {
        url,
        rows: result.lines.length,
        report: report.path,
        report_id: report.id,
        created_at: report.createdAt,
      };
    }),
  );

  app.post(
    '/analyze_job',
    handle(describeBody('url', 'text'), async (req) => {
      const body = parseInput(AnalyzeJobBody, req.body);

      let text = body.text ?? '';
      if (body.url) {
        text = requireScrapedText(unwrap(await tools.scraper.scrape(body.url)).lines.join('\n'));
      }

      const analysis = await tools.analyzer.analyze(text, { translateTo: body.translate_to });
      const job: JobResponse = { url: body.url ?? null, ...jobResponse(analysis) };

      if (!body.report) return job;
      const report = await tools.reports.write(jobReportContent(body.report, job));
      return { ...job, report: report.path };
    }),
  );

  app.post(
    '/analyze_job_file',
    upload.single('file'),
    handle(describeFile, async (req) => {
      const file = requireFile(req);
      const { translate_to } = parseInput(AnalyzeJobFileQuery, req.query);
      const analysis = await tools.analyzer.analyze(await extractText(file), { translateTo: translate_to });

      return { filename: file.originalname, ...jobResponse(analysis) };
    }),
  );

  app.use(async (error: unknown, req: Request, res: Response, _next: NextFunction) => {
    await respond(tools.journal, describeRejected, req, res, toFailure(error));
  });

  return app;
}

// --- Start ---

const isEntryPoint = process.argv[1] !== undefined && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isEntryPoint) {
  const config = loadConfig();
  const app = createApp(createToolkit(config), { maxUploadBytes: config.maxUploadBytes });

  app.listen(config.port, () => {
    Logger.info(SERVICE_NAME, `Server running on http://localhost:${config.port}`);
  });
}
