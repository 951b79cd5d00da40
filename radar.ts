import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import fetch from 'node-fetch';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { describeError } from './errors';
import Logger from './utils/logger';

const SERVICE_NAME = 'JobRadar';
const REQUEST_TIMEOUT_MS = 30000;

const RadarResultSchema = z.object({
  url: z.string().nullable().default(null),
  characters: z.number().default(0),
  words: z.number().default(0),
  summary: z.string().default(''),
  skills: z.array(z.string()).default([]),
  languages: z.array(z.string()).default([]),
  tech_stack: z.array(z.string()).default([]),
  job_fit_score: z.number().default(0),
});

export type RadarResult = z.infer<typeof RadarResultSchema>;

export const RADAR_COLUMNS = [
  'url',
  'characters',
  'words',
  'summary',
  'skills',
  'languages',
  'tech_stack',
  'job_fit_score',
];

/**
 * One URL per line; blank lines are ignored. A missing file yields no URLs.
 */
export function loadJobUrls(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    Logger.warn(SERVICE_NAME, `'${filePath}' not found. Create it and add job URLs (one per line).`);
    return [];
  }

  return fs
    .readFileSync(filePath, 'utf-8')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function toRadarRows(results: RadarResult[]): Array<Array<string | number>> {
  return results.map((item) => [
    item.url ?? '',
    item.characters,
    item.words,
    item.summary,
    item.skills.join(', '),
    item.languages.join(', '),
    item.tech_stack.join(', '),
    item.job_fit_score,
  ]);
}

export function radarCsv(results: RadarResult[]): string {
  return stringify([RADAR_COLUMNS, ...toRadarRows(results)]);
}

export async function analyzeJobUrl(apiBase: string, jobUrl: string): Promise<RadarResult | null> {
  try {
    const res = await fetch(`${apiBase.replace(/\/+$/, '')}/analyze_job`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ url: jobUrl }),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!res.ok) {
      throw new Error(`HTTP ${res.status}: ${await res.text()}`);
    }
    return RadarResultSchema.parse(await res.json());
  } catch (error) {
    Logger.error(SERVICE_NAME, `Failed to analyze job URL '${jobUrl}'`, { error: describeError(error) });
    return null;
  }
}

function preview(result: RadarResult): string {
  const list = (items: string[]) => (items.length ? items.join(', ') : '-');
  return [
    `Summary: ${result.summary.slice(0, 200)}...`,
    `Skills: ${list(result.skills)}`,
    `Languages: ${list(result.languages)}`,
    `Tech stack: ${list(result.tech_stack)}`,
    `Job fit score: ${result.job_fit_score}`,
  ].join('\n');
}

export async function runRadar(options: { urls: string; api: string; out: string }): Promise<RadarResult[]> {
  const jobUrls = loadJobUrls(options.urls);
  if (jobUrls.length === 0) {
    Logger.info(SERVICE_NAME, `No job URLs loaded. Add URLs to '${options.urls}'.`);
    return [];
  }

  const results: RadarResult[] = [];
  for (const url of jobUrls) {
    Logger.info(SERVICE_NAME, `Analyzing job posting: ${url}`);
    const result = await analyzeJobUrl(options.api, url);
    if (result === null) continue;

    Logger.info(SERVICE_NAME, preview(result));
    results.push(result);
  }

  if (results.length === 0) {
    Logger.info(SERVICE_NAME, 'No results to save.');
    return results;
  }

  fs.writeFileSync(options.out, radarCsv(results), 'utf-8');
  Logger.info(SERVICE_NAME, `Saved ${results.length} job(s) to '${options.out}'`);
  return results;
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .usage('Usage: $0 [options]')
    .options({
      urls: {
        type: 'string',
        describe: 'File with one job posting URL per line',
        default: 'job_urls.txt',
      },
      api: {
        type: 'string',
        describe: 'Base URL of the automation API',
        default: 'http://127.0.0.1:3000',
      },
      out: {
        type: 'string',
        describe: 'CSV file to write the results to',
        default: 'job_results.csv',
      },
    })
    .example('$0 --urls jobs.txt', 'Analyze every URL in jobs.txt')
    .example('$0 --api http://localhost:8080 --out radar.csv', 'Use another API host and output file')
    .help()
    .alias('h', 'help')
    .parse();

  await runRadar({ urls: argv.urls, api: argv.api, out: argv.out });
}

if (process.argv[1] !== undefined && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    Logger.error(SERVICE_NAME, 'Job radar failed', error);
    process.exitCode = 1;
  });
}
