import fs from 'fs/promises';
import path from 'path';
import { describeError, ToolError } from '../errors';
import type { LogEntry } from '../types';

export const LINE_LOG_FILE = 'requests.log';
export const JSONL_LOG_FILE = 'requests.jsonl';

export interface LogSink {
  append(entry: LogEntry): Promise<void>;
}

async function appendLine(filePath: string, line: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.appendFile(filePath, line, 'utf-8');
  } catch (error) {
    throw new ToolError('storage', `Failed to append request log: ${describeError(error)}`, { cause: error });
  }
}

export function formatLogLine(entry: LogEntry): string {
  return `[${entry.timestamp}] ${entry.endpoint} ${entry.status} | INPUT: ${entry.input}\n`;
}

export class LineLogSink implements LogSink {
  constructor(readonly filePath: string) {}

  append(entry: LogEntry): Promise<void> {
    return appendLine(this.filePath, formatLogLine(entry));
  }
}

export class JsonLinesLogSink implements LogSink {
  constructor(readonly filePath: string) {}

  append(entry: LogEntry): Promise<void> {
    return appendLine(this.filePath, `${JSON.stringify(entry)}\n`);
  }
}

export class RequestJournal {
  constructor(private readonly sinks: LogSink[]) {}

  static inDirectory(dir: string): RequestJournal {
    return new RequestJournal([
      new LineLogSink(path.join(dir, LINE_LOG_FILE)),
      new JsonLinesLogSink(path.join(dir, JSONL_LOG_FILE)),
    ]);
  }

  async record(entry: LogEntry): Promise<void> {
    await Promise.all(this.sinks.map((sink) => sink.append(entry)));
  }
}
