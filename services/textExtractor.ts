import * as mammoth from 'mammoth';
import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import { ToolError } from '../errors';
import Logger from '../utils/logger';

const SERVICE_NAME = 'TextExtractor';

export interface UploadedFile {
  originalname: string;
  mimetype: string;
  buffer: Buffer;
}

export type UploadKind = 'pdf' | 'docx' | 'text';

export function detectUploadKind(file: Pick<UploadedFile, 'originalname' | 'mimetype'>): UploadKind {
  const name = file.originalname.toLowerCase();
  if (file.mimetype === 'application/pdf' || name.endsWith('.pdf')) return 'pdf';
  if (file.mimetype.includes('word') || file.mimetype.includes('officedocument') || name.endsWith('.docx')) {
    return 'docx';
  }
  return 'text';
}

export async function extractText(file: UploadedFile): Promise<string> {
  const kind = detectUploadKind(file);
  try {
    if (kind === 'pdf') {
      const data = await pdfParse(file.buffer);
      return data.text;
    }
    if (kind === 'docx') {
      const result = await mammoth.extractRawText({ buffer: file.buffer });
      return result.value;
    }
    return file.buffer.toString('utf-8');
  } catch (error) {
    Logger.error(SERVICE_NAME, 'Text extraction failed', { file: file.originalname, kind, error: String(error) });
    throw new ToolError('invalid_input', 'Failed to parse uploaded file.', { cause: error });
  }
}
