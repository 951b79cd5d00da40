import type { TextStats } from '../types';

// C0 controls and DEL, except tab/newline/carriage return which fold into whitespace below.
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export function cleanText(text: string): string {
  return text.replace(CONTROL_CHARS, ' ').replace(/\s+/g, ' ').trim();
}

export function getTextStats(text: string): TextStats {
  const trimmed = text.trim();
  if (!trimmed) return { characters: 0, words: 0 };

  return {
    characters: trimmed.length,
    words: trimmed.split(/\s+/).length,
  };
}

/**
 * Collapses a value into a single line of at most `max` characters, for log records.
 */
export function summarizeInput(text: string, max = 120): string {
  const line = text.replace(/\s+/g, ' ').trim();
  return line.length > max ? `${line.slice(0, max - 3)}...` : line;
}
