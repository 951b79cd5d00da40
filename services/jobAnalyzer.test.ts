import path from 'path';
import { describe, expect, it, vi } from 'vitest';
import { ROOT_DIR } from '../config';
import { ToolError } from '../errors';
import type { TextModel } from './genai';
import { analyzeJobText, JobAnalyzer, loadVocabulary, matchTerms, parseVocabulary, prepareJobText, requireScrapedText, scoreFit } from './jobAnalyzer';
import { NlpService } from './nlp';

const vocabulary = loadVocabulary(path.join(ROOT_DIR, 'data', 'vocabulary.json'));

const BACKEND_POSTING = 'We need a Python backend engineer with Docker and AWS experience';

describe('analyzeJobText', () => {
  it('finds skills and technologies in a backend posting', () => {
    expect(analyzeJobText(BACKEND_POSTING, vocabulary)).toEqual({
      skills: ['aws', 'docker', 'python'],
      technologies: ['aws', 'docker'],
      languages: [],
      fitScore: 61,
    });
  });

  it('returns empty sets and a zero score when nothing matches', () => {
    expect(analyzeJobText('Looking for a friendly barista who loves coffee and conversation.', vocabulary)).toEqual({
      skills: [],
      technologies: [],
      languages: [],
      fitScore: 0,
    });
  });

  it('matches every vocabulary term on its own and scores it above zero', () => {
    const categories = ['skills', 'technologies', 'languages'] as const;
    for (const category of categories) {
      for (const entry of vocabulary[category]) {
        const result = analyzeJobText(`Required: ${entry.term}.`, vocabulary);
        expect(result[category]).toContain(entry.term);
        expect(result.fitScore).toBeGreaterThan(0);
      }
    }
  });

  it('counts languages toward the score', () => {
    const result = analyzeJobText('Fluent English is a must for this role.', vocabulary);
    expect(result.languages).toEqual(['english']);
    expect(result.fitScore).toBe(47);
  });

  it('caps the score', () => {
    const result = analyzeJobText('python java javascript typescript react vue docker kubernetes sql linux', vocabulary);
    expect(result.skills).toHaveLength(10);
    expect(result.fitScore).toBe(95);
  });
});

describe('matchTerms', () => {
  it('does not match terms embedded in longer words', () => {
    expect(matchTerms('Strong JavaScript skills, rapid delivery', vocabulary.skills)).toEqual(['javascript']);
  });

  it('matches aliases under the canonical term', () => {
    const text = 'PostgreSQL and K8s, fluent in Farsi';
    expect(matchTerms(text, vocabulary.technologies)).toEqual(['kubernetes', 'postgres']);
    expect(matchTerms(text, vocabulary.languages)).toEqual(['persian']);
    expect(matchTerms(text, vocabulary.skills)).toEqual(['kubernetes']);
  });

  it('matches multi-word terms', () => {
    expect(matchTerms('Experience with machine learning and data analysis', vocabulary.skills)).toEqual([
      'data analysis',
      'machine learning',
    ]);
  });
});

describe('scoreFit', () => {
  it('scores distinct terms only', () => {
    expect(scoreFit(['docker', 'aws', 'docker'])).toBe(54);
  });

  it('is zero without matches regardless of policy', () => {
    expect(scoreFit([], { base: 50, perTerm: 10, cap: 90 })).toBe(0);
  });

  it('clamps the cap to 100', () => {
    expect(scoreFit(['a', 'b', 'c'], { base: 90, perTerm: 10, cap: 150 })).toBe(100);
  });
});

describe('parseVocabulary', () => {
  it('lower-cases and freezes the lists', () => {
    const parsed = parseVocabulary({
      skills: [{ term: 'Rust', aliases: ['RustLang'] }],
      technologies: [],
      languages: [],
    });
    expect(parsed.skills).toEqual([{ term: 'rust', aliases: ['rustlang'] }]);
    expect(Object.isFrozen(parsed.skills)).toBe(true);
    expect(Object.isFrozen(parsed.skills[0])).toBe(true);
  });

  it('rejects malformed vocabularies', () => {
    expect(() => parseVocabulary({ skills: [{ term: '' }], technologies: [] })).toThrow();
  });
});

describe('prepareJobText', () => {
  it('rejects blank postings', () => {
    expect(() => prepareJobText(' \n\t ')).toThrow(ToolError);
    expect(() => prepareJobText('')).toThrow('Job posting text is empty.');
  });

  it('keeps short postings', () => {
    expect(prepareJobText(' Python dev ')).toBe('Python dev');
  });

  it('collapses whitespace', () => {
    expect(prepareJobText(`  ${BACKEND_POSTING.replace(/ /g, '\n')}  `)).toBe(BACKEND_POSTING);
  });
});

describe('requireScrapedText', () => {
  it('rejects pages with too little text', () => {
    expect(() => requireScrapedText('Python dev\nApply now')).toThrow('Could not extract enough text from the posting.');
  });

  it('returns the cleaned page text', () => {
    expect(requireScrapedText(BACKEND_POSTING.replace(/ /g, '\n'))).toBe(BACKEND_POSTING);
  });
});

describe('JobAnalyzer', () => {
  it('scores a single-term posting', async () => {
    const analysis = await new JobAnalyzer(vocabulary, new NlpService(null)).analyze('Python');

    expect(analysis.skills).toEqual(['python']);
    expect(analysis.summary).toBe('Python');
    expect(analysis.fitScore).toBe(47);
  });

  it('uses the extractive summary when no model is configured', async () => {
    const analyzer = new JobAnalyzer(vocabulary, new NlpService(null));
    const analysis = await analyzer.analyze(BACKEND_POSTING);

    expect(analysis.text).toBe(BACKEND_POSTING);
    expect(analysis.summary).toBe(BACKEND_POSTING);
    expect(analysis.summaryTranslated).toBeNull();
    expect(analysis.fitScore).toBe(61);
  });

  it('summarizes with the model and translates the summary on request', async () => {
    const model: TextModel = {
      summarize: vi.fn(async () => 'Backend role with Python.'),
      translate: vi.fn(async () => ({ sourceLang: 'en', translated: 'نقش بک‌اند با پایتون.' })),
      classifySentiment: vi.fn(async () => ({ label: 'POSITIVE' as const, score: 0.9 })),
    };
    const analyzer = new JobAnalyzer(vocabulary, new NlpService(model));

    const analysis = await analyzer.analyze(BACKEND_POSTING, { translateTo: 'fa' });

    expect(analysis.summary).toBe('Backend role with Python.');
    expect(analysis.summaryTranslated).toBe('نقش بک‌اند با پایتون.');
    expect(model.translate).toHaveBeenCalledWith('Backend role with Python.', 'fa');
  });

  it('surfaces model failures as upstream errors', async () => {
    const model: TextModel = {
      summarize: vi.fn(async () => {
        throw new Error('quota exceeded');
      }),
      translate: vi.fn(async () => ({ sourceLang: 'en', translated: '' })),
      classifySentiment: vi.fn(async () => ({ label: 'NEGATIVE' as const, score: 0.1 })),
    };
    const analyzer = new JobAnalyzer(vocabulary, new NlpService(model));

    await expect(analyzer.analyze(BACKEND_POSTING)).rejects.toMatchObject({
      kind: 'upstream',
      message: 'Summarization model failed: quota exceeded',
    });
  });
});
