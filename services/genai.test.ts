import { describe, expect, it, vi } from 'vitest';
import { createTextModel, GeminiTextModel } from './genai';

function generatorReturning(text: string | undefined) {
  const generateContent = vi.fn();
  generateContent.mockResolvedValue({ text });
  return { generateContent };
}

describe('GeminiTextModel', () => {
  it('returns the trimmed summary text', async () => {
    const generator = generatorReturning('  A compact summary.  ');
    const model = new GeminiTextModel(generator, 'test-model');

    await expect(model.summarize('Some long text')).resolves.toBe('A compact summary.');
    expect(generator.generateContent).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'test-model', contents: expect.stringContaining('Some long text') }),
    );
  });

  it('rejects an empty summary', async () => {
    const model = new GeminiTextModel(generatorReturning(undefined), 'test-model');
    await expect(model.summarize('Some long text')).rejects.toThrow('Model returned an empty response.');
  });

  it('parses a structured translation', async () => {
    const generator = generatorReturning(JSON.stringify({ sourceLang: 'en', translated: 'Bonjour' }));
    const model = new GeminiTextModel(generator, 'test-model');

    await expect(model.translate('Hello', 'fr')).resolves.toEqual({ sourceLang: 'en', translated: 'Bonjour' });
    expect(generator.generateContent).toHaveBeenCalledWith(
      expect.objectContaining({
        config: expect.objectContaining({ responseMimeType: 'application/json' }),
      }),
    );
  });

  it('rejects a sentiment response outside the schema', async () => {
    const model = new GeminiTextModel(generatorReturning(JSON.stringify({ label: 'MIXED', score: 2 })), 'test-model');
    await expect(model.classifySentiment('Meh')).rejects.toThrow();
  });

  it('parses a sentiment response', async () => {
    const model = new GeminiTextModel(
      generatorReturning(JSON.stringify({ label: 'NEGATIVE', score: 0.75 })),
      'test-model',
    );
    await expect(model.classifySentiment('Terrible service')).resolves.toEqual({ label: 'NEGATIVE', score: 0.75 });
  });
});

describe('createTextModel', () => {
  it('returns null without an API key', () => {
    expect(createTextModel({ apiKey: null, model: 'test-model' })).toBeNull();
  });

  it('builds a hosted model when a key is present', () => {
    expect(createTextModel({ apiKey: 'test-secret', model: 'test-model' })).toBeInstanceOf(GeminiTextModel);
  });
});
