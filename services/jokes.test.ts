import { beforeEach, describe, expect, it, vi } from 'vitest';

const { fetchMock } = vi.hoisted(() => ({ fetchMock: vi.fn() }));

vi.mock('node-fetch', () => ({ default: fetchMock }));

import { JokeClient } from './jokes';

const JOKE_URL = 'https://jokes.test/random_joke';

describe('JokeClient', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it('returns the setup and punchline', async () => {
    fetchMock.mockResolvedValue({
      ok: true,
      status: 200,
      json: async () => ({ id: 7, type: 'general', setup: 'Why?', punchline: 'Because.' }),
    });

    const result = await new JokeClient(JOKE_URL).random();

    expect(result).toEqual({ ok: true, value: { setup: 'Why?', punchline: 'Because.' } });
    expect(fetchMock).toHaveBeenCalledWith(JOKE_URL, expect.objectContaining({ signal: expect.anything() }));
  });

  it('defaults missing fields to empty strings', async () => {
    fetchMock.mockResolvedValue({ ok: true, status: 200, json: async () => ({}) });

    const result = await new JokeClient(JOKE_URL).random();

    expect(result).toEqual({ ok: true, value: { setup: '', punchline: '' } });
  });

  it('fails on a non-2xx response', async () => {
    fetchMock.mockResolvedValue({ ok: false, status: 503, json: async () => ({}) });

    const result = await new JokeClient(JOKE_URL).random();

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Joke API failed: HTTP 503');
  });

  it('fails on a network error', async () => {
    fetchMock.mockRejectedValue(new Error('getaddrinfo ENOTFOUND jokes.test'));

    const result = await new JokeClient(JOKE_URL).random();

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('upstream');
  });
});
