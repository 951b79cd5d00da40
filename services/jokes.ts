import fetch from 'node-fetch';
import { z } from 'zod';
import { attempt } from '../errors';
import type { Result } from '../errors';
import type { Joke } from '../types';

const JokeSchema = z.object({
  setup: z.string().default(''),
  punchline: z.string().default(''),
});

export const EMPTY_JOKE: Joke = { setup: '', punchline: '' };

export interface JokeSource {
  random(): Promise<Result<Joke>>;
}

export class JokeClient implements JokeSource {
  constructor(
    private readonly url: string,
    private readonly timeoutMs = 10000,
  ) {}

  async random(): Promise<Result<Joke>> {
    return attempt('Joke API', async () => {
      const res = await fetch(this.url, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!res.ok) {
        throw new Error(`HTTP ${res.status}`);
      }
      return JokeSchema.parse(await res.json());
    });
  }
}
