import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { Logger } from 'pino';
import { Joke } from '../types';
import { errorMessage } from '../errors';
import { loadJokes, toJoke } from './joke-catalog';

export const JOKE_API_URL = 'https://v2.jokeapi.dev/joke/Any';
export const BLACKLIST_FLAGS = 'nsfw,religious,political,racist,sexist,explicit';

export type FetchLike = (url: string) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

export interface CollectOptions {
  path: string;
  target: number;
  batchSize: number;
  maxBatches: number;
  fetchImpl?: FetchLike;
  now?: () => Date;
  logger: Logger;
}

export interface CollectSummary {
  batches: number;
  fetched: number;
  added: number;
  total: number;
}

function extractJokes(body: unknown): unknown[] {
  if (typeof body !== 'object' || body === null) {
    return [];
  }
  if ('jokes' in body && Array.isArray(body.jokes)) {
    return body.jokes;
  }
  return [body];
}

/**
 * Fetch one batch from JokeAPI. Network and HTTP errors yield an empty batch.
 */
export async function fetchJokeBatch(
  amount: number,
  fetchImpl: FetchLike = fetch,
  logger?: Logger
): Promise<Joke[]> {
  const url = `${JOKE_API_URL}?blacklistFlags=${BLACKLIST_FLAGS}&amount=${amount}`;

  try {
    const response = await fetchImpl(url);
    if (!response.ok) {
      logger?.warn({ status: response.status }, 'JokeAPI request failed');
      return [];
    }

    const jokes: Joke[] = [];
    for (const raw of extractJokes(await response.json())) {
      const joke = toJoke(raw, -1);
      if (joke && joke.id >= 0) {
        jokes.push(joke);
      }
    }
    return jokes;
  } catch (error) {
    logger?.warn({ error: errorMessage(error) }, 'Error fetching jokes');
    return [];
  }
}

/**
 * Append jokes whose id is not yet present, stamping when they were fetched.
 */
export function mergeJokes(existing: Joke[], incoming: Joke[], now: Date): { jokes: Joke[]; added: number } {
  const seen = new Set(existing.map(joke => joke.id));
  const jokes = [...existing];
  let added = 0;

  for (const joke of incoming) {
    if (seen.has(joke.id)) {
      continue;
    }
    seen.add(joke.id);
    jokes.push({ ...joke, fetched_at: now.toISOString() });
    added++;
  }

  return { jokes, added };
}

export async function saveJokes(path: string, jokes: Joke[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(jokes, null, 2), 'utf-8');
}

/**
 * Grow the dataset at `path` to exactly `target` unique jokes, or as close as
 * `maxBatches` requests get it.
 */
export async function collectJokes(options: CollectOptions): Promise<CollectSummary> {
  const now = options.now ?? (() => new Date());
  let jokes = await loadJokes(options.path, options.logger);
  const summary: CollectSummary = { batches: 0, fetched: 0, added: 0, total: jokes.length };

  options.logger.info({ existing: jokes.length, target: options.target }, 'Collecting jokes');

  while (jokes.length < options.target && summary.batches < options.maxBatches) {
    summary.batches++;
    const batch = await fetchJokeBatch(options.batchSize, options.fetchImpl, options.logger);
    summary.fetched += batch.length;

    const merged = mergeJokes(jokes, batch, now());
    jokes = merged.jokes;
    summary.added += merged.added;

    options.logger.info(
      { batch: summary.batches, fetched: batch.length, added: merged.added, total: jokes.length },
      'Fetched joke batch'
    );
  }

  if (jokes.length > options.target) {
    jokes = jokes.slice(0, options.target);
  }

  if (summary.added > 0 || jokes.length !== summary.total) {
    await saveJokes(options.path, jokes);
  }
  summary.total = jokes.length;
  return summary;
}
