import { Logger } from 'pino';
import { Joke, JokeFlags } from '../types';
import { readOptionalFile } from '../utils/fs';

type RawJoke = Record<string, unknown>;

function isRecord(value: unknown): value is RawJoke {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFlags(value: unknown): JokeFlags | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const flags: JokeFlags = {};
  for (const [key, flag] of Object.entries(value)) {
    if (typeof flag === 'boolean') {
      flags[key] = flag;
    }
  }
  return flags;
}

/**
 * Narrow one dataset entry to a Joke, or null when it has neither a usable
 * single-line joke nor a setup/delivery pair.
 */
export function toJoke(raw: unknown, fallbackId: number): Joke | null {
  if (!isRecord(raw)) {
    return null;
  }

  const flags = readFlags(raw.flags);
  const base = {
    id: typeof raw.id === 'number' ? raw.id : fallbackId,
    category: typeof raw.category === 'string' ? raw.category : 'Unknown',
    ...(flags !== undefined && { flags }),
    ...(typeof raw.safe === 'boolean' && { safe: raw.safe }),
    ...(typeof raw.lang === 'string' && { lang: raw.lang }),
    ...(typeof raw.fetched_at === 'string' && { fetched_at: raw.fetched_at })
  };

  if (raw.type === 'single' && typeof raw.joke === 'string') {
    return { ...base, type: 'single', joke: raw.joke };
  }

  if (raw.type === 'twopart' && typeof raw.setup === 'string' && typeof raw.delivery === 'string') {
    return { ...base, type: 'twopart', setup: raw.setup, delivery: raw.delivery };
  }

  return null;
}

export function formatJoke(joke: Joke): string {
  return joke.type === 'single' ? joke.joke : `${joke.setup} ${joke.delivery}`;
}

/**
 * Load the joke dataset. A missing file is an empty collection.
 */
export async function loadJokes(path: string, logger?: Logger): Promise<Joke[]> {
  const text = await readOptionalFile(path);
  if (text === null) {
    logger?.warn({ path }, 'Joke dataset not found');
    return [];
  }

  const raw: unknown = JSON.parse(text);
  if (!Array.isArray(raw)) {
    throw new Error(`Joke dataset must be a JSON array: ${path}`);
  }

  const jokes: Joke[] = [];
  raw.forEach((entry, index) => {
    const joke = toJoke(entry, index);
    if (joke) {
      jokes.push(joke);
    } else {
      logger?.warn({ path, index }, 'Skipping malformed joke entry');
    }
  });

  return jokes;
}

export class JokeCatalog {
  private readonly jokes: Joke[];

  constructor(jokes: Joke[], private readonly rng: () => number = Math.random) {
    this.jokes = [...jokes];
  }

  all(): Joke[] {
    return [...this.jokes];
  }

  count(): number {
    return this.jokes.length;
  }

  random(): Joke | undefined {
    if (this.jokes.length === 0) {
      return undefined;
    }
    return this.jokes[Math.floor(this.rng() * this.jokes.length)];
  }

  /**
   * Jokes whose category or text contains the topic, case-insensitively.
   */
  matchingTopic(topic: string): Joke[] {
    const needle = topic.toLowerCase();
    return this.jokes.filter(joke =>
      joke.category.toLowerCase().includes(needle) ||
      formatJoke(joke).toLowerCase().includes(needle)
    );
  }
}
