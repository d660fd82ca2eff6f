import { LRUCache } from 'lru-cache';
import { Joke, JokeSearchBackend, SearchHit } from '../types';
import { JokeCatalog, formatJoke } from './joke-catalog';

const STOPWORDS = new Set([
  'a', 'an', 'and', 'any', 'are', 'as', 'at', 'be', 'but', 'by', 'do', 'for',
  'from', 'give', 'have', 'i', 'in', 'is', 'it', 'me', 'my', 'of', 'on', 'or',
  'please', 'some', 'tell', 'that', 'the', 'there', 'to', 'was', 'what', 'with',
  'you', 'your'
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(token => token.length > 1 && !STOPWORDS.has(token))
    .map(token => (token.length > 3 && token.endsWith('s') && !token.endsWith('ss')
      ? token.slice(0, -1)
      : token));
}

function termCounts(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of tokenize(text)) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}

interface IndexedJoke {
  key: string;
  joke: Joke;
  text: string;
  terms: Map<string, number>;
}

export interface JokeIndexOptions {
  cacheSize?: number;
  cacheTtlMs?: number;
}

/**
 * In-memory similarity index over the joke collection.
 *
 * Each joke (category plus text) becomes a TF-IDF term vector; a query is
 * vectorized the same way and ranked by cosine similarity. Only jokes sharing
 * at least one term with the query are returned.
 */
export class JokeIndex implements JokeSearchBackend {
  private readonly documents = new Map<string, IndexedJoke>();
  private readonly postings = new Map<string, Set<string>>();
  private readonly cache: LRUCache<string, SearchHit[]>;

  constructor(options: JokeIndexOptions = {}) {
    this.cache = new LRUCache<string, SearchHit[]>({
      max: options.cacheSize ?? 500,
      ttl: options.cacheTtlMs ?? 1000 * 60 * 10
    });
  }

  /**
   * Index the catalog if nothing has been indexed yet. Returns how many jokes
   * were added.
   */
  initialize(catalog: JokeCatalog): number {
    if (this.documents.size > 0) {
      return 0;
    }

    catalog.all().forEach((joke, i) => this.upsert(`joke_${i}`, joke));
    return this.documents.size;
  }

  upsert(key: string, joke: Joke): void {
    const existing = this.documents.get(key);
    if (existing) {
      this.removePostings(existing);
    }

    const text = formatJoke(joke);
    const document: IndexedJoke = {
      key,
      joke,
      text,
      terms: termCounts(`${joke.category} ${text}`)
    };

    this.documents.set(key, document);
    for (const term of document.terms.keys()) {
      const keys = this.postings.get(term) ?? new Set<string>();
      keys.add(key);
      this.postings.set(term, keys);
    }

    this.cache.clear();
  }

  count(): number {
    return this.documents.size;
  }

  async search(query: string, limit: number): Promise<SearchHit[]> {
    const cacheKey = `${limit}:${query.toLowerCase().trim()}`;
    const cached = this.cache.get(cacheKey);
    if (cached) {
      return [...cached];
    }

    const hits = this.rank(query, limit);
    this.cache.set(cacheKey, hits);
    return [...hits];
  }

  private rank(query: string, limit: number): SearchHit[] {
    if (limit <= 0) {
      return [];
    }

    const queryWeights = new Map<string, number>();
    for (const [term, frequency] of termCounts(query)) {
      if (this.postings.has(term)) {
        queryWeights.set(term, frequency * this.idf(term));
      }
    }
    if (queryWeights.size === 0) {
      return [];
    }

    const queryNorm = Math.sqrt([...queryWeights.values()].reduce((sum, w) => sum + w * w, 0));
    const candidates = new Set<string>();
    for (const term of queryWeights.keys()) {
      for (const key of this.postings.get(term) ?? []) {
        candidates.add(key);
      }
    }

    const hits: SearchHit[] = [];
    // Walk documents in insertion order so equal scores keep catalog order
    for (const document of this.documents.values()) {
      if (!candidates.has(document.key)) {
        continue;
      }

      let dot = 0;
      let docNormSquared = 0;
      for (const [term, frequency] of document.terms) {
        const weight = frequency * this.idf(term);
        docNormSquared += weight * weight;
        dot += weight * (queryWeights.get(term) ?? 0);
      }

      const score = dot / (queryNorm * Math.sqrt(docNormSquared));
      hits.push({ joke: document.joke, text: document.text, score });
    }

    hits.sort((a, b) => b.score - a.score);
    return hits.slice(0, limit);
  }

  private idf(term: string): number {
    const docFrequency = this.postings.get(term)?.size ?? 0;
    return Math.log((1 + this.documents.size) / (1 + docFrequency)) + 1;
  }

  private removePostings(document: IndexedJoke): void {
    for (const term of document.terms.keys()) {
      const keys = this.postings.get(term);
      if (!keys) {
        continue;
      }
      keys.delete(document.key);
      if (keys.size === 0) {
        this.postings.delete(term);
      }
    }
  }
}
