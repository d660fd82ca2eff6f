export type JokeFlags = Record<string, boolean>;

interface JokeBase {
  id: number;
  category: string;
  flags?: JokeFlags;
  safe?: boolean;
  lang?: string;
  fetched_at?: string;
}

export interface SingleJoke extends JokeBase {
  type: 'single';
  joke: string;
}

export interface TwoPartJoke extends JokeBase {
  type: 'twopart';
  setup: string;
  delivery: string;
}

export type Joke = SingleJoke | TwoPartJoke;

export interface SearchHit {
  joke: Joke;
  text: string;
  score: number;
}

export interface JokeSearchBackend {
  search(query: string, limit: number): Promise<SearchHit[]>;
}

export interface AskResult {
  response: string;
  jokes: Joke[];
  query_id: number;
}
