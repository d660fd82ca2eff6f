import { writeFile } from 'fs/promises';
import { join } from 'path';
import { JokeCatalog, formatJoke, loadJokes, toJoke } from '../../src/core/joke-catalog';
import { sampleJokes } from '../fixtures/jokes';
import { makeTempDir, removeTempDir } from '../helpers/temp-dir';

describe('toJoke', () => {
  it('should accept single and two-part jokes', () => {
    expect(toJoke({ id: 7, category: 'Pun', type: 'single', joke: 'Puns are pun-ishing.' }, 0))
      .toEqual({ id: 7, category: 'Pun', type: 'single', joke: 'Puns are pun-ishing.' });
    expect(toJoke({ category: 'Misc', type: 'twopart', setup: 'Q?', delivery: 'A.', safe: true }, 3))
      .toEqual({ id: 3, category: 'Misc', type: 'twopart', setup: 'Q?', delivery: 'A.', safe: true });
  });

  it('should keep only boolean flags', () => {
    const joke = toJoke({ id: 1, type: 'single', joke: 'x', flags: { nsfw: false, odd: 'yes' } }, 0);

    expect(joke?.flags).toEqual({ nsfw: false });
    expect(joke?.category).toBe('Unknown');
  });

  it('should reject entries without usable text', () => {
    expect(toJoke({ type: 'twopart', setup: 'only a setup' }, 0)).toBeNull();
    expect(toJoke('just a string', 0)).toBeNull();
  });
});

describe('formatJoke', () => {
  it('should join setup and delivery with a space', () => {
    expect(formatJoke(sampleJokes[3])).toBe('What do snowmen eat for breakfast? Frosted flakes.');
    expect(formatJoke(sampleJokes[1])).toBe(
      'There are 10 kinds of people: those who understand binary and those who do not.'
    );
  });
});

describe('loadJokes', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should return an empty list for a missing file', async () => {
    expect(await loadJokes(join(dir, 'missing.json'))).toEqual([]);
  });

  it('should skip malformed entries', async () => {
    const path = join(dir, 'jokes.json');
    await writeFile(path, JSON.stringify([sampleJokes[0], { type: 'single' }, sampleJokes[1]]), 'utf-8');

    expect((await loadJokes(path)).map(joke => joke.id)).toEqual([1, 2]);
  });

  it('should reject a dataset that is not an array', async () => {
    const path = join(dir, 'jokes.json');
    await writeFile(path, '{"jokes": []}', 'utf-8');

    await expect(loadJokes(path)).rejects.toThrow(`Joke dataset must be a JSON array: ${path}`);
  });

  it('should load the bundled dataset', async () => {
    const jokes = await loadJokes(join(__dirname, '../../data/jokes.json'));

    expect(jokes).toHaveLength(30);
    expect(new Set(jokes.map(joke => joke.id)).size).toBe(30);
  });
});

describe('JokeCatalog', () => {
  const catalog = new JokeCatalog(sampleJokes, () => 0.5);

  it('should report its size and contents', () => {
    expect(catalog.count()).toBe(5);
    expect(catalog.all()).toEqual(sampleJokes);
  });

  it('should pick a random joke with the injected source', () => {
    expect(catalog.random()).toBe(sampleJokes[2]);
  });

  it('should return undefined from an empty catalog', () => {
    expect(new JokeCatalog([]).random()).toBeUndefined();
  });

  it('should scale the random source across the whole catalog', () => {
    expect(new JokeCatalog(sampleJokes, () => 0).random()).toBe(sampleJokes[0]);
    expect(new JokeCatalog(sampleJokes, () => 0.99).random()).toBe(sampleJokes[4]);
  });

  it('should match topics against category and text', () => {
    expect(catalog.matchingTopic('programming').map(joke => joke.id)).toEqual([1, 2]);
    expect(catalog.matchingTopic('MOUSE').map(joke => joke.id)).toEqual([3]);
    expect(catalog.matchingTopic('penguin')).toEqual([]);
  });
});
