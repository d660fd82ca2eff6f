import { JokeCatalog } from '../../src/core/joke-catalog';
import { JokeIndex, tokenize } from '../../src/core/joke-index';
import { sampleJokes } from '../fixtures/jokes';

describe('tokenize', () => {
  it('should lowercase, drop stopwords and strip plural s', () => {
    expect(tokenize('Tell me some jokes about Cats, please!')).toEqual(['joke', 'about', 'cat']);
  });

  it('should drop the words that phrase an existence question', () => {
    expect(tokenize('Are there any penguin jokes?')).toEqual(['penguin', 'joke']);
  });

  it('should keep words ending in ss and short words', () => {
    expect(tokenize('Boss has bus')).toEqual(['boss', 'has', 'bus']);
  });
});

describe('JokeIndex', () => {
  let index: JokeIndex;

  beforeEach(() => {
    index = new JokeIndex();
    index.initialize(new JokeCatalog(sampleJokes));
  });

  it('should index the catalog once', () => {
    expect(index.count()).toBe(5);
    expect(index.initialize(new JokeCatalog(sampleJokes))).toBe(0);
    expect(index.count()).toBe(5);
  });

  it('should find jokes sharing a term with the query', async () => {
    const hits = await index.search('a cat joke', 5);

    expect(hits).toHaveLength(1);
    expect(hits[0].joke.id).toBe(3);
    expect(hits[0].text).toBe('Why did the cat sit on the computer? To keep an eye on the mouse.');
    expect(hits[0].score).toBeGreaterThan(0);
  });

  it('should match on category', async () => {
    const hits = await index.search('programming', 5);

    expect(hits.map(hit => hit.joke.id).sort()).toEqual([1, 2]);
  });

  it('should return nothing when no term overlaps', async () => {
    expect(await index.search('xylophone', 5)).toEqual([]);
  });

  it('should honour the limit', async () => {
    expect(await index.search('programming', 1)).toHaveLength(1);
    expect(await index.search('programming', 0)).toEqual([]);
  });

  it('should rank closer matches first', async () => {
    const hits = await index.search('frosted snowmen breakfast', 5);

    expect(hits[0].joke.id).toBe(4);
  });

  it('should see upserted jokes in later searches', async () => {
    expect(await index.search('penguin', 5)).toEqual([]);

    index.upsert('extra', {
      id: 99,
      category: 'Animals',
      type: 'single',
      joke: 'The penguin wore a tuxedo to every meeting.'
    });

    const hits = await index.search('penguin', 5);
    expect(hits.map(hit => hit.joke.id)).toEqual([99]);
  });

  it('should replace a document upserted under an existing key', async () => {
    index.upsert('joke_0', {
      id: 1,
      category: 'Programming',
      type: 'single',
      joke: 'Replaced text about compilers.'
    });

    expect(index.count()).toBe(5);
    expect(await index.search('dark mode', 5)).toEqual([]);
    expect((await index.search('compilers', 5)).map(hit => hit.joke.id)).toEqual([1]);
  });
});
