import {
  buildSelectionPrompt,
  buildTopicPrompt,
  extractTopicFallback,
  isCountingQuestion,
  isExistenceQuestion,
  isNsfwRequest,
  normalizeTopic,
  parseSelection,
  plural
} from '../../src/core/prompts';

describe('prompts', () => {
  it('should number candidate jokes from one', () => {
    const prompt = buildSelectionPrompt('something nerdy', ['first joke', 'second joke']);

    expect(prompt).toContain('User request: something nerdy');
    expect(prompt).toContain('Joke 1: first joke\n\nJoke 2: second joke');
  });

  it('should quote the question in the topic prompt', () => {
    expect(buildTopicPrompt('How many cat jokes?')).toContain('Analyze this question: "How many cat jokes?"');
  });
});

describe('parseSelection', () => {
  it('should convert picks to zero-based indices', () => {
    expect(parseSelection('1, 3', 5)).toEqual([0, 2]);
  });

  it('should drop out-of-range, repeated and non-numeric picks', () => {
    expect(parseSelection('2,2,9,x,0', 3)).toEqual([1]);
  });

  it('should recognise none in any case', () => {
    expect(parseSelection(' None ', 3)).toBe('none');
  });

  it('should return no picks for prose', () => {
    expect(parseSelection('I like joke number two', 3)).toEqual([]);
  });
});

describe('topics', () => {
  it('should normalise the model answer', () => {
    expect(normalizeTopic(' "Programming". ')).toBe('programming');
  });

  it('should fall back to the word after how many', () => {
    expect(extractTopicFallback('How many Christmas jokes do you know?')).toBe('christmas');
    expect(extractTopicFallback('count the jokes')).toBe('unknown');
  });
});

describe('request classification', () => {
  it('should flag NSFW keywords case-insensitively', () => {
    expect(isNsfwRequest('Tell me a DIRTY joke')).toBe(true);
    expect(isNsfwRequest('Tell me a clean joke')).toBe(false);
  });

  it('should detect counting questions', () => {
    expect(isCountingQuestion('How many cat jokes do you have?')).toBe(true);
    expect(isCountingQuestion('Can you count them')).toBe(true);
    expect(isCountingQuestion('A cat joke')).toBe(false);
  });

  it('should require a question mark for existence questions', () => {
    expect(isExistenceQuestion('Do you have jokes about dogs?')).toBe(true);
    expect(isExistenceQuestion('Are there any space jokes?')).toBe(true);
    expect(isExistenceQuestion('Do you have jokes about dogs')).toBe(false);
    expect(isExistenceQuestion('Why is the sky blue?')).toBe(false);
  });

  it('should pluralise counts', () => {
    expect(plural(1, 'joke')).toBe('1 joke');
    expect(plural(0, 'cat joke')).toBe('0 cat jokes');
  });
});
