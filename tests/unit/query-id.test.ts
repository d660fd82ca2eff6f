import { QueryIdGenerator } from '../../src/analytics/query-id';

describe('QueryIdGenerator', () => {
  it('should use the clock when it moves forward', () => {
    const times = [1000, 2000.7, 3000];
    const generator = new QueryIdGenerator(() => times.shift() ?? 0);

    expect([generator.next(), generator.next(), generator.next()]).toEqual([1000, 2000, 3000]);
  });

  it('should bump ids issued within the same millisecond', () => {
    const generator = new QueryIdGenerator(() => 5000);

    expect([generator.next(), generator.next(), generator.next()]).toEqual([5000, 5001, 5002]);
  });

  it('should never go backwards when the clock does', () => {
    const times = [5000, 4000];
    const generator = new QueryIdGenerator(() => times.shift() ?? 0);

    expect([generator.next(), generator.next()]).toEqual([5000, 5001]);
  });
});
