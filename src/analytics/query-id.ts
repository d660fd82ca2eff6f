/**
 * Millisecond-clock query ids, bumped so that ids issued by one process never
 * repeat or go backwards. Ids from separate processes may still collide.
 */
export class QueryIdGenerator {
  private last = 0;

  constructor(private readonly now: () => number = Date.now) {}

  next(): number {
    const candidate = Math.floor(this.now());
    this.last = candidate > this.last ? candidate : this.last + 1;
    return this.last;
  }
}
