import { SqliteAdapter } from '../../src/database/sqlite-adapter';
import { failureEvent, feedbackEvent, queryEvent } from '../fixtures/events';

describe('SqliteAdapter', () => {
  let adapter: SqliteAdapter;

  beforeEach(async () => {
    adapter = new SqliteAdapter({ path: ':memory:' });
    await adapter.init();
  });

  afterEach(async () => {
    await adapter.close();
  });

  it('should return events in insertion order', async () => {
    const events = [
      queryEvent({ timestamp: '2024-05-01T12:00:00.000Z' }),
      failureEvent({ timestamp: '2024-05-01T09:00:00.000Z' }),
      feedbackEvent({ query_id: null })
    ];
    for (const event of events) {
      await adapter.append(event);
    }

    expect(await adapter.readAll()).toEqual(events);
  });

  it('should start empty', async () => {
    expect(await adapter.readAll()).toEqual([]);
  });

  it('should delete every event on clear', async () => {
    await adapter.append(queryEvent());
    await adapter.append(feedbackEvent());
    await adapter.clear();

    expect(await adapter.readAll()).toEqual([]);
  });

  it('should require init before use', async () => {
    const uninitialized = new SqliteAdapter();

    await expect(uninitialized.readAll()).rejects.toThrow('Database not initialized; call init() first');
  });

  it('should allow close to be called twice', async () => {
    await adapter.close();
    await expect(adapter.close()).resolves.toBeUndefined();
  });
});
