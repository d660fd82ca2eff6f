import { EventStore, StoreConfig } from '../types';
import { JsonArrayEventStore } from './json-array-store';
import { JsonlEventStore } from './jsonl-store';
import { SqliteAdapter } from './sqlite-adapter';

export function createEventStore(config: StoreConfig): EventStore {
  switch (config.type) {
    case 'json':
      return new JsonArrayEventStore(config.path);
    case 'jsonl':
      return new JsonlEventStore(config.path);
    case 'sqlite':
      return new SqliteAdapter({
        path: config.path,
        walMode: config.walMode,
        busyTimeout: config.busyTimeout
      });
  }
}

export { JsonArrayEventStore, JsonlEventStore, SqliteAdapter };
export { decodeEvent, encodeEvent, parseRecord } from './event-codec';
