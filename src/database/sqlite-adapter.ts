import Database from 'better-sqlite3';
import { AnalyticsEvent, EventStore, StoreConfig } from '../types';
import { StoreWriteError, errorMessage } from '../errors';
import { encodeEvent, parseRecord } from './event-codec';

interface EventRow {
  id: number;
  payload: string;
}

interface InsertParams {
  event_type: string;
  timestamp: string;
  query_id: number | null;
  payload: string;
}

interface PreparedStatements {
  insertEvent: Database.Statement<[InsertParams], unknown>;
  selectAll: Database.Statement<[], EventRow>;
  deleteAll: Database.Statement<[], unknown>;
}

function queryIdOf(event: AnalyticsEvent): number | null {
  return event.event_type === 'failure' ? null : event.query_id;
}

export class SqliteAdapter implements EventStore {
  private db?: Database.Database;
  private statements?: PreparedStatements;
  private config: Omit<StoreConfig, 'type'>;

  constructor(config: Partial<Omit<StoreConfig, 'type'>> = {}) {
    this.config = {
      path: config.path || ':memory:',
      walMode: config.walMode !== undefined ? config.walMode : true,
      busyTimeout: config.busyTimeout || 5000
    };
  }

  async init(): Promise<void> {
    try {
      const db = new Database(this.config.path);

      if (this.config.walMode && this.config.path !== ':memory:') {
        db.pragma('journal_mode = WAL');
      }
      db.pragma(`busy_timeout = ${this.config.busyTimeout}`);

      db.exec(`
        CREATE TABLE IF NOT EXISTS events (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          event_type TEXT NOT NULL,
          timestamp TEXT NOT NULL,
          query_id INTEGER,
          payload TEXT NOT NULL
        )
      `);
      db.exec('CREATE INDEX IF NOT EXISTS idx_events_type ON events(event_type)');
      db.exec('CREATE INDEX IF NOT EXISTS idx_events_query_id ON events(query_id)');

      this.statements = {
        insertEvent: db.prepare<[InsertParams], unknown>(`
          INSERT INTO events (event_type, timestamp, query_id, payload)
          VALUES (@event_type, @timestamp, @query_id, @payload)
        `),
        selectAll: db.prepare<[], EventRow>('SELECT id, payload FROM events ORDER BY id ASC'),
        deleteAll: db.prepare<[], unknown>('DELETE FROM events')
      };
      this.db = db;
    } catch (error) {
      throw new Error(`Failed to initialize database: ${errorMessage(error)}`);
    }
  }

  async append(event: AnalyticsEvent): Promise<void> {
    const statements = this.requireStatements();
    try {
      statements.insertEvent.run({
        event_type: event.event_type,
        timestamp: event.timestamp,
        query_id: queryIdOf(event),
        payload: encodeEvent(event)
      });
    } catch (error) {
      throw new StoreWriteError(`Failed to save event: ${errorMessage(error)}`);
    }
  }

  async readAll(): Promise<AnalyticsEvent[]> {
    const rows = this.requireStatements().selectAll.all();
    return rows.map(row => parseRecord(row.payload, `events row ${row.id}`));
  }

  async clear(): Promise<void> {
    const statements = this.requireStatements();
    try {
      statements.deleteAll.run();
    } catch (error) {
      throw new StoreWriteError(`Failed to clear events: ${errorMessage(error)}`);
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = undefined;
      this.statements = undefined;
    }
  }

  private requireStatements(): PreparedStatements {
    if (!this.statements) {
      throw new Error('Database not initialized; call init() first');
    }
    return this.statements;
  }
}
