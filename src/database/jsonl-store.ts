import { appendFile, mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { AnalyticsEvent, EventStore } from '../types';
import { StoreWriteError, errorMessage } from '../errors';
import { readOptionalFile } from '../utils/fs';
import { encodeEvent, parseRecord } from './event-codec';

/**
 * Append-only log with one JSON record per line.
 */
export class JsonlEventStore implements EventStore {
  constructor(private readonly path: string) {}

  async init(): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
    } catch (error) {
      throw new StoreWriteError(`Failed to initialize analytics log: ${errorMessage(error)}`);
    }
  }

  async close(): Promise<void> {
    // Nothing held open between appends
  }

  async append(event: AnalyticsEvent): Promise<void> {
    try {
      await appendFile(this.path, `${encodeEvent(event)}\n`, 'utf-8');
    } catch (error) {
      throw new StoreWriteError(`Failed to append analytics event: ${errorMessage(error)}`);
    }
  }

  async readAll(): Promise<AnalyticsEvent[]> {
    const raw = await readOptionalFile(this.path);
    if (!raw) {
      return [];
    }

    const events: AnalyticsEvent[] = [];
    const lines = raw.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      if (!line.trim()) {
        continue;
      }
      events.push(parseRecord(line, `${this.path}:${i + 1}`));
    }

    return events;
  }

  async clear(): Promise<void> {
    try {
      await writeFile(this.path, '', 'utf-8');
    } catch (error) {
      throw new StoreWriteError(`Failed to clear analytics log: ${errorMessage(error)}`);
    }
  }
}
