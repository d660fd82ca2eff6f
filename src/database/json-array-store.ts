import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { AnalyticsEvent, EventStore } from '../types';
import { StoreCorruptError, StoreWriteError, errorMessage } from '../errors';
import { readOptionalFile } from '../utils/fs';
import { decodeEvent } from './event-codec';

/**
 * Single JSON array document, rewritten in full on every append.
 *
 * Appends issued by this process are chained so that one read-modify-write
 * finishes before the next starts. Several processes sharing the file can
 * still lose updates (last writer wins).
 */
export class JsonArrayEventStore implements EventStore {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly path: string) {}

  async init(): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      const existing = await readOptionalFile(this.path);
      if (existing === null) {
        await writeFile(this.path, '[]', 'utf-8');
      }
    } catch (error) {
      throw new StoreWriteError(`Failed to initialize analytics file: ${errorMessage(error)}`);
    }
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  append(event: AnalyticsEvent): Promise<void> {
    const write = this.writeChain.then(async () => {
      const events = await this.readAll();
      events.push(event);
      await this.writeAll(events);
    });
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  async readAll(): Promise<AnalyticsEvent[]> {
    const text = await readOptionalFile(this.path);
    if (text === null || text.trim() === '') {
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new StoreCorruptError(`Invalid JSON: ${errorMessage(error)}`, this.path);
    }

    if (!Array.isArray(raw)) {
      throw new StoreCorruptError('Analytics document is not an array', this.path);
    }

    return raw.map((record, index) => decodeEvent(record, `${this.path}[${index}]`));
  }

  clear(): Promise<void> {
    const write = this.writeChain.then(() => this.writeAll([]));
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  private async writeAll(events: AnalyticsEvent[]): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, JSON.stringify(events, null, 2), 'utf-8');
    } catch (error) {
      throw new StoreWriteError(`Failed to write analytics file: ${errorMessage(error)}`);
    }
  }
}
