import {
  AnalyticsEvent,
  FailureEvent,
  FailureSource,
  FeedbackEvent,
  QueryEvent,
  ResponseType
} from '../types';
import { StoreCorruptError } from '../errors';

/**
 * Decoding of persisted analytics records.
 *
 * Records written by this service carry `schema_version`. Records from the
 * earlier flat log have none; they are accepted with `schema_version: 0` and
 * their event types are mapped onto the current union:
 *
 * - `llm_failure`      -> failure, source `llm`
 * - `chromadb_failure` -> failure, source `search_backend`
 * - query without `query_id` -> id derived from the record timestamp
 */

const RESPONSE_TYPES: readonly ResponseType[] = ['success', 'error', 'no_results', 'nsfw_blocked'];
const FAILURE_SOURCES: readonly FailureSource[] = ['llm', 'search_backend'];

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isResponseType(value: unknown): value is ResponseType {
  return RESPONSE_TYPES.some(type => type === value);
}

function isFailureSource(value: unknown): value is FailureSource {
  return FAILURE_SOURCES.some(source => source === value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function requireNumber(raw: RawRecord, key: string, location: string): number {
  const value = raw[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new StoreCorruptError(`Field "${key}" must be a number`, location);
  }
  return value;
}

function requireString(raw: RawRecord, key: string, location: string): string {
  const value = raw[key];
  if (typeof value !== 'string') {
    throw new StoreCorruptError(`Field "${key}" must be a string`, location);
  }
  return value;
}

function legacyQueryId(timestamp: string): number {
  const millis = Date.parse(timestamp);
  return Number.isNaN(millis) ? 0 : millis;
}

function decodeQueryId(value: unknown): number | null {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return Number(value);
  }
  return null;
}

function decodeQuery(raw: RawRecord, envelope: Envelope, location: string): QueryEvent {
  if (!isResponseType(raw.response_type)) {
    throw new StoreCorruptError(`Unknown response_type "${String(raw.response_type)}"`, location);
  }

  const error = optionalString(raw.error);
  return {
    ...envelope,
    event_type: 'query',
    query_id: decodeQueryId(raw.query_id) ?? legacyQueryId(envelope.timestamp),
    user_message: requireString(raw, 'user_message', location),
    response_type: raw.response_type,
    jokes_count: requireNumber(raw, 'jokes_count', location),
    response_time_ms: requireNumber(raw, 'response_time_ms', location),
    ...(error !== undefined && { error })
  };
}

function decodeFeedback(raw: RawRecord, envelope: Envelope, location: string): FeedbackEvent {
  const comment = optionalString(raw.comment);
  return {
    ...envelope,
    event_type: 'feedback',
    query_id: decodeQueryId(raw.query_id),
    rating: requireNumber(raw, 'rating', location),
    ...(comment !== undefined && { comment })
  };
}

function decodeFailure(
  raw: RawRecord,
  envelope: Envelope,
  source: FailureSource,
  defaultErrorType: string,
  location: string
): FailureEvent {
  const fallbackUsed = optionalString(raw.fallback_used);
  return {
    ...envelope,
    event_type: 'failure',
    source,
    error_type: optionalString(raw.error_type) ?? defaultErrorType,
    error_message: requireString(raw, 'error_message', location),
    ...(fallbackUsed !== undefined && { fallback_used: fallbackUsed })
  };
}

interface Envelope {
  schema_version: number;
  timestamp: string;
}

export function decodeEvent(raw: unknown, location: string): AnalyticsEvent {
  if (!isRecord(raw)) {
    throw new StoreCorruptError('Record is not an object', location);
  }

  const envelope: Envelope = {
    schema_version: typeof raw.schema_version === 'number' ? raw.schema_version : 0,
    timestamp: requireString(raw, 'timestamp', location)
  };

  switch (raw.event_type) {
    case 'query':
      return decodeQuery(raw, envelope, location);
    case 'feedback':
      return decodeFeedback(raw, envelope, location);
    case 'failure':
      if (!isFailureSource(raw.source)) {
        throw new StoreCorruptError(`Unknown failure source "${String(raw.source)}"`, location);
      }
      return decodeFailure(raw, envelope, raw.source, 'unknown', location);
    case 'llm_failure':
      return decodeFailure(raw, envelope, 'llm', 'unknown', location);
    case 'chromadb_failure':
      return decodeFailure(raw, envelope, 'search_backend', 'search_error', location);
    default:
      throw new StoreCorruptError(`Unknown event_type "${String(raw.event_type)}"`, location);
  }
}

export function parseRecord(text: string, location: string): AnalyticsEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new StoreCorruptError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      location
    );
  }
  return decodeEvent(raw, location);
}

export function encodeEvent(event: AnalyticsEvent): string {
  return JSON.stringify(event);
}
