/**
 * Stored Record Codec
 *
 * Converts between in-memory records and the snake_case JSON documents
 * shared with external readers of the stores. Decoding validates shape
 * and throws RecordFormatError naming the offending path.
 */

import {
  ERROR_KINDS,
  type ChannelRecord,
  type DeadLinks,
  type EndpointDocument,
  type ErrorKind,
  type GuideEntry,
  type GuideGroups,
  type LastStatus,
  type StatusRecord,
} from '@/types';

export class RecordFormatError extends Error {
  constructor(path: string, expected: string) {
    super(`${path}: expected ${expected}`);
    this.name = 'RecordFormatError';
  }
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) throw new RecordFormatError(path, 'an object');
  return value;
}

function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) throw new RecordFormatError(path, 'an array');
  return value;
}

function readString(object: JsonObject, key: string, path: string): string {
  const value = object[key];
  if (typeof value !== 'string') throw new RecordFormatError(`${path}.${key}`, 'a string');
  return value;
}

function readNumber(object: JsonObject, key: string, path: string): number {
  const value = object[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new RecordFormatError(`${path}.${key}`, 'a number');
  }
  return value;
}

function readBoolean(object: JsonObject, key: string, path: string): boolean {
  const value = object[key];
  if (typeof value !== 'boolean') throw new RecordFormatError(`${path}.${key}`, 'a boolean');
  return value;
}

function readErrorKind(object: JsonObject, key: string, path: string): ErrorKind {
  const value = object[key];
  const kind = ERROR_KINDS.find((candidate) => candidate === value);
  if (!kind) throw new RecordFormatError(`${path}.${key}`, `one of ${ERROR_KINDS.join(', ')}`);
  return kind;
}

function readStringList(object: JsonObject, key: string, path: string): string[] {
  return expectArray(object[key], `${path}.${key}`).map((item, index) => {
    if (typeof item !== 'string') throw new RecordFormatError(`${path}.${key}[${index}]`, 'a string');
    return item;
  });
}

/**
 * Decode an optional URL-keyed map, missing means empty
 */
function readUrlMap<T>(
  object: JsonObject,
  key: string,
  path: string,
  decode: (value: unknown, path: string) => T
): Record<string, T> {
  const raw = object[key];
  if (raw === undefined) return {};

  const result: Record<string, T> = {};
  for (const [url, value] of Object.entries(expectObject(raw, `${path}.${key}`))) {
    result[url] = decode(value, `${path}.${key}[${JSON.stringify(url)}]`);
  }
  return result;
}

// Status records

export function encodeStatusRecord(record: StatusRecord): JsonObject {
  if (record.outcome === 'response') {
    return {
      timestamp: record.timestamp,
      status_code: record.statusCode,
      ok: record.ok,
      response_time_ms: record.responseTimeMs,
    };
  }
  return {
    timestamp: record.timestamp,
    error_type: record.errorKind,
    error_message: record.errorMessage,
  };
}

export function decodeStatusRecord(value: unknown, path: string): StatusRecord {
  const object = expectObject(value, path);
  const timestamp = readString(object, 'timestamp', path);

  if ('error_type' in object) {
    return {
      outcome: 'error',
      timestamp,
      errorKind: readErrorKind(object, 'error_type', path),
      errorMessage: readString(object, 'error_message', path),
    };
  }

  return {
    outcome: 'response',
    timestamp,
    statusCode: readNumber(object, 'status_code', path),
    ok: readBoolean(object, 'ok', path),
    responseTimeMs: readNumber(object, 'response_time_ms', path),
  };
}

export function encodeLastStatus(status: LastStatus): JsonObject {
  if ('errorKind' in status) {
    return {
      alive: status.alive,
      last_checked: status.lastChecked,
      error_type: status.errorKind,
      error_message: status.errorMessage,
    };
  }
  return {
    alive: status.alive,
    last_checked: status.lastChecked,
    response_time_ms: status.responseTimeMs,
  };
}

export function decodeLastStatus(value: unknown, path: string): LastStatus {
  const object = expectObject(value, path);
  const alive = readBoolean(object, 'alive', path);
  const lastChecked = readString(object, 'last_checked', path);

  if ('error_type' in object) {
    if (alive) throw new RecordFormatError(`${path}.alive`, 'false for a failed check');
    return {
      alive: false,
      lastChecked,
      errorKind: readErrorKind(object, 'error_type', path),
      errorMessage: readString(object, 'error_message', path),
    };
  }

  return { alive, lastChecked, responseTimeMs: readNumber(object, 'response_time_ms', path) };
}

// Endpoint documents

function mapValues<T, R>(record: Record<string, T>, encode: (value: T) => R): Record<string, R> {
  const result: Record<string, R> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = encode(value);
  }
  return result;
}

export function encodeEndpointDocument(document: EndpointDocument): JsonObject {
  return {
    playlist_urls: document.playlistUrls,
    epg_urls: document.epgUrls,
    status_history: mapValues(document.statusHistory, (history) => history.map(encodeStatusRecord)),
    last_status: mapValues(document.lastStatus, encodeLastStatus),
    mirror_suggestions: document.mirrorSuggestions,
  };
}

/**
 * Decode an endpoint document. A plain `{playlist_urls, epg_urls}` input
 * decodes with empty validation state.
 */
export function decodeEndpointDocument(value: unknown): EndpointDocument {
  const path = '$';
  const object = expectObject(value, path);

  return {
    playlistUrls: readStringList(object, 'playlist_urls', path),
    epgUrls: readStringList(object, 'epg_urls', path),
    statusHistory: readUrlMap(object, 'status_history', path, (history, historyPath) =>
      expectArray(history, historyPath).map((record, index) =>
        decodeStatusRecord(record, `${historyPath}[${index}]`)
      )
    ),
    lastStatus: readUrlMap(object, 'last_status', path, decodeLastStatus),
    mirrorSuggestions: readUrlMap(object, 'mirror_suggestions', path, (suggestion, suggestionPath) => {
      if (typeof suggestion !== 'string') throw new RecordFormatError(suggestionPath, 'a string');
      return suggestion;
    }),
  };
}

export function encodeDeadLinks(deadLinks: DeadLinks): JsonObject {
  return mapValues(deadLinks, encodeLastStatus);
}

// Channels

export function encodeChannel(channel: ChannelRecord): JsonObject {
  const stored: JsonObject = {
    id: channel.id,
    display_name: channel.displayName,
    logo_url: channel.logoUrl,
    group: channel.group,
    language: channel.language,
    stream_url: channel.streamUrl,
    source_url: channel.sourceUrl,
  };
  if (channel.matchedGuideId !== undefined) {
    stored.matched_guide_id = channel.matchedGuideId;
  }
  return stored;
}

export function decodeChannel(value: unknown, path: string): ChannelRecord {
  const object = expectObject(value, path);
  const channel: ChannelRecord = {
    id: readString(object, 'id', path),
    displayName: readString(object, 'display_name', path),
    logoUrl: readString(object, 'logo_url', path),
    group: readString(object, 'group', path),
    language: readString(object, 'language', path),
    streamUrl: readString(object, 'stream_url', path),
    sourceUrl: readString(object, 'source_url', path),
  };
  if (object.matched_guide_id !== undefined) {
    channel.matchedGuideId = readString(object, 'matched_guide_id', path);
  }
  return channel;
}

export function encodeChannels(channels: readonly ChannelRecord[]): JsonObject[] {
  return channels.map(encodeChannel);
}

export function decodeChannels(value: unknown): ChannelRecord[] {
  return expectArray(value, '$').map((item, index) => decodeChannel(item, `$[${index}]`));
}

// Guides

export function encodeGuideEntry(entry: GuideEntry): JsonObject {
  return {
    id: entry.id,
    display_name: entry.displayName,
    source_guide_url: entry.sourceGuideUrl,
    language: entry.language,
  };
}

export function decodeGuideEntry(value: unknown, path: string): GuideEntry {
  const object = expectObject(value, path);
  return {
    id: readString(object, 'id', path),
    displayName: readString(object, 'display_name', path),
    sourceGuideUrl: readString(object, 'source_guide_url', path),
    language: readString(object, 'language', path),
  };
}

export function encodeGuides(groups: GuideGroups): JsonObject {
  const stored: JsonObject = {};
  for (const [url, entries] of groups) {
    stored[url] = entries.map(encodeGuideEntry);
  }
  return stored;
}

export function decodeGuides(value: unknown): GuideGroups {
  const groups: GuideGroups = new Map();
  for (const [url, entries] of Object.entries(expectObject(value, '$'))) {
    const groupPath = `$[${JSON.stringify(url)}]`;
    groups.set(
      url,
      expectArray(entries, groupPath).map((entry, index) => decodeGuideEntry(entry, `${groupPath}[${index}]`))
    );
  }
  return groups;
}
