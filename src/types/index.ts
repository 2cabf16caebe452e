/**
 * Core type definitions for the playlist / guide pipeline
 */

// Error kinds produced by the network error classifier
export type ErrorKind = 'Timeout' | 'DNSFailure' | 'ConnectionError' | 'UnknownError';

export const ERROR_KINDS: readonly ErrorKind[] = [
  'Timeout',
  'DNSFailure',
  'ConnectionError',
  'UnknownError',
];

// Endpoint Types

/**
 * Ordered playlist and guide URLs to process
 */
export interface EndpointSet {
  playlistUrls: string[];
  epgUrls: string[];
}

/**
 * One liveness check outcome for a URL
 */
export type StatusRecord =
  | {
      outcome: 'response';
      timestamp: string;
      statusCode: number;
      /** True for 2xx-3xx responses */
      ok: boolean;
      responseTimeMs: number;
    }
  | {
      outcome: 'error';
      timestamp: string;
      errorKind: ErrorKind;
      errorMessage: string;
    };

/**
 * Latest derived status for a URL, overwritten every validation pass
 */
export type LastStatus =
  | {
      alive: boolean;
      lastChecked: string;
      responseTimeMs: number;
    }
  | {
      alive: false;
      lastChecked: string;
      errorKind: ErrorKind;
      errorMessage: string;
    };

/**
 * Endpoint set enriched with validation state
 */
export interface EndpointDocument extends EndpointSet {
  /** URL -> every status record ever produced, oldest first */
  statusHistory: Record<string, StatusRecord[]>;
  /** URL -> latest status */
  lastStatus: Record<string, LastStatus>;
  /** Failed URL -> suggested mirror URL */
  mirrorSuggestions: Record<string, string>;
}

export type DeadLinks = Record<string, LastStatus>;

export interface ValidationSummary {
  checked: number;
  alive: number;
  dead: number;
  /** Error kind -> occurrences, for URLs that never succeeded */
  errors: Partial<Record<ErrorKind, number>>;
}

// Channel Types

export const UNKNOWN_CHANNEL_LANGUAGE = 'Unknown';
export const UNKNOWN_GUIDE_LANGUAGE = 'unknown';

/**
 * A channel parsed from an M3U playlist
 */
export interface ChannelRecord {
  /** tvg-id, may be empty */
  id: string;
  /** tvg-name, may be empty */
  displayName: string;
  logoUrl: string;
  group: string;
  language: string;
  streamUrl: string;
  /** Playlist URL the channel was extracted from */
  sourceUrl: string;
  /** Display name of the guide entry matched in the last reconciliation pass */
  matchedGuideId?: string;
}

// Guide Types

/**
 * A channel entry parsed from an XMLTV guide
 */
export interface GuideEntry {
  id: string;
  displayName: string;
  sourceGuideUrl: string;
  language: string;
}

/**
 * Guide entries grouped by source URL, in source order
 */
export type GuideGroups = Map<string, GuideEntry[]>;
