/**
 * Endpoint Validator
 *
 * Checks reachability of every playlist and guide URL with bounded
 * retries, appends each attempt to the URL's status history, overwrites
 * its last status, and suggests mirrors for URLs that end the pass dead.
 */

import {
  ERROR_KINDS,
  type DeadLinks,
  type EndpointDocument,
  type ErrorKind,
  type LastStatus,
  type StatusRecord,
  type ValidationSummary,
} from '@/types';
import type { HttpClient } from '@/lib/http';
import { NetworkError } from '@/lib/errors';
import { adviseMirror, type MirrorTable } from '@/lib/mirror';
import { mapWithConcurrency, systemClock, uniqueInOrder, type Clock } from '@/lib/concurrency';
import { runWithRetry, type RetryPolicy } from '@/lib/retry';
import { createLogger, type Logger } from '@/lib/logger';

export interface ValidatorOptions {
  retry: RetryPolicy;
  concurrency: number;
  mirrors: MirrorTable;
}

export interface ValidatorDeps {
  http: Pick<HttpClient, 'checkLiveness'>;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Outcome of validating a single URL in one pass
 */
export interface UrlValidation {
  url: string;
  alive: boolean;
  /** Records produced this pass, in attempt order */
  records: StatusRecord[];
  lastStatus: LastStatus;
  /** Error kinds seen this pass; empty when the URL ended alive */
  errorCounts: Partial<Record<ErrorKind, number>>;
}

export interface ValidationResult {
  document: EndpointDocument;
  deadLinks: DeadLinks;
  summary: ValidationSummary;
}

/**
 * Derive the last status of a URL from its most recent record
 */
export function toLastStatus(record: StatusRecord): LastStatus {
  if (record.outcome === 'response') {
    return {
      alive: record.ok,
      lastChecked: record.timestamp,
      responseTimeMs: record.responseTimeMs,
    };
  }

  return {
    alive: false,
    lastChecked: record.timestamp,
    errorKind: record.errorKind,
    errorMessage: record.errorMessage,
  };
}

/**
 * Dead-link snapshot: every last status with alive === false
 */
export function collectDeadLinks(lastStatus: Record<string, LastStatus>): DeadLinks {
  const deadLinks: DeadLinks = {};
  for (const [url, status] of Object.entries(lastStatus)) {
    if (!status.alive) {
      deadLinks[url] = status;
    }
  }
  return deadLinks;
}

/**
 * Validate one URL. Never rejects: network failures become records.
 */
export async function validateUrl(
  url: string,
  retry: RetryPolicy,
  deps: ValidatorDeps
): Promise<UrlValidation> {
  const clock = deps.clock ?? systemClock;
  const log = deps.logger ?? createLogger('EndpointValidator');
  const records: StatusRecord[] = [];

  const final = await runWithRetry<StatusRecord>(retry, clock, async (attemptIndex) => {
    const timestamp = clock.now().toISOString();

    try {
      const response = await deps.http.checkLiveness(url);
      const record: StatusRecord = {
        outcome: 'response',
        timestamp,
        statusCode: response.statusCode,
        ok: response.ok,
        responseTimeMs: response.responseTimeMs,
      };
      records.push(record);
      log.info(`[URL] ${url} - Status: ${response.statusCode}, Time: ${response.responseTimeMs}ms`, {
        attempt: attemptIndex + 1,
      });
      return { ok: response.ok, value: record };
    } catch (error) {
      const failure = new NetworkError(url, error);
      const record: StatusRecord = {
        outcome: 'error',
        timestamp,
        errorKind: failure.kind,
        errorMessage: failure.message,
      };
      records.push(record);
      log.warn(`[ERROR] ${url} - ${failure.kind}: ${failure.message}`, {
        attempt: attemptIndex + 1,
      });
      return { ok: false, value: record };
    }
  });

  const alive = final.kind === 'success';
  const lastRecord = final.kind === 'success' ? final.value : final.last;

  const errorCounts: Partial<Record<ErrorKind, number>> = {};
  if (!alive) {
    for (const record of records) {
      if (record.outcome === 'error') {
        errorCounts[record.errorKind] = (errorCounts[record.errorKind] ?? 0) + 1;
      }
    }
  }

  return {
    url,
    alive,
    records,
    lastStatus: toLastStatus(lastRecord),
    errorCounts,
  };
}

/**
 * Validate every URL of an endpoint document.
 *
 * The input document is not modified; the returned document carries the
 * appended history, overwritten last statuses and any new mirror
 * suggestions.
 */
export async function validateEndpoints(
  document: EndpointDocument,
  options: ValidatorOptions,
  deps: ValidatorDeps
): Promise<ValidationResult> {
  const log = deps.logger ?? createLogger('EndpointValidator');
  const urls = uniqueInOrder([...document.playlistUrls, ...document.epgUrls]);

  log.info(
    `[VALIDATION] Validating ${urls.length} URLs ` +
      `(${document.playlistUrls.length} playlists, ${document.epgUrls.length} guides)`
  );

  // Each task owns its URL's records; results are merged once all finish
  const validations = await mapWithConcurrency(urls, options.concurrency, (url) =>
    validateUrl(url, options.retry, { ...deps, logger: log })
  );

  const statusHistory: Record<string, StatusRecord[]> = {};
  for (const [url, history] of Object.entries(document.statusHistory)) {
    statusHistory[url] = [...history];
  }
  const lastStatus: Record<string, LastStatus> = { ...document.lastStatus };
  const mirrorSuggestions: Record<string, string> = { ...document.mirrorSuggestions };
  const summary: ValidationSummary = { checked: 0, alive: 0, dead: 0, errors: {} };

  for (const validation of validations) {
    statusHistory[validation.url] = [...(statusHistory[validation.url] ?? []), ...validation.records];
    lastStatus[validation.url] = validation.lastStatus;

    summary.checked++;
    if (validation.alive) {
      summary.alive++;
      continue;
    }

    summary.dead++;
    for (const kind of ERROR_KINDS) {
      const count = validation.errorCounts[kind];
      if (count) {
        summary.errors[kind] = (summary.errors[kind] ?? 0) + count;
      }
    }

    const suggested = adviseMirror(validation.url, options.mirrors, mirrorSuggestions);
    if (suggested) {
      log.warn(`[MIRROR] Original failed: ${validation.url} → Suggested: ${suggested}`);
    }
  }

  log.info(
    `[SUMMARY] Checked: ${summary.checked}, Alive: ${summary.alive}, Dead: ${summary.dead}`,
    { errors: summary.errors }
  );

  return {
    document: {
      playlistUrls: [...document.playlistUrls],
      epgUrls: [...document.epgUrls],
      statusHistory,
      lastStatus,
      mirrorSuggestions,
    },
    deadLinks: collectDeadLinks(lastStatus),
    summary,
  };
}
