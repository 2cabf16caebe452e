/**
 * Pipeline Errors
 *
 * Error taxonomy shared by every pipeline stage, and the classifier that
 * maps low-level network failures to a closed set of error kinds.
 */

import type { ErrorKind } from '@/types';

/**
 * Base class for pipeline errors
 */
export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

/**
 * An input store is missing or corrupt. Aborts the operation that needed it.
 */
export class LoadError extends PipelineError {
  readonly resource: string;

  constructor(resource: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to load ${resource}: ${reason}`, options);
    this.name = 'LoadError';
    this.resource = resource;
  }
}

/**
 * Persisting an output failed. The in-memory result is still valid.
 */
export class SaveError extends PipelineError {
  readonly resource: string;

  constructor(resource: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to save ${resource}: ${reason}`, options);
    this.name = 'SaveError';
    this.resource = resource;
  }
}

/**
 * A single source document could not be parsed
 */
export class ParseError extends PipelineError {
  readonly source: string;

  constructor(source: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to parse ${source}: ${reason}`, options);
    this.name = 'ParseError';
    this.source = source;
  }
}

/**
 * A network operation failed, with its classified kind
 */
export class NetworkError extends PipelineError {
  readonly url: string;
  readonly kind: ErrorKind;

  constructor(url: string, cause: unknown) {
    super(errorMessage(cause), { cause });
    this.name = 'NetworkError';
    this.url = url;
    this.kind = classifyNetworkError(cause);
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Textual description of a failure: name, message and code of the error
 * and of every error in its cause chain.
 */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);

    if (current instanceof Error) {
      parts.push(current.name, current.message);
      if ('code' in current && typeof current.code === 'string') {
        parts.push(current.code);
      }
      current = current.cause;
    } else {
      parts.push(String(current));
      current = undefined;
    }
  }

  return parts.join(' ');
}

/**
 * Substrings checked in priority order; first hit wins
 */
const ERROR_KIND_PATTERNS: ReadonlyArray<readonly [ErrorKind, readonly string[]]> = [
  ['Timeout', ['timeout', 'timed out']],
  ['DNSFailure', ['dns', 'name resolution', 'getaddrinfo', 'enotfound', 'eai_again']],
  ['ConnectionError', ['connection', 'econnrefused', 'econnreset', 'socket hang up']],
];

/**
 * Classify a network failure. Total over all inputs.
 */
export function classifyNetworkError(error: unknown): ErrorKind {
  let description: string;
  try {
    description = describeError(error).toLowerCase();
  } catch {
    return 'UnknownError';
  }

  for (const [kind, needles] of ERROR_KIND_PATTERNS) {
    if (needles.some((needle) => description.includes(needle))) {
      return kind;
    }
  }

  return 'UnknownError';
}
