/**
 * HTTP Client
 *
 * Thin wrapper over undici for the three kinds of request the pipeline
 * makes: liveness checks, text downloads and streamed downloads.
 * Every request carries its own timeout.
 */

import { Readable } from 'node:stream';
import { Agent, fetch as undiciFetch, type Response as UndiciResponse } from 'undici';
import type { FetchConfig } from '@/lib/config';

/**
 * Result of a liveness check
 */
export interface LivenessResponse {
  statusCode: number;
  /** True for 2xx-3xx responses */
  ok: boolean;
  responseTimeMs: number;
}

/**
 * Streamed response body with its content type
 */
export interface StreamResponse {
  stream: Readable;
  contentType: string;
}

/**
 * Network operations used by the pipeline stages
 */
export interface HttpClient {
  /** HEAD request without following redirects */
  checkLiveness(url: string): Promise<LivenessResponse>;
  /** GET request resolving to the body text; non-2xx rejects */
  fetchText(url: string): Promise<string>;
  /** GET request resolving to the body as a Node stream; non-2xx rejects */
  fetchStream(url: string): Promise<StreamResponse>;
}

/**
 * HTTP agent that skips SSL validation (many IPTV providers have bad certs)
 */
const insecureAgent = new Agent({
  connect: {
    rejectUnauthorized: false,
    // Allow legacy TLS versions that some IPTV providers use
    minVersion: 'TLSv1' as const,
    checkServerIdentity: () => undefined,
  },
});

/**
 * Whether a status code counts as reachable
 */
export function isReachableStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 400;
}

/**
 * Request timer that aborts the request and reports a timeout error
 */
class RequestTimer {
  readonly controller = new AbortController();
  private timeoutId: NodeJS.Timeout;

  constructor(private readonly timeoutMs: number) {
    this.timeoutId = setTimeout(() => this.controller.abort(), timeoutMs);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  clear(): void {
    clearTimeout(this.timeoutId);
  }

  /**
   * Replace an abort caused by this timer with a timeout error
   */
  translate(error: unknown): unknown {
    if (this.controller.signal.aborted) {
      return new Error(`Request timeout after ${this.timeoutMs}ms`, { cause: error });
    }
    return error;
  }
}

/**
 * Create an HTTP client from fetch configuration
 */
export function createHttpClient(config: FetchConfig): HttpClient {
  const headers = (accept: string): Record<string, string> => ({
    'User-Agent': config.userAgent,
    Accept: accept,
  });

  async function get(url: string, accept: string, timer: RequestTimer): Promise<UndiciResponse> {
    const response = await undiciFetch(url, {
      method: 'GET',
      signal: timer.signal,
      headers: headers(accept),
      dispatcher: insecureAgent,
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    return response;
  }

  return {
    async checkLiveness(url: string): Promise<LivenessResponse> {
      const timer = new RequestTimer(config.livenessTimeoutMs);
      const startTime = Date.now();

      try {
        const response = await undiciFetch(url, {
          method: 'HEAD',
          redirect: 'manual',
          signal: timer.signal,
          headers: headers('*/*'),
          dispatcher: insecureAgent,
        });

        return {
          statusCode: response.status,
          ok: isReachableStatus(response.status),
          responseTimeMs: Date.now() - startTime,
        };
      } catch (error) {
        throw timer.translate(error);
      } finally {
        timer.clear();
      }
    },

    async fetchText(url: string): Promise<string> {
      const timer = new RequestTimer(config.fetchTimeoutMs);

      try {
        const response = await get(url, '*/*', timer);
        return await response.text();
      } catch (error) {
        throw timer.translate(error);
      } finally {
        timer.clear();
      }
    },

    async fetchStream(url: string): Promise<StreamResponse> {
      const timer = new RequestTimer(config.fetchTimeoutMs);

      try {
        const response = await get(url, 'application/xml, text/xml, application/gzip, */*', timer);

        if (!response.body) {
          throw new Error('No response body');
        }

        const stream = Readable.fromWeb(response.body);
        // The timer keeps running until the body has been consumed
        stream.once('close', () => timer.clear());

        return {
          stream,
          contentType: response.headers.get('content-type') ?? '',
        };
      } catch (error) {
        timer.clear();
        throw timer.translate(error);
      }
    },
  };
}
