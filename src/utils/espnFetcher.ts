/**
 * Scoreboard transport
 *
 * Plain request/response client for the provider's scoreboard endpoint:
 * per-request timeout, caller abort, and a small retry loop.
 */

import { config } from '../config';
import { withSource } from '../logger';
import { LEAGUE_DESCRIPTORS, type League } from '../../shared/schema';
import { PayloadParseError, TransportError } from '../types/errors';

const log = withSource('transport');

export interface FetchOptions {
  timeout?: number;
  maxRetries?: number;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * What the normalization registry needs from the network
 */
export interface ScoreboardTransport {
  fetchScoreboard(league: League, options?: FetchOptions): Promise<unknown>;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener('abort', () => {
      clearTimeout(timer);
      resolve();
    }, { once: true });
  });
}

export class EspnFetcher implements ScoreboardTransport {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeout: number;
  private readonly maxRetries: number;

  constructor(options: { baseUrl?: string; userAgent?: string; timeout?: number; maxRetries?: number } = {}) {
    this.baseUrl = options.baseUrl ?? config.apiBase;
    this.userAgent = options.userAgent ?? config.userAgent;
    this.timeout = options.timeout ?? config.fetchTimeoutMs;
    this.maxRetries = options.maxRetries ?? config.fetchMaxRetries;
  }

  scoreboardUrl(league: League): string {
    return `${this.baseUrl}/${LEAGUE_DESCRIPTORS[league].espnPath}/scoreboard`;
  }

  async fetchScoreboard(league: League, options: FetchOptions = {}): Promise<unknown> {
    const body = await this.fetch(this.scoreboardUrl(league), options);
    try {
      return JSON.parse(body);
    } catch (err) {
      throw new PayloadParseError('scoreboard response is not valid JSON', {
        league,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  /**
   * GET a URL and return the body text
   * @throws TransportError on network failure, non-2xx status, timeout or abort
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<string> {
    const {
      timeout = this.timeout,
      maxRetries = this.maxRetries,
      headers = {},
      signal,
    } = options;

    let lastError = 'unknown error';

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      if (signal?.aborted) {
        throw new TransportError(`request aborted: ${url}`, { url, aborted: true });
      }

      const controller = new AbortController();
      const onAbort = () => controller.abort();
      signal?.addEventListener('abort', onAbort, { once: true });
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        const response = await fetch(url, {
          headers: {
            'User-Agent': this.userAgent,
            'Accept': 'application/json',
            ...headers,
          },
          signal: controller.signal,
        });

        if (!response.ok) {
          throw new Error(`HTTP ${response.status}: ${response.statusText}`);
        }

        return await response.text();
      } catch (err) {
        if (signal?.aborted) {
          throw new TransportError(`request aborted: ${url}`, { url, aborted: true });
        }
        lastError = controller.signal.aborted
          ? `timed out after ${timeout}ms`
          : err instanceof Error ? err.message : String(err);

        if (attempt < maxRetries) {
          const delay = Math.pow(2, attempt) * 250;
          log.warn({ url, attempt, delay, err: lastError }, 'fetch attempt failed, retrying');
          await sleep(delay, signal);
        }
      } finally {
        clearTimeout(timeoutId);
        signal?.removeEventListener('abort', onAbort);
      }
    }

    throw new TransportError(`Failed to fetch ${url} after ${maxRetries} attempts: ${lastError}`, {
      url,
      attempts: maxRetries,
    });
  }
}

export const espnFetcher = new EspnFetcher();
