/**
 * Renshuu REST API client
 *
 * One instance per API key. Reads are retried on transient failures;
 * the schedule write is attempted once.
 */

import { z } from 'zod';
import { RENSHUU_CONSTANTS } from '../../../shared/src';
import { RenshuuApiError, RenshuuNetworkError } from '../errors';
import { logger } from '../utils/logger';
import { OPERATIONS, formatDuration } from '../utils/logger-standards';
import { retry, RetryOptions } from './retry';
import {
  AddWordResult,
  ListContentsResponse,
  ListsResponse,
  RenshuuWord,
  listContentsResponseSchema,
  listsResponseSchema,
  renshuuWordSchema,
  wordSearchResponseSchema,
} from './types';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RenshuuApiOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchFn?: FetchLike;
  retryOptions?: RetryOptions;
}

interface RawResponse {
  ok: boolean;
  status: number;
  body: unknown;
}

/**
 * Extract the `error` field Renshuu puts in failed JSON answers
 */
export function extractApiError(body: unknown): string | null {
  if (typeof body === 'object' && body !== null && 'error' in body && body.error) {
    return String(body.error);
  }
  return null;
}

export class RenshuuApi {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;
  private readonly headers: Record<string, string>;
  private readonly retryOptions: RetryOptions;

  constructor(options: RenshuuApiOptions) {
    this.baseUrl = options.baseUrl ?? RENSHUU_CONSTANTS.DEFAULT_API_URL;
    this.timeoutMs = options.timeoutMs ?? RENSHUU_CONSTANTS.DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? fetch;
    this.headers = {
      Authorization: `Bearer ${options.apiKey}`,
      Accept: 'application/json',
    };
    this.retryOptions = {
      maxRetries: RENSHUU_CONSTANTS.RETRY_MAX_ATTEMPTS,
      initialDelay: RENSHUU_CONSTANTS.RETRY_INITIAL_DELAY_MS,
      ...options.retryOptions,
    };
  }

  /**
   * All schedules of the key's owner, grouped by term type
   */
  async getLists(): Promise<ListsResponse> {
    return this.getJson('lists', listsResponseSchema);
  }

  /**
   * Dictionary search; malformed entries are skipped
   */
  async searchWords(value: string): Promise<RenshuuWord[]> {
    const response = await this.getJson(
      `word/search?value=${encodeURIComponent(value)}`,
      wordSearchResponseSchema
    );

    const words: RenshuuWord[] = [];
    for (const entry of response.words) {
      const parsed = renshuuWordSchema.safeParse(entry);
      if (parsed.success) {
        words.push(parsed.data);
      } else {
        logger.debug('Skipping malformed search entry', { issues: parsed.error.issues.length });
      }
    }
    return words;
  }

  /**
   * One page of a schedule's contents (pages start at 1)
   */
  async getListContents(listId: string, page: number): Promise<ListContentsResponse> {
    return this.getJson(
      `list/${encodeURIComponent(listId)}?pg=${page}`,
      listContentsResponseSchema
    );
  }

  /**
   * Add a word to a schedule
   */
  async addWordToList(termId: string, listId: string): Promise<AddWordResult> {
    const response = await this.request('PUT', `word/${encodeURIComponent(termId)}`, {
      list_id: listId,
    });

    const error = extractApiError(response.body);
    if (response.ok && !error) {
      return { ok: true, status: response.status };
    }

    return {
      ok: false,
      status: response.status,
      error: error ?? `HTTP ${response.status}`,
    };
  }

  private async getJson<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.output<S>> {
    const response = await retry(async () => {
      const raw = await this.request('GET', path);
      const error = extractApiError(raw.body);
      if (error || !raw.ok) {
        throw new RenshuuApiError(error ?? `HTTP ${raw.status}`, raw.status, { path: stripQuery(path) });
      }
      return raw;
    }, this.retryOptions);

    const parsed = schema.safeParse(response.body);
    if (!parsed.success) {
      throw new RenshuuApiError('Unexpected response format', response.status, {
        path: stripQuery(path),
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return parsed.data;
  }

  private async request(method: 'GET' | 'PUT', path: string, body?: unknown): Promise<RawResponse> {
    const url = new URL(path, this.baseUrl).toString();
    const start = Date.now();

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: body === undefined ? this.headers : { ...this.headers, 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RenshuuNetworkError(`Renshuu request failed: ${message}`, {
        method,
        path: stripQuery(path),
      });
    }

    let parsedBody: unknown;
    try {
      parsedBody = await response.json();
    } catch {
      throw new RenshuuApiError(`Unexpected non-JSON response (HTTP ${response.status})`, response.status, {
        method,
        path: stripQuery(path),
      });
    }

    logger.debug('Renshuu request completed', {
      operation: OPERATIONS.API_REQUEST,
      method,
      path: stripQuery(path),
      status: response.status,
      ...formatDuration(Date.now() - start),
    });

    return { ok: response.ok, status: response.status, body: parsedBody };
  }
}

function stripQuery(path: string): string {
  const index = path.indexOf('?');
  return index === -1 ? path : path.slice(0, index);
}
