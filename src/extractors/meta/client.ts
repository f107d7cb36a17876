import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { createHmac } from 'crypto';
import { z } from 'zod';
import logger from '@/utils/logger';
import { AuthError, FetchFailed, RateLimitExceeded, getErrorMessage } from '@/utils/error-handler';
import { ResponseCache, requestFingerprint } from '@/cache/response-cache';
import { Sleep, computeBackoff, delay, parseRetryAfter } from '@/utils/retry';
import { Account } from '@/utils/types';

export type GraphParams = Record<string, string | number>;
export type GraphRecord = Record<string, unknown>;

export interface GraphPage {
  data: GraphRecord[];
  /** Cursor that produced this page; null for the first page. */
  cursor: string | null;
  nextCursor: string | null;
}

export interface MetaClientOptions {
  accessToken: string;
  adAccountId: string;
  appSecret?: string | null;
  apiVersion?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  cache?: ResponseCache | null;
  adapter?: AxiosAdapter;
  sleep?: Sleep;
}

const graphListSchema = z.object({
  data: z.array(z.record(z.unknown())),
  paging: z
    .object({
      cursors: z.object({ before: z.string().optional(), after: z.string().optional() }).partial().optional(),
      next: z.string().optional(),
      previous: z.string().optional()
    })
    .optional()
});

const graphErrorSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    type: z.string().optional(),
    code: z.number().optional(),
    error_subcode: z.number().optional(),
    is_transient: z.boolean().optional()
  })
});

const accountSchema = z.object({
  id: z.string(),
  account_id: z.string().optional(),
  name: z.string().optional(),
  currency: z.string().optional(),
  timezone_name: z.string().optional()
});

type FailureKind = 'auth' | 'rate_limit' | 'transient' | 'fatal';

// Graph API error codes, see the Marketing API error reference
const AUTH_CODES = new Set([102, 190, 10]);
const RATE_LIMIT_CODES = new Set([4, 17, 32, 613]);
const TRANSIENT_CODES = new Set([1, 2]);

function isRateLimitCode(code: number): boolean {
  return RATE_LIMIT_CODES.has(code) || (code >= 80000 && code <= 80014);
}

interface ClassifiedFailure {
  kind: FailureKind;
  message: string;
  status?: number;
  retryAfterMs?: number;
}

export function classifyFailure(error: unknown): ClassifiedFailure {
  if (!axios.isAxiosError(error)) {
    return { kind: 'fatal', message: getErrorMessage(error) };
  }

  const response = error.response;
  if (!response) {
    // Connection reset, DNS failure, timeout
    return { kind: 'transient', message: error.code ? `${error.code}: ${error.message}` : error.message };
  }

  const parsed = graphErrorSchema.safeParse(response.data);
  const graphError = parsed.success ? parsed.data.error : undefined;
  const code = graphError?.code;
  const message = graphError?.message ?? error.message;
  const status = response.status;
  const retryAfterMs = parseRetryAfter(response.headers?.['retry-after']);

  if (code !== undefined && AUTH_CODES.has(code)) {
    return { kind: 'auth', message, status };
  }
  if (status === 429 || (code !== undefined && isRateLimitCode(code))) {
    return { kind: 'rate_limit', message, status, retryAfterMs };
  }
  // A missing permission needs a new token as much as an expired one does.
  // The OAuthException type alone is not enough: Graph also uses it for bad parameters.
  if (status === 401 || status === 403) {
    return { kind: 'auth', message, status };
  }
  if (status >= 500 || graphError?.is_transient === true || (code !== undefined && TRANSIENT_CODES.has(code))) {
    return { kind: 'transient', message, status, retryAfterMs };
  }
  return { kind: 'fatal', message, status };
}

function extractNextCursor(paging: z.infer<typeof graphListSchema>['paging']): string | null {
  if (!paging?.next) {
    return null;
  }
  if (paging.cursors?.after) {
    return paging.cursors.after;
  }
  // Some edges only return a next URL
  try {
    return new URL(paging.next).searchParams.get('after');
  } catch {
    return null;
  }
}

export class MetaAdsClient {
  private httpClient: AxiosInstance;
  private cache: ResponseCache | null;
  private sleep: Sleep;
  private maxRetries: number;
  private retryDelayMs: number;
  readonly adAccountId: string;

  constructor(options: MetaClientOptions) {
    this.adAccountId = options.adAccountId;
    this.cache = options.cache ?? null;
    this.sleep = options.sleep ?? delay;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 5000;

    const appSecretProof = options.appSecret
      ? createHmac('sha256', options.appSecret).update(options.accessToken).digest('hex')
      : null;

    this.httpClient = axios.create({
      baseURL: `https://graph.facebook.com/${options.apiVersion ?? 'v22.0'}`,
      timeout: options.timeoutMs ?? 30000,
      adapter: options.adapter,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'ads-report-etl/1.0.0'
      }
    });

    // Credentials are attached per request so they never reach the cache key or logs
    this.httpClient.interceptors.request.use(config => {
      config.params = {
        ...config.params,
        access_token: options.accessToken,
        ...(appSecretProof ? { appsecret_proof: appSecretProof } : {})
      };
      return config;
    });
  }

  /**
   * GET with retry. Rate limits and transient failures back off
   * exponentially; authentication failures are raised at once.
   */
  async request(endpoint: string, params: GraphParams = {}): Promise<unknown> {
    const cacheKey = this.cache ? requestFingerprint(endpoint, params) : null;

    if (this.cache && cacheKey) {
      const cached = await this.cache.get(cacheKey);
      if (cached) {
        logger.debug('Meta API cache hit', { endpoint });
        return cached.payload;
      }
    }

    for (let attempt = 0; ; attempt++) {
      try {
        logger.debug('Making Meta API request', { endpoint, attempt: attempt + 1 });
        const response = await this.httpClient.get<unknown>(endpoint, { params });

        if (this.cache && cacheKey) {
          await this.cache.set(cacheKey, { payload: response.data, fetchedAt: Date.now() });
        }
        return response.data;

      } catch (error) {
        const failure = classifyFailure(error);
        const attempts = attempt + 1;
        const context = { endpoint, status: failure.status, attempts };

        if (failure.kind === 'auth') {
          logger.error('Meta API rejected the access token', { ...context, error: failure.message });
          throw new AuthError(`Meta API authentication failed: ${failure.message}`, { cause: error, context });
        }

        if (failure.kind === 'fatal') {
          logger.error('Meta API request failed', { ...context, error: failure.message });
          throw new FetchFailed(`Meta API request to ${endpoint} failed: ${failure.message}`, attempts, {
            cause: error,
            context
          });
        }

        if (attempt >= this.maxRetries) {
          logger.error('Meta API retries exhausted', { ...context, kind: failure.kind, error: failure.message });
          if (failure.kind === 'rate_limit') {
            throw new RateLimitExceeded(attempts, { cause: error, context });
          }
          throw new FetchFailed(
            `Meta API request to ${endpoint} failed after ${attempts} attempts: ${failure.message}`,
            attempts,
            { cause: error, context }
          );
        }

        const waitMs = computeBackoff(attempt, this.retryDelayMs, failure.retryAfterMs);
        logger.warn(`Meta API ${failure.kind === 'rate_limit' ? 'rate limited' : 'request failed'}, retrying`, {
          ...context,
          waitMs,
          error: failure.message
        });
        await this.sleep(waitMs);
      }
    }
  }

  /**
   * Pages through a Graph edge until `paging.next` is absent. Given a cursor
   * it resumes from that page, which is what makes a run restartable.
   */
  async *paginate(endpoint: string, params: GraphParams, startCursor: string | null = null): AsyncGenerator<GraphPage> {
    let cursor = startCursor;

    do {
      const body = await this.request(endpoint, cursor ? { ...params, after: cursor } : params);
      const parsed = graphListSchema.safeParse(body);

      if (!parsed.success) {
        throw new FetchFailed(`Unexpected response shape from ${endpoint}`, 1, {
          cause: parsed.error,
          context: { endpoint }
        });
      }

      const nextCursor = extractNextCursor(parsed.data.paging);
      yield { data: parsed.data.data, cursor, nextCursor };
      cursor = nextCursor;
    } while (cursor);
  }

  async getAccount(): Promise<Account> {
    const body = await this.request(`/${this.adAccountId}`, {
      fields: 'account_id,name,currency,timezone_name'
    });
    const parsed = accountSchema.safeParse(body);

    if (!parsed.success) {
      throw new FetchFailed('Unexpected account response from Meta API', 1, { cause: parsed.error });
    }

    const account: Account = {
      id: parsed.data.account_id ?? parsed.data.id,
      name: parsed.data.name ?? parsed.data.id,
      currency: parsed.data.currency ?? 'USD',
      timezone: parsed.data.timezone_name
    };

    logger.info('Meta account info fetched', {
      accountId: account.id,
      currency: account.currency,
      timezone: account.timezone
    });
    return account;
  }
}

export default MetaAdsClient;
