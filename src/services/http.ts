/**
 * HTTP Transport
 * 單次 HTTP 請求，含固定逾時與暫時性錯誤重試
 */

import { ofetch, FetchError } from 'ofetch';
import { ApiError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { recordApiRequest, recordRetryAttempt } from '../lib/metrics.js';
import { retry, type RetryConfig } from './retry.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean | undefined | null;
export type QueryParams = Record<string, QueryValue>;

export interface RequestOptions {
  headers?: Record<string, string>;
  query?: QueryParams;
  /** 物件會以 JSON 送出 */
  body?: Record<string, unknown> | string;
}

export interface HttpTransportOptions {
  /** 每次嘗試的逾時（毫秒，預設 30 秒） */
  timeoutMs?: number;
  retry?: Partial<Omit<RetryConfig, 'onRetry' | 'operation'>>;
}

export const REQUEST_TIMEOUT_MS = 30_000;

/**
 * 移除 undefined / null 的查詢參數
 */
export function compactQuery(query?: QueryParams): Record<string, string | number | boolean> | undefined {
  if (!query) {
    return undefined;
  }
  const result: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined && value !== null) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * 將回應內容轉成錯誤訊息用的字串
 */
export function stringifyBody(data: unknown): string {
  if (data === undefined || data === null) {
    return '';
  }
  if (typeof data === 'string') {
    return data;
  }
  return JSON.stringify(data);
}

export class HttpTransport {
  private readonly timeoutMs: number;
  private readonly retryConfig: Partial<RetryConfig>;

  constructor(options: HttpTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.retryConfig = options.retry ?? {};
  }

  /**
   * 發送請求
   * 連線失敗與逾時會重試；收到任何 HTTP 錯誤狀態則直接拋出 ApiError
   * @returns 已解析的回應內容（不解讀其語意）
   */
  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<unknown> {
    const startTime = Date.now();

    try {
      const data = await retry(
        async ({ attempt }) => {
          loggers.http.debug('HTTP request started', { method, url, attempt });
          return ofetch<unknown>(url, {
            method,
            headers: options.headers,
            query: compactQuery(options.query),
            body: options.body,
            timeout: this.timeoutMs,
            // 重試由 retry() 負責
            retry: 0,
          });
        },
        {
          ...this.retryConfig,
          operation: `${method} ${url}`,
          onRetry: (error, attempt, delayMs) => {
            recordRetryAttempt(method);
            loggers.retry.warn('Transient failure, retrying', {
              method,
              url,
              attempt,
              delayMs,
              reason: error instanceof Error ? error.message : String(error),
            });
          },
        }
      );

      const duration = Date.now() - startTime;
      recordApiRequest(method, 'ok', duration);
      loggers.http.debug('HTTP request completed', { method, url, duration });

      return data;
    } catch (error) {
      const duration = Date.now() - startTime;

      if (error instanceof FetchError && typeof error.status === 'number') {
        recordApiRequest(method, error.status, duration);
        throw new ApiError(method, url, error.status, stringifyBody(error.data));
      }

      recordApiRequest(method, 'network_error', duration);
      throw error;
    }
  }
}
