/**
 * Prometheus 指標收集
 * 追蹤 API 請求、Token 取得、重試與分頁
 */

import { register, Counter, Histogram } from 'prom-client';

/**
 * API 指標
 */
export const apiRequestsTotal = new Counter({
  name: 'nac_api_requests_total',
  help: 'API 請求總數',
  labelNames: ['method', 'status'],
});

export const apiRequestDurationSeconds = new Histogram({
  name: 'nac_api_request_duration_seconds',
  help: 'API 請求延遲（秒）',
  labelNames: ['method'],
  buckets: [0.05, 0.1, 0.5, 1.0, 2.0, 5.0, 10.0, 30.0],
});

/**
 * 認證指標
 */
export const authTokenRequestsTotal = new Counter({
  name: 'nac_auth_token_requests_total',
  help: 'Token 請求總數',
  labelNames: ['status'], // 'success' | 'failed'
});

export const authCacheHitsTotal = new Counter({
  name: 'nac_auth_cache_hits_total',
  help: 'Token 仍有效、不需重新取得的次數',
});

/**
 * 重試指標
 */
export const retryAttemptsTotal = new Counter({
  name: 'nac_retry_attempts_total',
  help: '因暫時性錯誤而重試的次數',
  labelNames: ['method'],
});

/**
 * 分頁指標
 */
export const pagesFetchedTotal = new Counter({
  name: 'nac_pages_fetched_total',
  help: '已取得的分頁數',
  labelNames: ['resource'],
});

export function recordApiRequest(method: string, status: number | 'ok' | 'network_error', durationMs: number): void {
  apiRequestsTotal.inc({ method, status: String(status) });
  apiRequestDurationSeconds.observe({ method }, durationMs / 1000);
}

export function recordAuthTokenRequest(success: boolean): void {
  authTokenRequestsTotal.inc({ status: success ? 'success' : 'failed' });
}

export function recordAuthCacheHit(): void {
  authCacheHitsTotal.inc();
}

export function recordRetryAttempt(method: string): void {
  retryAttemptsTotal.inc({ method });
}

export function recordPageFetched(resource: string): void {
  pagesFetchedTotal.inc({ resource });
}

/**
 * 收集所有指標的 Prometheus 格式
 */
export async function getMetricsSnapshot(): Promise<string> {
  return register.metrics();
}

/**
 * 重置所有指標（用於測試）
 */
export function resetMetrics(): void {
  register.resetMetrics();
}
