/**
 * API Client Helper
 * 提供共用的 NacApiClient 建立函數
 */

import { NacApiClient } from '../services/api.js';
import { getConfigService } from '../services/config.js';

let cachedClient: NacApiClient | null = null;

/**
 * 取得 NacApiClient 實例（同一個 process 共用 token）
 * @throws ConfigurationError 缺少必要設定
 */
export function getApiClient(): NacApiClient {
  if (!cachedClient) {
    cachedClient = new NacApiClient(getConfigService().getClientConfig());
  }
  return cachedClient;
}
