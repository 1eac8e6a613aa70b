/**
 * Token Provider
 * 以 client credentials 向 /authentication/v1/token 換取 Bearer Token
 *
 * 換取失敗不會自動重試：憑證錯誤不是暫時性問題。
 */

import { ofetch, FetchError } from 'ofetch';
import type { ClientConfig } from '../types/config.js';
import { TokenResponseSchema, type Credential, type TokenResponse } from '../types/auth.js';
import { AuthenticationError, TransientNetworkError } from '../lib/errors.js';
import { parseExpiry } from '../lib/time-utils.js';
import { loggers } from '../lib/logger.js';
import { recordAuthTokenRequest } from '../lib/metrics.js';
import { CredentialStore } from './credential-store.js';
import { REQUEST_TIMEOUT_MS, stringifyBody } from './http.js';
import { isTransientError } from './retry.js';

export const TOKEN_PATH = '/authentication/v1/token';

/**
 * 可取得新 Token 的來源（測試時可替換）
 */
export interface TokenSource {
  acquire(): Promise<Credential>;
}

export class TokenProvider implements TokenSource {
  private readonly config: ClientConfig;
  private readonly store: CredentialStore;

  constructor(config: ClientConfig, store: CredentialStore) {
    this.config = config;
    this.store = store;
  }

  /**
   * 取得新的 Token 並寫入 CredentialStore
   * @throws AuthenticationError 伺服器拒絕或回應格式不符
   * @throws ExpiryFormatError expires_at 不符合設定的格式
   * @throws TransientNetworkError 無法連線到認證端點
   */
  async acquire(): Promise<Credential> {
    const url = `${this.config.baseUrl}${TOKEN_PATH}`;
    loggers.auth.info('Requesting access token', { url });

    let text: string;
    try {
      text = await this.requestToken(url);
    } catch (error) {
      recordAuthTokenRequest(false);
      throw this.toAuthError(error);
    }

    try {
      const credential = this.parseResponse(text);
      this.store.set(credential.accessToken, credential.expiresAt);
      recordAuthTokenRequest(true);
      loggers.auth.info('Access token acquired', {
        expiresAt: new Date(credential.expiresAt).toISOString(),
      });
      return credential;
    } catch (error) {
      recordAuthTokenRequest(false);
      throw error;
    }
  }

  private async requestToken(url: string): Promise<string> {
    const body = new URLSearchParams({
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      grant_type: this.config.grantType,
    }).toString();

    return ofetch(url, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body,
      responseType: 'text',
      timeout: REQUEST_TIMEOUT_MS,
      retry: 0,
    });
  }

  private toAuthError(error: unknown): unknown {
    if (error instanceof FetchError && typeof error.status === 'number') {
      return new AuthenticationError(
        `Token request rejected with status ${error.status}`,
        stringifyBody(error.data),
        error.status
      );
    }
    if (isTransientError(error)) {
      return new TransientNetworkError('Token request failed', error, 1);
    }
    return error;
  }

  /**
   * 解析 { access_token, expires_at }
   */
  private parseResponse(text: string): Credential {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new AuthenticationError('Token response is not valid JSON', text, undefined, { cause: error });
    }

    if (typeof parsed !== 'object' || parsed === null) {
      throw new AuthenticationError('Token response is not a JSON object', text);
    }

    const result = TokenResponseSchema.safeParse(parsed);
    if (!result.success) {
      if (result.error.issues[0].path[0] !== 'expires_at') {
        throw new AuthenticationError('Token response is missing access_token', text);
      }
      // 錯誤訊息不帶出 token 本身
      throw new AuthenticationError(
        'Token response is missing expires_at',
        JSON.stringify({ ...parsed, access_token: '[REDACTED]' })
      );
    }

    const response: TokenResponse = result.data;
    return {
      accessToken: response.access_token,
      expiresAt: parseExpiry(response.expires_at, this.config.tokenExpiryFormat, this.config.tokenExpiryTimezone),
    };
  }
}
