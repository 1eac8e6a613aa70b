/**
 * Auth Service
 * Token Guard - 每個需要認證的操作執行前確認 Token 存在且未過期
 */

import type { Credential } from '../types/auth.js';
import { loggers } from '../lib/logger.js';
import { recordAuthCacheHit } from '../lib/metrics.js';
import { CredentialStore } from './credential-store.js';
import type { TokenSource } from './token-provider.js';

export interface AuthServiceOptions {
  /** 提前視為過期的毫秒數（預設 0） */
  expiryBufferMs?: number;
  /** 目前時間（測試時可替換） */
  now?: () => number;
}

export class AuthService {
  private readonly store: CredentialStore;
  private readonly provider: TokenSource;
  private readonly expiryBufferMs: number;
  private readonly now: () => number;

  // 單一飛行請求：並發呼叫共用同一個 token 請求
  private inFlightTokenPromise: Promise<string> | null = null;

  constructor(store: CredentialStore, provider: TokenSource, options: AuthServiceOptions = {}) {
    this.store = store;
    this.provider = provider;
    this.expiryBufferMs = options.expiryBufferMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  /**
   * 取得有效的 Access Token
   * - 快取有效：直接返回
   * - 有請求進行中：等待進行中的請求
   * - 快取無效：發起新請求並保存 Promise
   */
  async getToken(): Promise<string> {
    const cached = this.validCredential();
    if (cached) {
      recordAuthCacheHit();
      return cached.accessToken;
    }

    if (this.inFlightTokenPromise) {
      return this.inFlightTokenPromise;
    }

    this.inFlightTokenPromise = this.refresh();

    try {
      return await this.inFlightTokenPromise;
    } finally {
      this.inFlightTokenPromise = null;
    }
  }

  /**
   * 確認認證有效後執行操作
   * 只在操作開始前檢查一次，操作中途（例如長時間分頁）不會再檢查
   */
  async withAuth<T>(operation: (token: string) => Promise<T>): Promise<T> {
    const token = await this.getToken();
    return operation(token);
  }

  private async refresh(): Promise<string> {
    const credential = await this.provider.acquire();
    // 自訂的 TokenSource 不一定會寫入 store
    this.store.set(credential.accessToken, credential.expiresAt);
    if (!this.isUnexpired(credential)) {
      loggers.auth.warn('Identity endpoint returned an already expired token', {
        expiresAt: new Date(credential.expiresAt).toISOString(),
      });
    }
    return credential.accessToken;
  }

  private validCredential(): Credential | null {
    const credential = this.store.get();
    return credential && this.isUnexpired(credential) ? credential : null;
  }

  private isUnexpired(credential: Credential): boolean {
    return this.now() < credential.expiresAt - this.expiryBufferMs;
  }

  /**
   * 檢查目前的 token 是否有效
   */
  isTokenValid(): boolean {
    return this.validCredential() !== null;
  }

  /**
   * 目前 token 的到期時間（無 token 時為 null）
   */
  getExpiresAt(): number | null {
    return this.store.get()?.expiresAt ?? null;
  }

  /**
   * 清除快取的 token（伺服器回 401 時呼叫）
   * 不中斷進行中的請求
   */
  clearCache(): void {
    this.store.clear();
  }

  hasInflightRequest(): boolean {
    return this.inFlightTokenPromise !== null;
  }
}
