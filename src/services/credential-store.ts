/**
 * Credential Store
 * 保存目前的 Bearer Token 與到期時間，只負責存取，不負責取得
 */

import type { Credential } from '../types/auth.js';

export class CredentialStore {
  private credential: Credential | null = null;

  /**
   * 覆寫目前的憑證
   */
  set(accessToken: string, expiresAt: number): void {
    this.credential = { accessToken, expiresAt };
  }

  get(): Credential | null {
    return this.credential;
  }

  clear(): void {
    this.credential = null;
  }
}
