/**
 * 設定檔結構 (~/.config/nac/config.json)
 */
export interface AppConfig {
  /** Nintex API base URL，例如 https://us.nintex.io */
  baseUrl?: string;
  /** OAuth Client ID */
  clientId?: string;
  /** OAuth Client Secret */
  clientSecret?: string;
  /** OAuth grant type，通常為 client_credentials */
  grantType?: string;
  /** expires_at 格式（YYYY/MM/DD/HH/mm/ss/SSS 樣式或 ISO） */
  tokenExpiryFormat?: string;
  /** expires_at 時區 */
  tokenExpiryTimezone?: ExpiryTimezone;
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof AppConfig;

export type ExpiryTimezone = 'local' | 'utc';

/**
 * 建立 client 所需的完整設定（建立後不可變）
 */
export interface ClientConfig {
  readonly baseUrl: string;
  readonly clientId: string;
  readonly clientSecret: string;
  readonly grantType: string;
  readonly tokenExpiryFormat: string;
  readonly tokenExpiryTimezone: ExpiryTimezone;
}
