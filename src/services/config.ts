/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀寫與環境變數
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { AppConfig, ClientConfig, ConfigKey, ExpiryTimezone } from '../types/config.js';
import { ConfigurationError } from '../lib/errors.js';
import { DEFAULT_EXPIRY_FORMAT, isValidExpiryFormat } from '../lib/time-utils.js';
import { loggers } from '../lib/logger.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'nac');
const DEFAULT_CONFIG_FILE = 'config.json';

/**
 * 設定鍵與環境變數的對應（環境變數優先）
 */
export const ENV_KEYS: Record<ConfigKey, string> = {
  baseUrl: 'NINTEX_BASE_URL',
  clientId: 'NINTEX_CLIENT_ID',
  clientSecret: 'NINTEX_CLIENT_SECRET',
  grantType: 'NINTEX_GRANT_TYPE',
  tokenExpiryFormat: 'NINTEX_TOKEN_EXPIRY_FORMAT',
  tokenExpiryTimezone: 'NINTEX_TOKEN_EXPIRY_TIMEZONE',
};

export const CONFIG_KEYS: ConfigKey[] = [
  'baseUrl',
  'clientId',
  'clientSecret',
  'grantType',
  'tokenExpiryFormat',
  'tokenExpiryTimezone',
];

const REQUIRED_KEYS = ['baseUrl', 'clientId', 'clientSecret', 'grantType'] as const;

export function isConfigKey(value: string): value is ConfigKey {
  return Object.prototype.hasOwnProperty.call(ENV_KEYS, value);
}

function isTimezone(value: string): value is ExpiryTimezone {
  return value === 'local' || value === 'utc';
}

export class ConfigService {
  private configPath: string;
  private env: NodeJS.ProcessEnv;
  private config: AppConfig;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.env = env;
    this.config = this.load();
  }

  /**
   * 載入設定檔（不存在時視為空設定）
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }
    const content = fs.readFileSync(this.configPath, 'utf-8');
    try {
      const parsed: unknown = JSON.parse(content);
      return this.sanitize(parsed);
    } catch (error) {
      loggers.api.warn('Ignoring unreadable config file', {
        path: this.configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  /**
   * 只保留已知且為字串的欄位
   */
  private sanitize(raw: unknown): AppConfig {
    const config: AppConfig = {};
    if (typeof raw !== 'object' || raw === null) {
      return config;
    }
    for (const [key, value] of Object.entries(raw)) {
      if (!isConfigKey(key) || typeof value !== 'string') {
        continue;
      }
      if (key === 'tokenExpiryTimezone') {
        if (isTimezone(value)) {
          config.tokenExpiryTimezone = value;
        }
      } else {
        config[key] = value;
      }
    }
    return config;
  }

  private save(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), { encoding: 'utf-8', mode: 0o600 });
  }

  /**
   * 取得設定值（優先環境變數）
   */
  get<K extends ConfigKey>(key: K): string | undefined {
    const envValue = this.env[ENV_KEYS[key]];
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config[key];
  }

  /**
   * 寫入設定檔
   */
  set(key: ConfigKey, value: string): void {
    if (key === 'tokenExpiryTimezone') {
      if (!isTimezone(value)) {
        throw new Error(`tokenExpiryTimezone must be "local" or "utc", got "${value}"`);
      }
      this.config.tokenExpiryTimezone = value;
    } else {
      if (key === 'tokenExpiryFormat' && !isValidExpiryFormat(value)) {
        throw new Error(`Invalid tokenExpiryFormat "${value}"`);
      }
      this.config[key] = value;
    }
    this.save();
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  /**
   * 取得合併環境變數後的所有設定
   */
  getAll(): AppConfig {
    const merged: AppConfig = {};
    for (const key of CONFIG_KEYS) {
      const value = this.get(key);
      if (value === undefined) continue;
      if (key === 'tokenExpiryTimezone') {
        if (isTimezone(value)) merged.tokenExpiryTimezone = value;
      } else {
        merged[key] = value;
      }
    }
    return merged;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 檢查必要設定是否齊全
   */
  getMissingKeys(): string[] {
    return REQUIRED_KEYS.filter((key) => !this.get(key)).map((key) => ENV_KEYS[key]);
  }

  hasCredentials(): boolean {
    return this.getMissingKeys().length === 0;
  }

  /**
   * 取得建立 client 所需的設定
   * @throws ConfigurationError 缺少任何必要設定
   */
  getClientConfig(): ClientConfig {
    const baseUrl = this.get('baseUrl');
    const clientId = this.get('clientId');
    const clientSecret = this.get('clientSecret');
    const grantType = this.get('grantType');

    if (!baseUrl || !clientId || !clientSecret || !grantType) {
      throw new ConfigurationError(this.getMissingKeys());
    }

    const timezone = this.get('tokenExpiryTimezone') ?? 'local';
    if (!isTimezone(timezone)) {
      throw new Error(`${ENV_KEYS.tokenExpiryTimezone} must be "local" or "utc", got "${timezone}"`);
    }

    return createClientConfig({
      baseUrl,
      clientId,
      clientSecret,
      grantType,
      tokenExpiryFormat: this.get('tokenExpiryFormat'),
      tokenExpiryTimezone: timezone,
    });
  }
}

/**
 * 驗證並凍結 client 設定
 * @throws ConfigurationError 缺少任何必要設定
 */
export function createClientConfig(input: AppConfig): ClientConfig {
  const missing = REQUIRED_KEYS.filter((key) => !input[key]).map((key) => ENV_KEYS[key]);
  const { baseUrl, clientId, clientSecret, grantType } = input;
  if (missing.length > 0 || !baseUrl || !clientId || !clientSecret || !grantType) {
    throw new ConfigurationError(missing);
  }

  const tokenExpiryFormat = input.tokenExpiryFormat || DEFAULT_EXPIRY_FORMAT;
  if (!isValidExpiryFormat(tokenExpiryFormat)) {
    throw new Error(`Invalid token expiry format "${tokenExpiryFormat}"`);
  }

  const config: ClientConfig = {
    baseUrl: baseUrl.replace(/\/+$/, ''),
    clientId,
    clientSecret,
    grantType,
    tokenExpiryFormat,
    tokenExpiryTimezone: input.tokenExpiryTimezone ?? 'local',
  };
  return Object.freeze(config);
}

// 預設實例
let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService();
  }
  return defaultInstance;
}
