/**
 * Error Types
 * 錯誤類型 - 區分設定錯誤、認證失敗、網路不穩與遠端 API 拒絕
 */

export type ErrorCode =
  | 'CONFIG_MISSING'
  | 'AUTH_FAILED'
  | 'EXPIRY_FORMAT'
  | 'NETWORK_UNREACHABLE'
  | 'API_ERROR'
  | 'PAGINATION_ERROR'
  | 'UNEXPECTED_RESPONSE'
  | 'MODEL_PARSE_ERROR';

/**
 * 所有錯誤的共同基底，帶有穩定的 code 供 CLI 輸出
 */
export class NacError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NacError';
    this.code = code;
  }
}

/**
 * 必要設定缺漏，在任何網路呼叫之前拋出
 */
export class ConfigurationError extends NacError {
  public readonly missingKeys: string[];

  constructor(missingKeys: string[]) {
    super('CONFIG_MISSING', `Missing required configuration: ${missingKeys.join(', ')}`);
    this.name = 'ConfigurationError';
    this.missingKeys = missingKeys;
  }
}

/**
 * Token 交換失敗（不自動重試）
 */
export class AuthenticationError extends NacError {
  public readonly status?: number;
  public readonly body: string;

  constructor(message: string, body: string, status?: number, options?: { cause?: unknown }) {
    super('AUTH_FAILED', body ? `${message}: ${body}` : message, options);
    this.name = 'AuthenticationError';
    this.status = status;
    this.body = body;
  }
}

/**
 * expires_at 與設定的格式不符
 */
export class ExpiryFormatError extends NacError {
  public readonly value: string;
  public readonly format: string;

  constructor(value: string, format: string) {
    super('EXPIRY_FORMAT', `Token expiry "${value}" does not match format "${format}"`);
    this.name = 'ExpiryFormatError';
    this.value = value;
    this.format = format;
  }
}

/**
 * 連線失敗或逾時，重試次數用盡
 */
export class TransientNetworkError extends NacError {
  public readonly attempts: number;

  constructor(message: string, cause: unknown, attempts: number) {
    super('NETWORK_UNREACHABLE', `${message} (after ${attempts} attempt${attempts === 1 ? '' : 's'})`, { cause });
    this.name = 'TransientNetworkError';
    this.attempts = attempts;
  }
}

/**
 * 遠端回傳非成功狀態碼
 */
export class ApiError extends NacError {
  public readonly status: number;
  public readonly body: string;
  public readonly method: string;
  public readonly url: string;

  constructor(method: string, url: string, status: number, body: string) {
    super('API_ERROR', `${method} ${url} failed: ${status} - ${body}`);
    this.name = 'ApiError';
    this.method = method;
    this.url = url;
    this.status = status;
    this.body = body;
  }
}

/**
 * 分頁回應缺少預期的欄位
 */
export class PaginationError extends NacError {
  public readonly url: string;
  public readonly pageIndex: number;

  constructor(message: string, url: string, pageIndex: number) {
    super('PAGINATION_ERROR', `${message} (page ${pageIndex + 1}, ${url})`);
    this.name = 'PaginationError';
    this.url = url;
    this.pageIndex = pageIndex;
  }
}

/**
 * 成功回應的內容不是預期的 JSON 物件
 */
export class UnexpectedResponseError extends NacError {
  public readonly url: string;
  public readonly body: string;

  constructor(message: string, url: string, body: string) {
    super('UNEXPECTED_RESPONSE', `${message} (${url}): ${body}`);
    this.name = 'UnexpectedResponseError';
    this.url = url;
    this.body = body;
  }
}

/**
 * API 回應無法轉換為型別模型
 */
export class ModelParseError extends NacError {
  public readonly model: string;
  public readonly field: string;

  constructor(model: string, field: string, detail: string) {
    super('MODEL_PARSE_ERROR', `${model}.${field}: ${detail}`);
    this.name = 'ModelParseError';
    this.model = model;
    this.field = field;
  }
}

export interface ErrorDescription {
  code: string;
  message: string;
  status?: number;
}

/**
 * 將任意錯誤轉成 CLI 輸出用的描述
 */
export function describeError(error: unknown): ErrorDescription {
  if (error instanceof ApiError || error instanceof AuthenticationError) {
    return { code: error.code, message: error.message, status: error.status };
  }
  if (error instanceof NacError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: 'UNEXPECTED_ERROR', message: error.message };
  }
  return { code: 'UNEXPECTED_ERROR', message: String(error) };
}
