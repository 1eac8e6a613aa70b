/**
 * Time Utils Module
 * 時間工具模組 - Token 到期時間解析與查詢參數格式化
 */

import { ExpiryFormatError } from './errors.js';
import type { ExpiryTimezone } from '../types/config.js';

/** Token endpoint 預設回傳的 expires_at 格式 */
export const DEFAULT_EXPIRY_FORMAT = 'MM/DD/YYYY HH:mm:ss';

/** 以 ISO-8601 解析（含時區資訊） */
export const ISO_EXPIRY_FORMAT = 'ISO';

type DateToken = 'YYYY' | 'MM' | 'DD' | 'HH' | 'mm' | 'ss' | 'SSS';

// 長的 token 要先比對，避免 SSS 被拆開
const TOKENS: ReadonlyArray<[DateToken, number]> = [
  ['YYYY', 4],
  ['SSS', 3],
  ['MM', 2],
  ['DD', 2],
  ['HH', 2],
  ['mm', 2],
  ['ss', 2],
];

const ISO_PATTERN =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;

interface CompiledFormat {
  regex: RegExp;
  order: DateToken[];
}

const compiledCache = new Map<string, CompiledFormat>();

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * 將格式字串編譯為正規表示式
 */
function compileFormat(format: string): CompiledFormat {
  const cached = compiledCache.get(format);
  if (cached) {
    return cached;
  }

  let pattern = '';
  const order: DateToken[] = [];
  let i = 0;

  outer: while (i < format.length) {
    for (const [token, width] of TOKENS) {
      if (format.startsWith(token, i)) {
        if (order.includes(token)) {
          throw new Error(`Duplicate token "${token}" in expiry format "${format}"`);
        }
        pattern += `(\\d{${width}})`;
        order.push(token);
        i += token.length;
        continue outer;
      }
    }
    pattern += escapeRegex(format[i]);
    i += 1;
  }

  for (const required of ['YYYY', 'MM', 'DD'] as const) {
    if (!order.includes(required)) {
      throw new Error(`Expiry format "${format}" is missing "${required}"`);
    }
  }

  const compiled = { regex: new RegExp(`^${pattern}$`), order };
  compiledCache.set(format, compiled);
  return compiled;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * 解析 Token 到期時間
 * @param value 伺服器回傳的 expires_at
 * @param format 格式字串（如 MM/DD/YYYY HH:mm:ss）或 ISO
 * @param timezone 格式字串不含時區時使用的時區
 * @returns Unix timestamp (ms)
 * @throws ExpiryFormatError 格式不符或日期不存在
 */
export function parseExpiry(
  value: string,
  format: string = DEFAULT_EXPIRY_FORMAT,
  timezone: ExpiryTimezone = 'local'
): number {
  const trimmed = value.trim();

  if (format.toUpperCase() === ISO_EXPIRY_FORMAT) {
    const parsed = Date.parse(trimmed);
    if (!ISO_PATTERN.test(trimmed) || Number.isNaN(parsed)) {
      throw new ExpiryFormatError(value, format);
    }
    return parsed;
  }

  const { regex, order } = compileFormat(format);
  const match = regex.exec(trimmed);
  if (!match) {
    throw new ExpiryFormatError(value, format);
  }

  const parts: Record<DateToken, number> = {
    YYYY: 0,
    MM: 1,
    DD: 1,
    HH: 0,
    mm: 0,
    ss: 0,
    SSS: 0,
  };
  order.forEach((token, index) => {
    parts[token] = Number(match[index + 1]);
  });

  const valid =
    parts.MM >= 1 &&
    parts.MM <= 12 &&
    parts.DD >= 1 &&
    parts.DD <= daysInMonth(parts.YYYY, parts.MM) &&
    parts.HH <= 23 &&
    parts.mm <= 59 &&
    parts.ss <= 59;
  if (!valid) {
    throw new ExpiryFormatError(value, format);
  }

  if (timezone === 'utc') {
    return Date.UTC(parts.YYYY, parts.MM - 1, parts.DD, parts.HH, parts.mm, parts.ss, parts.SSS);
  }
  return new Date(parts.YYYY, parts.MM - 1, parts.DD, parts.HH, parts.mm, parts.ss, parts.SSS).getTime();
}

/**
 * 檢查格式字串是否可用（設定檢查時使用）
 */
export function isValidExpiryFormat(format: string): boolean {
  if (format.toUpperCase() === ISO_EXPIRY_FORMAT) {
    return true;
  }
  try {
    compileFormat(format);
    return true;
  } catch {
    return false;
  }
}

/**
 * 查詢參數用的日期字串（UTC ISO-8601）
 */
export function toQueryDate(date: Date | undefined): string | undefined {
  return date ? date.toISOString() : undefined;
}

/**
 * 計算距今經過的毫秒數
 */
export function ageOf(date: Date | undefined, now: number = Date.now()): number {
  return date ? now - date.getTime() : 0;
}
