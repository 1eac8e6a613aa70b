/**
 * Output Formatter
 * 統一輸出格式處理：json | table
 */

import type { Command } from 'commander';
import { ConfigurationError, describeError } from './errors.js';

export type OutputFormat = 'json' | 'table';

export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 3;

/**
 * 驗證輸出格式是否有效
 */
export function isValidFormat(format: string): format is OutputFormat {
  return format === 'json' || format === 'table';
}

/**
 * 輸出資料到 console
 * @param tableRenderer 若為 table 格式，使用此函數渲染
 */
export function outputData(data: unknown, format: OutputFormat = 'json', tableRenderer?: () => void): void {
  if (format === 'table' && tableRenderer) {
    tableRenderer();
    return;
  }
  console.log(JSON.stringify(data, null, 2));
}

/**
 * 輸出錯誤並返回對應的結束碼
 */
export function reportError(error: unknown, format: OutputFormat = 'json'): number {
  const description = describeError(error);

  if (format === 'json') {
    console.log(JSON.stringify({ success: false, error: description }));
  } else {
    console.error(`Error [${description.code}]: ${description.message}`);
  }

  return exitCodeFor(error);
}

export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigurationError ? EXIT_CONFIG : EXIT_FAILURE;
}

/**
 * 日期顯示（表格用）
 */
export function formatDate(date: Date | undefined): string {
  return date ? date.toISOString().replace('T', ' ').slice(0, 19) : '-';
}

/**
 * 從全域選項取得輸出格式
 */
export function resolveFormat(cmd: Command): OutputFormat {
  const { format } = cmd.optsWithGlobals<{ format?: string }>();
  return format && isValidFormat(format) ? format : 'json';
}

/**
 * 執行指令動作；失敗時輸出錯誤並設定結束碼
 */
export async function runAction(cmd: Command, action: (format: OutputFormat) => Promise<void>): Promise<void> {
  const format = resolveFormat(cmd);
  try {
    await action(format);
  } catch (error) {
    process.exitCode = reportError(error, format);
  }
}

/**
 * 經過時間顯示，例如 "2d 3h"、"45m"
 */
export function formatAge(ms: number): string {
  const minutes = Math.floor(ms / 60_000);
  if (minutes < 60) {
    return `${minutes}m`;
  }
  const hours = Math.floor(minutes / 60);
  if (hours < 24) {
    return `${hours}h ${minutes % 60}m`;
  }
  return `${Math.floor(hours / 24)}d ${hours % 24}h`;
}
