/**
 * Pagination Walker
 * 依伺服器提供的 nextLink 逐頁取得資料直到結束
 *
 * 第一頁帶上查詢參數；之後直接請求 nextLink，不再重送參數
 * （nextLink 已包含完整的查詢狀態）。
 */

import type { JsonObject } from '../types/api.js';
import { PaginationError } from '../lib/errors.js';
import { isJsonObject } from '../lib/models.js';
import { loggers } from '../lib/logger.js';
import { recordPageFetched } from '../lib/metrics.js';
import type { QueryParams } from './http.js';

/**
 * 取得單一頁面
 */
export type PageFetcher = (url: string, query?: QueryParams) => Promise<unknown>;

export interface WalkOptions {
  /** 指標與日誌用的資源名稱 */
  resource?: string;
  /** 最多頁數；未設定時不限制 */
  maxPages?: number;
}

export const NEXT_LINK_KEY = 'nextLink';

export class PaginationWalker {
  private readonly fetchPage: PageFetcher;

  constructor(fetchPage: PageFetcher) {
    this.fetchPage = fetchPage;
  }

  /**
   * 收集所有頁面中 itemsKey 陣列的項目（依伺服器順序）
   * @throws PaginationError 頁面缺少 itemsKey 或其不是陣列
   */
  async collect(
    url: string,
    itemsKey: string,
    query?: QueryParams,
    options: WalkOptions = {}
  ): Promise<JsonObject[]> {
    const results: JsonObject[] = [];

    await this.walk(url, query, { resource: itemsKey, ...options }, (page, pageIndex, pageUrl) => {
      const items = page[itemsKey];
      if (!Array.isArray(items)) {
        throw new PaginationError(`Response is missing "${itemsKey}" array`, pageUrl, pageIndex);
      }
      for (const item of items) {
        if (!isJsonObject(item)) {
          throw new PaginationError(`"${itemsKey}" contains a non-object item`, pageUrl, pageIndex);
        }
        results.push(item);
      }
    });

    return results;
  }

  /**
   * 將所有頁面淺層合併為單一物件（後面的頁面覆蓋前面的欄位）
   */
  async merge(url: string, query?: QueryParams, options: WalkOptions = {}): Promise<JsonObject> {
    let merged: JsonObject = {};

    await this.walk(url, query, options, (page) => {
      merged = { ...merged, ...page };
    });

    delete merged[NEXT_LINK_KEY];
    return merged;
  }

  /**
   * @returns 請求的頁數
   */
  private async walk(
    initialUrl: string,
    query: QueryParams | undefined,
    options: WalkOptions,
    onPage: (page: JsonObject, pageIndex: number, url: string) => void
  ): Promise<number> {
    const resource = options.resource ?? 'object';
    let url: string | undefined = initialUrl;
    let pageIndex = 0;

    while (url) {
      if (options.maxPages !== undefined && pageIndex >= options.maxPages) {
        throw new PaginationError(`Exceeded maximum of ${options.maxPages} pages`, url, pageIndex);
      }

      // 只有第一頁帶查詢參數
      const page = await this.fetchPage(url, pageIndex === 0 ? query : undefined);
      if (!isJsonObject(page)) {
        throw new PaginationError('Response page is not a JSON object', url, pageIndex);
      }

      recordPageFetched(resource);
      onPage(page, pageIndex, url);

      const nextUrl = this.nextLinkOf(page, url, pageIndex);
      loggers.pagination.debug('Page fetched', { resource, url, page: pageIndex + 1, hasNext: Boolean(nextUrl) });

      url = nextUrl;
      pageIndex++;
    }

    return pageIndex;
  }

  private nextLinkOf(page: JsonObject, url: string, pageIndex: number): string | undefined {
    const next = page[NEXT_LINK_KEY];
    if (next === undefined || next === null || next === '') {
      return undefined;
    }
    if (typeof next !== 'string') {
      throw new PaginationError(`"${NEXT_LINK_KEY}" is not a string`, url, pageIndex);
    }
    return next;
  }
}
