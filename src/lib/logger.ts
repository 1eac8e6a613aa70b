/**
 * Structured Logger - 結構化日誌系統
 * JSON 格式日誌，每行一筆，方便交給中央日誌系統解析
 * 特性：
 *   - 日誌級別控制
 *   - requestId 追蹤（每個操作各自獨立，可並行）
 *   - 執行時間 (duration)
 *   - 錯誤堆棧記錄
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
  /** 請求唯一識別碼，用於追蹤一個操作的完整生命週期 */
  requestId?: string;
  /** HTTP 方法 */
  method?: string;
  /** 請求 URL */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 回應狀態碼 */
  statusCode?: number;
  /** 嘗試次數 */
  attempt?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'info') */
  minLevel?: LogLevel;
  /** 自定義格式化函數 */
  formatter?: (entry: LogEntry) => string;
  /** 是否包含堆棧追蹤 (default: true) */
  includeStack?: boolean;
}

/** 日誌級別優先級 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * 目前操作的 requestId，依非同步呼叫鏈隔離，所有組件共用
 */
const requestScope = new AsyncLocalStorage<string>();

/**
 * 在指定 requestId 下執行，期間所有 logger 的日誌都會帶上它
 */
export function runWithRequestId<T>(requestId: string, fn: () => T): T {
  return requestScope.run(requestId, fn);
}

export function getCurrentRequestId(): string | undefined {
  return requestScope.getStore();
}

/**
 * 結構化日誌記錄器
 */
export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel || 'info',
      formatter: config.formatter || ((entry: LogEntry) => JSON.stringify(entry)),
      includeStack: config.includeStack !== false,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    const formatted = this.config.formatter(entry);

    // 日誌一律寫到 stderr，stdout 保留給指令輸出
    if (entry.level === 'warn') {
      console.warn(formatted);
    } else {
      console.error(formatted);
    }
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;
    this.log('warn', message, context);
  }

  error(message: string, error?: Error | null, context?: LogContext): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context: this.enrichContext(context),
    };

    if (error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      entry.error = {
        name: error.name,
        message: error.message,
        code,
        stack: this.config.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(level: 'debug' | 'info' | 'warn', message: string, context?: LogContext): void {
    this.output({
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context: this.enrichContext(context),
    });
  }

  /**
   * 自動補上目前的 requestId
   */
  private enrichContext(context?: LogContext): LogContext | undefined {
    const current = getCurrentRequestId();
    if (!context) {
      return current ? { requestId: current } : undefined;
    }
    if (!context.requestId && current) {
      return { ...context, requestId: current };
    }
    return context;
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  /**
   * 執行帶日誌的非同步操作
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();
    const requestId = randomUUID();

    try {
      const result = await runWithRequestId(requestId, fn);
      this.info(`${operation} completed`, {
        ...context,
        requestId,
        duration: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      this.error(
        `${operation} failed`,
        error instanceof Error ? error : new Error(String(error)),
        {
          ...context,
          requestId,
          duration: Date.now() - startTime,
        }
      );
      throw error;
    }
  }
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.NAC_LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
}

/**
 * 預設的日誌記錄器實例，按組件分類
 */
export const loggers = {
  api: new StructuredLogger('API', { minLevel: defaultLevel() }),
  auth: new StructuredLogger('Auth', { minLevel: defaultLevel() }),
  http: new StructuredLogger('Http', { minLevel: defaultLevel() }),
  retry: new StructuredLogger('Retry', { minLevel: defaultLevel() }),
  pagination: new StructuredLogger('Pagination', { minLevel: defaultLevel() }),
};

/**
 * 一次調整所有預設 logger 的級別
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}
