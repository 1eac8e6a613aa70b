/**
 * Nintex API Client
 * Nintex Automation Cloud API 客戶端 - 處理實例、任務與工作流程相關請求
 */

import type {
  ResolveType,
  InstanceDetail,
  InstanceFilter,
  JsonObject,
  Task,
  TaskFilter,
  WorkflowDesign,
  WorkflowInstance,
} from '../types/api.js';
import type { AppConfig, ClientConfig } from '../types/config.js';
import { ApiError, AuthenticationError, UnexpectedResponseError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import {
  isJsonObject,
  parseInstanceDetail,
  parseTask,
  parseWorkflowDesign,
  parseWorkflowInstance,
} from '../lib/models.js';
import { toQueryDate } from '../lib/time-utils.js';
import { AuthService } from './auth.js';
import { createClientConfig } from './config.js';
import { CredentialStore } from './credential-store.js';
import { HttpTransport, stringifyBody, type HttpMethod, type QueryParams, type RequestOptions } from './http.js';
import { PaginationWalker } from './paginator.js';
import { TokenProvider, type TokenSource } from './token-provider.js';

export const DEFAULT_PAGE_SIZE = 100;
export const DEFAULT_WORKFLOW_LIMIT = 1000;

export interface NacApiClientOptions {
  /** 共用或預先填入的憑證 */
  credentialStore?: CredentialStore;
  /** 取代預設的 TokenProvider */
  tokenProvider?: TokenSource;
  transport?: HttpTransport;
  /** 提前視為過期的毫秒數 */
  expiryBufferMs?: number;
  /** 分頁上限；未設定時不限制 */
  maxPages?: number;
  now?: () => number;
}

export class NacApiClient {
  private readonly config: ClientConfig;
  private readonly auth: AuthService;
  private readonly transport: HttpTransport;
  private readonly maxPages?: number;

  /**
   * @throws ConfigurationError 缺少必要設定（在任何網路請求之前）
   */
  constructor(config: AppConfig, options: NacApiClientOptions = {}) {
    this.config = createClientConfig(config);
    const store = options.credentialStore ?? new CredentialStore();
    const provider = options.tokenProvider ?? new TokenProvider(this.config, store);
    this.auth = new AuthService(store, provider, {
      expiryBufferMs: options.expiryBufferMs,
      now: options.now,
    });
    this.transport = options.transport ?? new HttpTransport();
    this.maxPages = options.maxPages;
  }

  // ---------------------------------------------------------------------------
  // Instances
  // ---------------------------------------------------------------------------

  /**
   * 為工作流程建立新實例
   * @param startData 工作流程的起始資料
   */
  async createInstance(workflowId: string, startData: JsonObject = {}): Promise<JsonObject | null> {
    return this.authorized('createInstance', async (token) => {
      const result = await this.send(token, 'POST', this.url(`/workflows/v1/designs/${encodeURIComponent(workflowId)}/instances`), {
        body: { startData },
      });
      return isJsonObject(result) ? result : null;
    });
  }

  /**
   * 取得實例明細（含動作），多頁時合併
   */
  async getInstance(instanceId: string): Promise<JsonObject> {
    return this.authorized('getInstance', (token) =>
      this.walker(token).merge(this.url(`/workflows/v2/instances/${encodeURIComponent(instanceId)}`), undefined, {
        resource: 'instance',
        maxPages: this.maxPages,
      })
    );
  }

  async getInstanceDetail(instanceId: string): Promise<InstanceDetail> {
    return parseInstanceDetail(await this.getInstance(instanceId));
  }

  /**
   * 列出實例，走完所有分頁
   * 注意：未指定 from/to 時，API 只回傳最近 30 天
   */
  async listInstances(filter: InstanceFilter = {}): Promise<JsonObject[]> {
    const query: QueryParams = {
      workflowName: filter.workflowName,
      status: filter.status,
      order: filter.order,
      from: toQueryDate(filter.from),
      to: toQueryDate(filter.to),
      pageSize: filter.pageSize ?? DEFAULT_PAGE_SIZE,
    };

    return this.authorized('listInstances', (token) =>
      this.walker(token).collect(this.url('/workflows/v2/instances'), 'instances', query, {
        maxPages: this.maxPages,
      })
    );
  }

  async listInstanceModels(filter: InstanceFilter = {}): Promise<WorkflowInstance[]> {
    const instances = await this.listInstances(filter);
    return instances.map(parseWorkflowInstance);
  }

  /**
   * 處理暫停中的實例
   * @param resolveType RETRY 重試失敗的動作；FAIL 將實例標記為失敗
   * @param message 顯示在實例頁面上的訊息
   */
  async resolveInstance(instanceId: string, resolveType: ResolveType, message: string): Promise<void> {
    await this.authorized('resolveInstance', (token) =>
      this.send(token, 'POST', this.url(`/workflows/v1/instances/${encodeURIComponent(instanceId)}/resolve`), {
        body: { resolveType, message },
      })
    );
  }

  /**
   * 取得實例的起始資料（內容依工作流程而異）
   */
  async getInstanceStartData(instanceId: string): Promise<JsonObject> {
    return this.authorized('getInstanceStartData', async (token) => {
      const url = this.url(`/workflows/v2/instances/${encodeURIComponent(instanceId)}/startdata`);
      return this.expectObject(url, await this.send(token, 'GET', url));
    });
  }

  /**
   * 以呼叫端提供的 parser 轉換起始資料
   */
  async getInstanceStartDataAs<T>(instanceId: string, parse: (raw: JsonObject) => T): Promise<T> {
    return parse(await this.getInstanceStartData(instanceId));
  }

  // ---------------------------------------------------------------------------
  // Tasks
  // ---------------------------------------------------------------------------

  /**
   * 搜尋任務，走完所有分頁
   * 注意：未指定 from/to 時，API 只回傳最近 30 天
   */
  async searchTasks(filter: TaskFilter = {}): Promise<JsonObject[]> {
    const query: QueryParams = {
      workflowName: filter.workflowName,
      workflowInstanceId: filter.instanceId,
      status: filter.status,
      assignee: filter.assignee,
      from: toQueryDate(filter.from),
      to: toQueryDate(filter.to),
    };

    return this.authorized('searchTasks', (token) =>
      this.walker(token).collect(this.url('/workflows/v2/tasks'), 'tasks', query, {
        maxPages: this.maxPages,
      })
    );
  }

  async searchTaskModels(filter: TaskFilter = {}): Promise<Task[]> {
    const tasks = await this.searchTasks(filter);
    return tasks.map(parseTask);
  }

  async getTask(taskId: string): Promise<JsonObject> {
    return this.authorized('getTask', async (token) => {
      const url = this.url(`/workflows/v2/tasks/${encodeURIComponent(taskId)}`);
      return this.expectObject(url, await this.send(token, 'GET', url));
    });
  }

  async getTaskModel(taskId: string): Promise<Task> {
    return parseTask(await this.getTask(taskId));
  }

  /**
   * 完成任務指派
   * @param outcome 必須是任務定義中的其中一個結果
   */
  async completeTask(taskId: string, assignmentId: string, outcome: string): Promise<JsonObject | null> {
    return this.authorized('completeTask', async (token) => {
      const url = this.url(
        `/workflows/v2/tasks/${encodeURIComponent(taskId)}/assignments/${encodeURIComponent(assignmentId)}`
      );
      const result = await this.send(token, 'PATCH', url, { body: { outcome } });
      return isJsonObject(result) ? result : null;
    });
  }

  /**
   * 將任務指派轉交給其他使用者
   * @param assignees 使用者 email
   */
  async delegateTask(taskId: string, assignmentId: string, assignees: string[], message: string): Promise<void> {
    await this.authorized('delegateTask', (token) => {
      const url = this.url(
        `/workflows/v2/tasks/${encodeURIComponent(taskId)}/assignments/${encodeURIComponent(assignmentId)}/delegate`
      );
      return this.send(token, 'PUT', url, { body: { assignees, message } });
    });
  }

  // ---------------------------------------------------------------------------
  // Workflows
  // ---------------------------------------------------------------------------

  /**
   * 列出已發佈的工作流程
   * @param limit 每頁上限（預設 1000）
   */
  async listWorkflows(limit: number = DEFAULT_WORKFLOW_LIMIT): Promise<JsonObject[]> {
    return this.authorized('listWorkflows', (token) =>
      this.walker(token).collect(this.url('/workflows/v1/designs/published'), 'workflows', { limit }, {
        maxPages: this.maxPages,
      })
    );
  }

  async listWorkflowModels(limit: number = DEFAULT_WORKFLOW_LIMIT): Promise<WorkflowDesign[]> {
    const workflows = await this.listWorkflows(limit);
    return workflows.map(parseWorkflowDesign);
  }

  async deleteWorkflow(workflowId: string): Promise<void> {
    await this.authorized('deleteWorkflow', (token) =>
      this.send(token, 'DELETE', this.url(`/workflows/v1/designs/${encodeURIComponent(workflowId)}`))
    );
  }

  // ---------------------------------------------------------------------------
  // Auth
  // ---------------------------------------------------------------------------

  /**
   * 確保持有有效 token，返回到期時間
   */
  async ensureAuthenticated(): Promise<Date> {
    await this.auth.getToken();
    const expiresAt = this.auth.getExpiresAt();
    if (expiresAt === null) {
      throw new AuthenticationError('No credential stored after token request', '');
    }
    return new Date(expiresAt);
  }

  getAuthService(): AuthService {
    return this.auth;
  }

  getBaseUrl(): string {
    return this.config.baseUrl;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private url(path: string): string {
    return `${this.config.baseUrl}${path}`;
  }

  /**
   * 確認認證後執行操作，並記錄執行時間
   */
  private authorized<T>(operation: string, fn: (token: string) => Promise<T>): Promise<T> {
    return loggers.api.trackAsync(operation, () => this.auth.withAuth(fn));
  }

  /**
   * 發送帶認證的請求
   * 401 時清除 token，下一個操作會重新取得（本次不重試）
   */
  private async send(
    token: string,
    method: HttpMethod,
    url: string,
    options: Omit<RequestOptions, 'headers'> = {}
  ): Promise<unknown> {
    try {
      return await this.transport.request(method, url, {
        ...options,
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
      });
    } catch (error) {
      if (error instanceof ApiError && error.status === 401) {
        this.auth.clearCache();
      }
      throw error;
    }
  }

  /**
   * @throws UnexpectedResponseError 回應不是 JSON 物件
   */
  private expectObject(url: string, body: unknown): JsonObject {
    if (!isJsonObject(body)) {
      throw new UnexpectedResponseError('Response is not a JSON object', url, stringifyBody(body));
    }
    return body;
  }

  private walker(token: string): PaginationWalker {
    return new PaginationWalker((url, query) => this.send(token, 'GET', url, { query }));
  }
}
