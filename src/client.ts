/**
 * Library entry point
 */

export { NacApiClient, DEFAULT_PAGE_SIZE, DEFAULT_WORKFLOW_LIMIT } from './services/api.js';
export type { NacApiClientOptions } from './services/api.js';
export { AuthService } from './services/auth.js';
export type { AuthServiceOptions } from './services/auth.js';
export { CredentialStore } from './services/credential-store.js';
export { TokenProvider, TOKEN_PATH } from './services/token-provider.js';
export type { TokenSource } from './services/token-provider.js';
export { HttpTransport, REQUEST_TIMEOUT_MS } from './services/http.js';
export type { HttpMethod, HttpTransportOptions, QueryParams, RequestOptions } from './services/http.js';
export { PaginationWalker } from './services/paginator.js';
export type { PageFetcher, WalkOptions } from './services/paginator.js';
export { retry, calculateBackoff, isTransientError, DEFAULT_RETRY_CONFIG } from './services/retry.js';
export type { RetryConfig } from './services/retry.js';
export { ConfigService, createClientConfig, getConfigService } from './services/config.js';
export * from './lib/errors.js';
export {
  parseWorkflowInstance,
  parseInstanceDetail,
  parseTask,
  parseWorkflowDesign,
  parseWorkflowStatus,
  parseTaskStatus,
  taskAge,
  actionAge,
  supportsMultipleUsers,
} from './lib/models.js';
export { parseExpiry, DEFAULT_EXPIRY_FORMAT, ISO_EXPIRY_FORMAT } from './lib/time-utils.js';
export { loggers, setLogLevel, StructuredLogger } from './lib/logger.js';
export type { LogLevel, LogContext, LogEntry } from './lib/logger.js';
export {
  WorkflowStatus,
  TaskStatus,
  ResolveType,
  WorkflowInstanceSchema,
  InstanceDetailSchema,
  InstanceActionSchema,
  TaskSchema,
  TaskAssignmentSchema,
  WorkflowDesignSchema,
} from './types/api.js';
export type {
  JsonObject,
  InstanceFilter,
  TaskFilter,
  SortOrder,
  WorkflowInstance,
  InstanceDetail,
  InstanceAction,
  Task,
  TaskAssignment,
  WorkflowDesign,
} from './types/api.js';
export type { AppConfig, ClientConfig, ExpiryTimezone } from './types/config.js';
export { TokenResponseSchema } from './types/auth.js';
export type { Credential, TokenResponse } from './types/auth.js';
