/**
 * Nintex Workflow API Types
 * Nintex Automation Cloud API 回應類型定義，模型型別由 zod schema 推導
 */

import { z } from 'zod';

/**
 * 工作流程實例狀態
 */
export enum WorkflowStatus {
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  TERMINATED = 'terminated',
}

/**
 * 任務指派狀態
 */
export enum TaskStatus {
  ACTIVE = 'active',
  ESCALATED = 'active-escalated',
  EXPIRED = 'expired',
  COMPLETE = 'complete',
  OVERRIDDEN = 'overridden',
  TERMINATED = 'terminated',
  PAUSED = 'paused',
  ALL = 'all',
}

/**
 * 暫停實例的處理方式：重試失敗的動作，或直接標記為失敗
 */
export enum ResolveType {
  RETRY = '1',
  FAIL = '2',
}

export type SortOrder = 'ASC' | 'DESC';

/**
 * API 回傳的原始 JSON 物件
 */
export type JsonObject = Record<string, unknown>;

/**
 * 實例列表查詢條件
 * 注意：未指定 from/to 時，API 預設只回傳最近 30 天
 */
export interface InstanceFilter {
  workflowName?: string;
  status?: WorkflowStatus;
  order?: SortOrder;
  from?: Date;
  to?: Date;
  /** 每頁筆數（僅供伺服器參考，預設 100） */
  pageSize?: number;
}

/**
 * 任務搜尋條件
 */
export interface TaskFilter {
  workflowName?: string;
  instanceId?: string;
  status?: TaskStatus;
  assignee?: string;
  from?: Date;
  to?: Date;
}

/**
 * 不分大小寫比對 enum 值，找不到時返回 undefined
 */
export function matchEnumValue<T extends string>(values: readonly T[], input: string): T | undefined {
  const lowered = input.trim().toLowerCase();
  return values.find((value) => value.toLowerCase() === lowered);
}

/** API 以 null 表示缺值，轉為 undefined */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const DateSchema = z.string().transform((value, ctx) => {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a valid date` });
    return z.NEVER;
  }
  return parsed;
});

export const WorkflowStatusSchema = z.preprocess(
  (value) => (typeof value === 'string' ? (matchEnumValue(Object.values(WorkflowStatus), value) ?? value) : value),
  z.nativeEnum(WorkflowStatus, {
    errorMap: (issue, ctx) => ({
      message:
        issue.code === z.ZodIssueCode.invalid_enum_value
          ? `unknown workflow status "${String(issue.received)}"`
          : ctx.defaultError,
    }),
  })
);

export const TaskStatusSchema = z.preprocess(
  (value) => (typeof value === 'string' ? (matchEnumValue(Object.values(TaskStatus), value) ?? value) : value),
  z.nativeEnum(TaskStatus, {
    errorMap: (issue, ctx) => ({
      message:
        issue.code === z.ZodIssueCode.invalid_enum_value
          ? `unknown task status "${String(issue.received)}"`
          : ctx.defaultError,
    }),
  })
);

/**
 * 工作流程實例 (GET /workflows/v2/instances)
 */
export const WorkflowInstanceSchema = z.object({
  instanceId: z.string(),
  instanceName: optional(z.string()),
  workflow: z.object({
    id: z.string(),
    name: z.string(),
    version: z.string(),
  }),
  startDateTime: DateSchema,
  endDateTime: optional(DateSchema),
  status: WorkflowStatusSchema,
  startEvent: z.object({
    eventType: z.string(),
  }),
});

export type WorkflowInstance = z.infer<typeof WorkflowInstanceSchema>;

/**
 * 實例中的單一動作
 */
export const InstanceActionSchema = z.object({
  id: z.string(),
  actionInstanceId: z.string(),
  name: z.string(),
  label: z.string(),
  type: z.string(),
  parentId: optional(z.string()),
  startDateTime: optional(DateSchema),
  endDateTime: optional(DateSchema),
  errorMessage: optional(z.string()),
  logMessage: optional(z.string()),
});

export type InstanceAction = z.infer<typeof InstanceActionSchema>;

/**
 * 實例明細 (GET /workflows/v2/instances/{instanceId})
 */
export const InstanceDetailSchema = z.object({
  instanceId: z.string(),
  name: optional(z.string()),
  startDateTime: DateSchema,
  status: z.string(),
  errorMessage: optional(z.string()),
  workflow: z.object({
    id: z.string(),
    name: z.string(),
    version: z.string(),
    eventType: z.string(),
  }),
  actions: z.array(InstanceActionSchema),
});

export type InstanceDetail = z.infer<typeof InstanceDetailSchema>;

/**
 * 任務指派
 */
export const TaskAssignmentSchema = z.object({
  id: z.string(),
  status: z.string(),
  assignee: z.string(),
  createdDate: DateSchema,
  completedBy: optional(z.string()),
  completedDate: optional(DateSchema),
  outcome: optional(z.string()),
  completedById: optional(z.string()),
  updatedDate: DateSchema,
  escalatedTo: optional(z.string()),
  urls: optional(z.object({ formUrl: z.string() })),
});

export type TaskAssignment = z.infer<typeof TaskAssignmentSchema>;

/**
 * 任務 (GET /workflows/v2/tasks)
 */
export const TaskSchema = z.object({
  assignmentBehavior: z.string(),
  completedDate: optional(DateSchema),
  completionCriteria: z.string(),
  createdDate: DateSchema,
  description: z.string(),
  dueDate: optional(DateSchema),
  id: z.string(),
  initiator: z.string(),
  isAuthenticated: z.boolean(),
  message: z.string(),
  modified: DateSchema,
  name: z.string(),
  outcomes: optional(z.array(z.string())),
  status: TaskStatusSchema,
  subject: z.string(),
  taskAssignments: z.array(TaskAssignmentSchema),
  workflowId: z.string(),
  workflowInstanceId: z.string(),
  workflowName: z.string(),
});

export type Task = z.infer<typeof TaskSchema>;

/**
 * 已發佈的工作流程設計 (GET /workflows/v1/designs/published)
 */
export const WorkflowDesignSchema = z.object({
  id: z.string(),
  name: z.string(),
  lastModified: DateSchema,
});

export type WorkflowDesign = z.infer<typeof WorkflowDesignSchema>;
