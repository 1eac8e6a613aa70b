/**
 * Model Parsers
 * 以 zod schema 將 API 回傳的原始 JSON 轉為型別模型（日期轉 Date、狀態轉 enum）
 */

import type { z } from 'zod';
import {
  InstanceDetailSchema,
  TaskSchema,
  TaskStatus,
  WorkflowDesignSchema,
  WorkflowInstanceSchema,
  WorkflowStatus,
  matchEnumValue,
  type InstanceAction,
  type InstanceDetail,
  type JsonObject,
  type Task,
  type WorkflowDesign,
  type WorkflowInstance,
} from '../types/api.js';
import { ModelParseError } from './errors.js';
import { ageOf } from './time-utils.js';

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * ['actions', 0, 'id'] → 'actions[0].id'
 */
function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((field, key) => {
    if (typeof key === 'number') {
      return `${field}[${key}]`;
    }
    return field ? `${field}.${key}` : key;
  }, '');
}

function describeIssue(issue: z.ZodIssue): string {
  if (issue.code === 'invalid_type') {
    if (issue.received === 'undefined' || issue.received === 'null') {
      return 'is required';
    }
    const article = issue.expected === 'object' || issue.expected === 'array' ? 'an' : 'a';
    return `must be ${article} ${issue.expected}`;
  }
  return issue.message;
}

/**
 * 以 schema 驗證，第一個問題轉為帶模型與欄位名稱的 ModelParseError
 */
function parseWith<S extends z.ZodTypeAny>(model: string, schema: S, raw: JsonObject): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new ModelParseError(model, formatPath(issue.path) || '(root)', describeIssue(issue));
  }
  return result.data;
}

/**
 * 不分大小寫解析實例狀態
 */
export function parseWorkflowStatus(value: string): WorkflowStatus | undefined {
  return matchEnumValue(Object.values(WorkflowStatus), value);
}

/**
 * 不分大小寫解析任務狀態
 */
export function parseTaskStatus(value: string): TaskStatus | undefined {
  return matchEnumValue(Object.values(TaskStatus), value);
}

export function parseWorkflowInstance(raw: JsonObject): WorkflowInstance {
  return parseWith('WorkflowInstance', WorkflowInstanceSchema, raw);
}

export function parseInstanceDetail(raw: JsonObject): InstanceDetail {
  return parseWith('InstanceDetail', InstanceDetailSchema, raw);
}

export function parseTask(raw: JsonObject): Task {
  return parseWith('Task', TaskSchema, raw);
}

export function parseWorkflowDesign(raw: JsonObject): WorkflowDesign {
  return parseWith('WorkflowDesign', WorkflowDesignSchema, raw);
}

/**
 * 任務建立至今的毫秒數
 */
export function taskAge(task: Task, now: number = Date.now()): number {
  return ageOf(task.createdDate, now);
}

/**
 * 動作開始至今的毫秒數（尚未開始為 0）
 */
export function actionAge(action: InstanceAction, now: number = Date.now()): number {
  return ageOf(action.startDateTime, now);
}

/**
 * 由「指派任務給多位使用者」動作建立的任務，其指派會帶有 urls
 */
export function supportsMultipleUsers(task: Task): boolean {
  return task.taskAssignments.length > 0 && task.taskAssignments[0].urls !== undefined;
}
