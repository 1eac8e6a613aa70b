/**
 * CLI option parsers
 * commander 的參數轉換，無效值以 InvalidArgumentError 回報
 */

import { InvalidArgumentError } from 'commander';
import { ResolveType, type JsonObject, type SortOrder, type TaskStatus, type WorkflowStatus } from '../types/api.js';
import { isJsonObject, parseTaskStatus, parseWorkflowStatus } from './models.js';

export function parseDateOption(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`"${value}" is not a valid date.`);
  }
  return date;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`"${value}" is not a positive integer.`);
  }
  return parsed;
}

export function parseWorkflowStatusOption(value: string): WorkflowStatus {
  const status = parseWorkflowStatus(value);
  if (!status) {
    throw new InvalidArgumentError(`Unknown instance status "${value}".`);
  }
  return status;
}

export function parseTaskStatusOption(value: string): TaskStatus {
  const status = parseTaskStatus(value);
  if (!status) {
    throw new InvalidArgumentError(`Unknown task status "${value}".`);
  }
  return status;
}

export function parseOrderOption(value: string): SortOrder {
  switch (value.toUpperCase()) {
    case 'ASC':
      return 'ASC';
    case 'DESC':
      return 'DESC';
    default:
      throw new InvalidArgumentError('Order must be ASC or DESC.');
  }
}

export function parseResolveTypeOption(value: string): ResolveType {
  switch (value.toLowerCase()) {
    case 'retry':
    case ResolveType.RETRY:
      return ResolveType.RETRY;
    case 'fail':
    case ResolveType.FAIL:
      return ResolveType.FAIL;
    default:
      throw new InvalidArgumentError('Resolve type must be "retry" or "fail".');
  }
}

export function parseJsonObjectOption(value: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new InvalidArgumentError('Value is not valid JSON.');
  }
  if (!isJsonObject(parsed)) {
    throw new InvalidArgumentError('Value must be a JSON object.');
  }
  return parsed;
}

/**
 * 可重複的選項累加成陣列
 */
export function collectValues(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
