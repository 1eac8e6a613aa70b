import { describe, it, expect } from 'vitest';
import {
  actionAge,
  isJsonObject,
  parseInstanceDetail,
  parseTask,
  parseTaskStatus,
  parseWorkflowDesign,
  parseWorkflowInstance,
  parseWorkflowStatus,
  supportsMultipleUsers,
  taskAge,
} from '../../src/lib/models.js';
import { ModelParseError } from '../../src/lib/errors.js';
import { TaskStatus, WorkflowStatus, type JsonObject } from '../../src/types/api.js';

function rawTask(overrides: JsonObject = {}): JsonObject {
  return {
    assignmentBehavior: 'AllMustRespond',
    completionCriteria: 'All',
    createdDate: '2030-01-01T08:00:00Z',
    description: 'Approve the leave request',
    id: 'task-1',
    initiator: 'ada@example.com',
    isAuthenticated: true,
    message: 'Please review',
    modified: '2030-01-01T09:00:00Z',
    name: 'Approval',
    outcomes: ['Approve', 'Reject'],
    status: 'active',
    subject: 'Leave request',
    taskAssignments: [
      {
        id: 'as-1',
        status: 'active',
        assignee: 'grace@example.com',
        createdDate: '2030-01-01T08:00:00Z',
        updatedDate: '2030-01-01T08:30:00Z',
      },
    ],
    workflowId: 'wf-1',
    workflowInstanceId: 'inst-1',
    workflowName: 'Leave',
    ...overrides,
  };
}

describe('isJsonObject', () => {
  it('should accept plain objects only', () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject('x')).toBe(false);
  });
});

describe('status parsing', () => {
  it('should match workflow statuses case-insensitively', () => {
    expect(parseWorkflowStatus('Running')).toBe(WorkflowStatus.RUNNING);
    expect(parseWorkflowStatus(' FAILED ')).toBe(WorkflowStatus.FAILED);
    expect(parseWorkflowStatus('paused')).toBeUndefined();
  });

  it('should match task statuses case-insensitively', () => {
    expect(parseTaskStatus('Active-Escalated')).toBe(TaskStatus.ESCALATED);
    expect(parseTaskStatus('all')).toBe(TaskStatus.ALL);
    expect(parseTaskStatus('done')).toBeUndefined();
  });
});

describe('parseWorkflowInstance', () => {
  it('should convert dates and status', () => {
    const instance = parseWorkflowInstance({
      instanceId: 'inst-1',
      workflow: { id: 'wf-1', name: 'Leave', version: '3' },
      startDateTime: '2030-01-01T08:00:00Z',
      endDateTime: null,
      status: 'Completed',
      startEvent: { eventType: 'nintex:form' },
    });

    expect(instance).toEqual({
      instanceId: 'inst-1',
      instanceName: undefined,
      workflow: { id: 'wf-1', name: 'Leave', version: '3' },
      startDateTime: new Date('2030-01-01T08:00:00Z'),
      endDateTime: undefined,
      status: WorkflowStatus.COMPLETED,
      startEvent: { eventType: 'nintex:form' },
    });
  });

  it('should name the model and field when a value is missing', () => {
    expect(() => parseWorkflowInstance({ instanceId: 'inst-1' })).toThrow(
      new ModelParseError('WorkflowInstance', 'workflow', 'is required')
    );
  });

  it('should reject an unknown status', () => {
    expect(() =>
      parseWorkflowInstance({
        instanceId: 'inst-1',
        workflow: { id: 'wf-1', name: 'Leave', version: '3' },
        startDateTime: '2030-01-01T08:00:00Z',
        status: 'sleeping',
        startEvent: { eventType: 'manual' },
      })
    ).toThrow('WorkflowInstance.status: unknown workflow status "sleeping"');
  });
});

describe('parseInstanceDetail', () => {
  it('should parse actions with optional fields', () => {
    const detail = parseInstanceDetail({
      instanceId: 'inst-1',
      startDateTime: '2030-01-01T08:00:00Z',
      status: 'Paused',
      workflow: { id: 'wf-1', name: 'Leave', version: '3', eventType: 'manual' },
      actions: [
        {
          id: 'a1',
          actionInstanceId: 'ai1',
          name: 'send-email',
          label: 'Send email',
          type: 'action',
          startDateTime: '2030-01-01T08:01:00Z',
          errorMessage: 'SMTP unavailable',
        },
      ],
    });

    expect(detail.actions).toHaveLength(1);
    expect(detail.actions[0].errorMessage).toBe('SMTP unavailable');
    expect(detail.actions[0].endDateTime).toBeUndefined();
    expect(actionAge(detail.actions[0], Date.parse('2030-01-01T08:02:00Z'))).toBe(60_000);
  });

  it('should point at the failing action', () => {
    expect(() =>
      parseInstanceDetail({
        instanceId: 'inst-1',
        startDateTime: '2030-01-01T08:00:00Z',
        status: 'Running',
        workflow: { id: 'wf-1', name: 'Leave', version: '3', eventType: 'manual' },
        actions: [{ id: 'a1' }],
      })
    ).toThrow('InstanceDetail.actions[0].actionInstanceId: is required');
  });
});

describe('parseTask', () => {
  it('should parse a task and its assignments', () => {
    const task = parseTask(rawTask());

    expect(task.status).toBe(TaskStatus.ACTIVE);
    expect(task.outcomes).toEqual(['Approve', 'Reject']);
    expect(task.createdDate).toEqual(new Date('2030-01-01T08:00:00Z'));
    expect(task.taskAssignments[0].assignee).toBe('grace@example.com');
    expect(task.taskAssignments[0].urls).toBeUndefined();
    expect(taskAge(task, Date.parse('2030-01-01T10:00:00Z'))).toBe(2 * 60 * 60 * 1000);
  });

  it('should reject an invalid date', () => {
    expect(() => parseTask(rawTask({ modified: 'yesterday' }))).toThrow('Task.modified: "yesterday" is not a valid date');
  });

  it('should point at the non-string outcome', () => {
    expect(() => parseTask(rawTask({ outcomes: ['Approve', 1] }))).toThrow('Task.outcomes[1]: must be a string');
  });

  it('should name the expected type of a mistyped field', () => {
    expect(() => parseTask(rawTask({ isAuthenticated: 'yes' }))).toThrow('Task.isAuthenticated: must be a boolean');
    expect(() => parseTask(rawTask({ taskAssignments: {} }))).toThrow('Task.taskAssignments: must be an array');
  });

  it('should treat null optional fields as absent', () => {
    const task = parseTask(rawTask({ dueDate: null, outcomes: null }));

    expect(task.dueDate).toBeUndefined();
    expect(task.outcomes).toBeUndefined();
  });

  it('should report a required field sent as null', () => {
    expect(() => parseTask(rawTask({ subject: null }))).toThrow('Task.subject: is required');
  });

  it('should require a task status', () => {
    const raw = rawTask();
    delete raw.status;

    expect(() => parseTask(raw)).toThrow('Task.status: is required');
  });

  it('should match the task status case-insensitively', () => {
    expect(parseTask(rawTask({ status: 'Active-Escalated' })).status).toBe(TaskStatus.ESCALATED);
  });

  it('should drop fields the model does not declare', () => {
    expect(parseTask(rawTask({ extra: 'ignored' }))).not.toHaveProperty('extra');
  });

  it('should detect multi-user tasks by assignment urls', () => {
    const single = parseTask(rawTask());
    const multi = parseTask(
      rawTask({
        taskAssignments: [
          {
            id: 'as-1',
            status: 'active',
            assignee: 'grace@example.com',
            createdDate: '2030-01-01T08:00:00Z',
            updatedDate: '2030-01-01T08:30:00Z',
            urls: { formUrl: 'https://forms.test/as-1' },
          },
        ],
      })
    );

    expect(supportsMultipleUsers(single)).toBe(false);
    expect(supportsMultipleUsers(multi)).toBe(true);
    expect(supportsMultipleUsers(parseTask(rawTask({ taskAssignments: [] })))).toBe(false);
  });

  it('should point at the failing assignment url', () => {
    expect(() =>
      parseTask(
        rawTask({
          taskAssignments: [
            {
              id: 'as-1',
              status: 'active',
              assignee: 'grace@example.com',
              createdDate: '2030-01-01T08:00:00Z',
              updatedDate: '2030-01-01T08:30:00Z',
              urls: {},
            },
          ],
        })
      )
    ).toThrow('Task.taskAssignments[0].urls.formUrl: is required');
  });
});

describe('parseWorkflowDesign', () => {
  it('should parse id, name and modification date', () => {
    expect(parseWorkflowDesign({ id: 'wf-1', name: 'Leave', lastModified: '2030-01-01T00:00:00Z' })).toEqual({
      id: 'wf-1',
      name: 'Leave',
      lastModified: new Date('2030-01-01T00:00:00Z'),
    });
  });
});
