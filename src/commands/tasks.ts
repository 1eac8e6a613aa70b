/**
 * Tasks Command
 * 任務指令
 */

import { Command } from 'commander';
import Table from 'cli-table3';
import { getApiClient } from '../lib/api-client.js';
import { collectValues, parseDateOption, parseTaskStatusOption } from '../lib/cli-options.js';
import { parseTask, taskAge } from '../lib/models.js';
import { formatAge, formatDate, outputData, runAction } from '../lib/output-formatter.js';
import type { JsonObject, TaskFilter, TaskStatus } from '../types/api.js';

interface SearchOptions {
  workflowName?: string;
  instanceId?: string;
  status?: TaskStatus;
  assignee?: string;
  from?: Date;
  to?: Date;
}

export const tasksCommand = new Command('tasks').description('Workflow tasks');

/**
 * nac tasks search
 */
tasksCommand
  .command('search')
  .description('Search tasks (all pages; the API defaults to the last 30 days)')
  .option('--workflow-name <name>', 'Filter by workflow name')
  .option('--instance-id <id>', 'Filter by workflow instance')
  .option('--status <status>', 'active | active-escalated | expired | complete | overridden | terminated | paused | all', parseTaskStatusOption)
  .option('--assignee <email>', 'Filter by assignee')
  .option('--from <date>', 'Start of the date range', parseDateOption)
  .option('--to <date>', 'End of the date range', parseDateOption)
  .action(async (options: SearchOptions, cmd: Command) => {
    await runAction(cmd, async (format) => {
      const filter: TaskFilter = { ...options };
      const tasks = await getApiClient().searchTasks(filter);

      outputData({ success: true, count: tasks.length, tasks }, format, () => {
        printTasksTable(tasks);
      });
    });
  });

/**
 * nac tasks get <taskId>
 */
tasksCommand
  .command('get <taskId>')
  .description('Show a task with its assignments')
  .action(async (taskId: string, _options: unknown, cmd: Command) => {
    await runAction(cmd, async (format) => {
      const task = await getApiClient().getTask(taskId);

      outputData({ success: true, task }, format, () => {
        const model = parseTask(task);
        console.log(`\n${model.subject} (${model.id})`);
        console.log(`Workflow: ${model.workflowName} / ${model.workflowInstanceId}`);
        console.log(`Status:   ${model.status}`);
        console.log(`Outcomes: ${model.outcomes?.join(', ') ?? '-'}`);

        const table = new Table({
          head: ['Assignment', 'Assignee', 'Status', 'Created', 'Outcome'],
          style: { head: ['cyan'] },
        });
        for (const assignment of model.taskAssignments) {
          table.push([
            assignment.id,
            assignment.assignee,
            assignment.status,
            formatDate(assignment.createdDate),
            assignment.outcome ?? '',
          ]);
        }
        console.log(table.toString());
      });
    });
  });

/**
 * nac tasks complete <taskId> <assignmentId> <outcome>
 */
tasksCommand
  .command('complete <taskId> <assignmentId> <outcome>')
  .description('Complete a task assignment with one of its outcomes')
  .action(async (taskId: string, assignmentId: string, outcome: string, _options: unknown, cmd: Command) => {
    await runAction(cmd, async (format) => {
      const result = await getApiClient().completeTask(taskId, assignmentId, outcome);

      outputData({ success: true, taskId, assignmentId, outcome, result }, format, () => {
        console.log(`Completed assignment ${assignmentId} with outcome "${outcome}"`);
      });
    });
  });

/**
 * nac tasks delegate <taskId> <assignmentId> --to a@example.com --to b@example.com
 */
tasksCommand
  .command('delegate <taskId> <assignmentId>')
  .description('Delegate a task assignment to other users')
  .requiredOption('--to <email>', 'Assignee email (repeatable)', collectValues)
  .option('--message <text>', 'Message sent to the new assignees', '')
  .action(
    async (taskId: string, assignmentId: string, options: { to: string[]; message: string }, cmd: Command) => {
      await runAction(cmd, async (format) => {
        await getApiClient().delegateTask(taskId, assignmentId, options.to, options.message);

        outputData({ success: true, taskId, assignmentId, assignees: options.to }, format, () => {
          console.log(`Delegated assignment ${assignmentId} to ${options.to.join(', ')}`);
        });
      });
    }
  );

function printTasksTable(tasks: JsonObject[]): void {
  if (tasks.length === 0) {
    console.log('No tasks found.');
    return;
  }

  const now = Date.now();
  const table = new Table({
    head: ['Task', 'Workflow', 'Subject', 'Status', 'Age'],
    style: { head: ['cyan'] },
    wordWrap: true,
  });
  for (const raw of tasks) {
    const task = parseTask(raw);
    table.push([task.id, task.workflowName, task.subject, task.status, formatAge(taskAge(task, now))]);
  }
  console.log(table.toString());
  console.log(`${tasks.length} task(s)`);
}
