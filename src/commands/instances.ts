/**
 * Instances Command
 * 工作流程實例指令
 */

import { Command } from 'commander';
import Table from 'cli-table3';
import { getApiClient } from '../lib/api-client.js';
import {
  parseDateOption,
  parseJsonObjectOption,
  parseOrderOption,
  parsePositiveInt,
  parseResolveTypeOption,
  parseWorkflowStatusOption,
} from '../lib/cli-options.js';
import { parseInstanceDetail, parseWorkflowInstance } from '../lib/models.js';
import { formatDate, outputData, runAction } from '../lib/output-formatter.js';
import type { InstanceFilter, JsonObject, ResolveType, SortOrder, WorkflowStatus } from '../types/api.js';

interface ListOptions {
  workflowName?: string;
  status?: WorkflowStatus;
  order?: SortOrder;
  from?: Date;
  to?: Date;
  pageSize?: number;
}

export const instancesCommand = new Command('instances').description('Workflow instances');

/**
 * nac instances list
 */
instancesCommand
  .command('list')
  .description('List workflow instances (all pages; the API defaults to the last 30 days)')
  .option('--workflow-name <name>', 'Filter by workflow name')
  .option('--status <status>', 'running | completed | failed | terminated', parseWorkflowStatusOption)
  .option('--order <order>', 'ASC | DESC', parseOrderOption)
  .option('--from <date>', 'Start of the date range', parseDateOption)
  .option('--to <date>', 'End of the date range', parseDateOption)
  .option('--page-size <n>', 'Items per page', parsePositiveInt)
  .action(async (options: ListOptions, cmd: Command) => {
    await runAction(cmd, async (format) => {
      const filter: InstanceFilter = { ...options };
      const instances = await getApiClient().listInstances(filter);

      outputData({ success: true, count: instances.length, instances }, format, () => {
        printInstancesTable(instances);
      });
    });
  });

/**
 * nac instances get <instanceId>
 */
instancesCommand
  .command('get <instanceId>')
  .description('Show an instance with its actions')
  .action(async (instanceId: string, _options: unknown, cmd: Command) => {
    await runAction(cmd, async (format) => {
      const instance = await getApiClient().getInstance(instanceId);

      outputData({ success: true, instance }, format, () => {
        const detail = parseInstanceDetail(instance);
        console.log(`\n${detail.workflow.name} (${detail.instanceId})`);
        console.log(`Status:  ${detail.status}`);
        console.log(`Started: ${formatDate(detail.startDateTime)}`);
        if (detail.errorMessage) {
          console.log(`Error:   ${detail.errorMessage}`);
        }

        const table = new Table({
          head: ['Action', 'Type', 'Started', 'Ended', 'Message'],
          style: { head: ['cyan'] },
          wordWrap: true,
        });
        for (const action of detail.actions) {
          table.push([
            action.label || action.name,
            action.type,
            formatDate(action.startDateTime),
            formatDate(action.endDateTime),
            action.errorMessage ?? action.logMessage ?? '',
          ]);
        }
        console.log(table.toString());
      });
    });
  });

/**
 * nac instances start-data <instanceId>
 */
instancesCommand
  .command('start-data <instanceId>')
  .description('Show the start data of an instance')
  .action(async (instanceId: string, _options: unknown, cmd: Command) => {
    await runAction(cmd, async (format) => {
      const startData = await getApiClient().getInstanceStartData(instanceId);

      outputData({ success: true, startData }, format, () => {
        const table = new Table({ head: ['Field', 'Value'], style: { head: ['cyan'] } });
        for (const [key, value] of Object.entries(startData)) {
          table.push([key, typeof value === 'string' ? value : JSON.stringify(value)]);
        }
        console.log(table.toString());
      });
    });
  });

/**
 * nac instances create <workflowId> --data '{"field":"value"}'
 */
instancesCommand
  .command('create <workflowId>')
  .description('Start a new instance of a published workflow')
  .option('--data <json>', 'Start data as a JSON object', parseJsonObjectOption)
  .action(async (workflowId: string, options: { data?: JsonObject }, cmd: Command) => {
    await runAction(cmd, async (format) => {
      const result = await getApiClient().createInstance(workflowId, options.data ?? {});

      outputData({ success: true, result }, format, () => {
        const instanceId = result && typeof result.instanceId === 'string' ? result.instanceId : undefined;
        console.log(instanceId ? `Started instance ${instanceId}` : `Started workflow ${workflowId}`);
      });
    });
  });

/**
 * nac instances resolve <instanceId> --type retry|fail --message <text>
 */
instancesCommand
  .command('resolve <instanceId>')
  .description('Resolve a paused instance')
  .requiredOption('--type <type>', 'retry | fail', parseResolveTypeOption)
  .requiredOption('--message <text>', 'Message shown on the instance page')
  .action(async (instanceId: string, options: { type: ResolveType; message: string }, cmd: Command) => {
    await runAction(cmd, async (format) => {
      await getApiClient().resolveInstance(instanceId, options.type, options.message);

      outputData({ success: true, instanceId, resolveType: options.type }, format, () => {
        console.log(`Resolved instance ${instanceId}`);
      });
    });
  });

function printInstancesTable(instances: JsonObject[]): void {
  if (instances.length === 0) {
    console.log('No instances found.');
    return;
  }

  const table = new Table({
    head: ['Instance', 'Workflow', 'Status', 'Started', 'Ended'],
    style: { head: ['cyan'] },
  });
  for (const raw of instances) {
    const instance = parseWorkflowInstance(raw);
    table.push([
      instance.instanceId,
      instance.workflow.name,
      instance.status,
      formatDate(instance.startDateTime),
      formatDate(instance.endDateTime),
    ]);
  }
  console.log(table.toString());
  console.log(`${instances.length} instance(s)`);
}
