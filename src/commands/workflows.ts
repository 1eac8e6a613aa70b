/**
 * Workflows Command
 * 工作流程設計指令
 */

import { Command } from 'commander';
import Table from 'cli-table3';
import { getApiClient } from '../lib/api-client.js';
import { parsePositiveInt } from '../lib/cli-options.js';
import { parseWorkflowDesign } from '../lib/models.js';
import { formatDate, outputData, runAction } from '../lib/output-formatter.js';
import { DEFAULT_WORKFLOW_LIMIT } from '../services/api.js';

export const workflowsCommand = new Command('workflows').description('Published workflow designs');

/**
 * nac workflows list
 */
workflowsCommand
  .command('list')
  .description('List published workflows')
  .option('--limit <n>', 'Items per page', parsePositiveInt, DEFAULT_WORKFLOW_LIMIT)
  .action(async (options: { limit: number }, cmd: Command) => {
    await runAction(cmd, async (format) => {
      const workflows = await getApiClient().listWorkflows(options.limit);

      outputData({ success: true, count: workflows.length, workflows }, format, () => {
        const table = new Table({ head: ['ID', 'Name', 'Last modified'], style: { head: ['cyan'] } });
        for (const raw of workflows) {
          const workflow = parseWorkflowDesign(raw);
          table.push([workflow.id, workflow.name, formatDate(workflow.lastModified)]);
        }
        console.log(table.toString());
        console.log(`${workflows.length} workflow(s)`);
      });
    });
  });

/**
 * nac workflows delete <workflowId> --yes
 */
workflowsCommand
  .command('delete <workflowId>')
  .description('Delete a workflow design')
  .requiredOption('--yes', 'Confirm the deletion')
  .action(async (workflowId: string, _options: { yes: boolean }, cmd: Command) => {
    await runAction(cmd, async (format) => {
      await getApiClient().deleteWorkflow(workflowId);

      outputData({ success: true, workflowId, deleted: true }, format, () => {
        console.log(`Deleted workflow ${workflowId}`);
      });
    });
  });
