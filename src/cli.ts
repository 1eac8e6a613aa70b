import { Command } from 'commander';
import { instancesCommand } from './commands/instances.js';
import { tasksCommand } from './commands/tasks.js';
import { workflowsCommand } from './commands/workflows.js';
import { authCommand } from './commands/auth.js';
import { configCommand } from './commands/config.js';
import { metricsCommand } from './commands/metrics.js';
import { isValidFormat } from './lib/output-formatter.js';
import { setLogLevel } from './lib/logger.js';

export const cli = new Command();

cli
  .name('nac')
  .description('Nintex Automation Cloud workflow CLI')
  .version('0.1.0');

// 全域選項
cli
  .option('-f, --format <format>', 'Output format: json (default) | table', 'json')
  .option('-v, --verbose', 'Log requests, retries and pagination to stderr');

cli.hook('preAction', (thisCommand) => {
  const { format, verbose } = thisCommand.opts<{ format: string; verbose?: boolean }>();
  if (!isValidFormat(format)) {
    thisCommand.error(`error: unknown format "${format}" (use json or table)`);
  }
  if (verbose) {
    setLogLevel('debug');
  }
});

// 註冊指令
cli.addCommand(instancesCommand);
cli.addCommand(tasksCommand);
cli.addCommand(workflowsCommand);
cli.addCommand(authCommand);
cli.addCommand(configCommand);
cli.addCommand(metricsCommand);
