/**
 * Metrics Command
 * 以 Prometheus 文字格式輸出本次執行收集的指標
 */

import { Command } from 'commander';
import { getMetricsSnapshot } from '../lib/metrics.js';
import { runAction } from '../lib/output-formatter.js';

export const metricsCommand = new Command('metrics')
  .description('Print collected metrics in Prometheus text format')
  .action(async (_options: unknown, cmd: Command) => {
    await runAction(cmd, async () => {
      console.log(await getMetricsSnapshot());
    });
  });
