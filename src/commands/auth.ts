/**
 * Auth Command
 * 檢查憑證是否能換得 token（不輸出 token 本身）
 */

import { Command } from 'commander';
import { getApiClient } from '../lib/api-client.js';
import { outputData, runAction } from '../lib/output-formatter.js';

export const authCommand = new Command('auth').description('Authentication');

authCommand
  .command('check')
  .description('Request an access token and show when it expires')
  .action(async (_options: unknown, cmd: Command) => {
    await runAction(cmd, async (format) => {
      const client = getApiClient();
      const expiresAt = await client.ensureAuthenticated();

      outputData({ success: true, baseUrl: client.getBaseUrl(), expiresAt: expiresAt.toISOString() }, format, () => {
        console.log(`Authenticated against ${client.getBaseUrl()}`);
        console.log(`Token expires at ${expiresAt.toISOString()}`);
      });
    });
  });
