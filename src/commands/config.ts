/**
 * Config Command
 * 設定檔管理（環境變數優先於設定檔）
 */

import { Command, InvalidArgumentError } from 'commander';
import { outputData, runAction } from '../lib/output-formatter.js';
import { CONFIG_KEYS, ENV_KEYS, getConfigService, isConfigKey } from '../services/config.js';
import type { ConfigKey } from '../types/config.js';

function parseConfigKey(value: string): ConfigKey {
  if (!isConfigKey(value)) {
    throw new InvalidArgumentError(`Unknown key. Use one of: ${CONFIG_KEYS.join(', ')}.`);
  }
  return value;
}

/**
 * 只顯示 secret 的末四碼
 */
export function maskSecret(secret: string): string {
  return secret.length <= 4 ? '****' : `****${secret.slice(-4)}`;
}

export const configCommand = new Command('config').description('Manage configuration');

configCommand
  .command('show')
  .description('Show the effective configuration (secret masked)')
  .action(async (_options: unknown, cmd: Command) => {
    await runAction(cmd, async (format) => {
      const service = getConfigService();
      const config = service.getAll();
      const shown = {
        ...config,
        clientSecret: config.clientSecret ? maskSecret(config.clientSecret) : undefined,
      };
      const missing = service.getMissingKeys();

      outputData({ success: true, path: service.getConfigPath(), config: shown, missing }, format, () => {
        for (const key of CONFIG_KEYS) {
          console.log(`${key.padEnd(20)} ${shown[key] ?? '-'}  (${ENV_KEYS[key]})`);
        }
        if (missing.length > 0) {
          console.log(`\nMissing: ${missing.join(', ')}`);
        }
      });
    });
  });

configCommand
  .command('set <key> <value>')
  .description(`Write a value to the config file (${CONFIG_KEYS.join(', ')})`)
  .action(async (key: string, value: string, _options: unknown, cmd: Command) => {
    await runAction(cmd, async (format) => {
      const configKey = parseConfigKey(key);
      getConfigService().set(configKey, value);

      outputData({ success: true, key: configKey }, format, () => {
        console.log(`Saved ${configKey}`);
      });
    });
  });

configCommand
  .command('unset <key>')
  .description('Remove a value from the config file')
  .action(async (key: string, _options: unknown, cmd: Command) => {
    await runAction(cmd, async (format) => {
      const configKey = parseConfigKey(key);
      getConfigService().delete(configKey);

      outputData({ success: true, key: configKey }, format, () => {
        console.log(`Removed ${configKey}`);
      });
    });
  });

configCommand
  .command('path')
  .description('Show the config file location')
  .action(async (_options: unknown, cmd: Command) => {
    await runAction(cmd, async (format) => {
      const path = getConfigService().getConfigPath();
      outputData({ success: true, path }, format, () => {
        console.log(path);
      });
    });
  });
