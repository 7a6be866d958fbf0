import type { Command } from 'commander';
import * as settings from '../config/settings.js';
import { SETTING_KEYS, type SettingKey } from '../config/schema.js';
import { getConfigPath } from '../core/userdata.js';
import { die } from '../ui/output.js';

function requireKey(key: string): SettingKey {
  if (!settings.isSettingKey(key)) {
    die(`Unknown setting: ${key} (known: ${SETTING_KEYS.join(', ')})`);
  }
  return key;
}

export function registerConfig(program: Command): void {
  const cmd = program
    .command('config')
    .description('Manage user settings');

  cmd
    .command('set')
    .description('Set a config value')
    .argument('<key>', 'Config key')
    .argument('<value>', 'Config value')
    .action((key: string, value: string) => {
      try {
        settings.init(getConfigPath());
        settings.set(requireKey(key), value);
        console.log(`Set ${key} = ${settings.get(requireKey(key))}`);
      } catch (err) {
        die(err);
      }
    });

  cmd
    .command('get')
    .description('Get a config value')
    .argument('<key>', 'Config key')
    .action((key: string) => {
      try {
        settings.init(getConfigPath());
        const value = settings.get(requireKey(key));
        if (value) {
          console.log(value);
        }
      } catch (err) {
        die(err);
      }
    });

  cmd
    .command('unset')
    .description('Remove a config value')
    .argument('<key>', 'Config key')
    .action((key: string) => {
      try {
        settings.init(getConfigPath());
        settings.unset(requireKey(key));
        console.log(`Unset ${key}`);
      } catch (err) {
        die(err);
      }
    });

  cmd
    .command('list')
    .description('Show all config values')
    .action(() => {
      try {
        settings.init(getConfigPath());
        for (const [key, value] of Object.entries(settings.all())) {
          console.log(`${key} = ${String(value)}`);
        }
      } catch (err) {
        die(err);
      }
    });
}
