import { createInterface } from 'node:readline';
import type { Command } from 'commander';
import { ConfigService, JsonConfigStore, parseModelList } from '@synod/core';
import { getConfigDir } from '../adapters/xdg-paths.js';

const CONFIG_KEYS = 'api-key, chairman, council, web-search';

function prompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export function maskApiKey(apiKey: string): string {
  return apiKey ? '***' + apiKey.slice(-4) : '(not set)';
}

export function parseBoolean(value: string): boolean | null {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return null;
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage configuration');

  const createConfigService = () => {
    const configStore = new JsonConfigStore(getConfigDir());
    return { configStore, configService: new ConfigService(configStore) };
  };

  config
    .command('show')
    .description('Show current configuration')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      const { configService } = createConfigService();
      const resolved = await configService.resolve();

      const display = {
        openRouterApiKey: maskApiKey(resolved.openRouterApiKey),
        openRouterApiUrl: resolved.openRouterApiUrl,
        councilModels: resolved.councilModels,
        chairmanModel: resolved.chairmanModel,
        webSearchEnabled: resolved.webSearchEnabled,
        configDir: getConfigDir(),
      };

      if (opts.json) {
        console.log(JSON.stringify(display, null, 2));
      } else {
        console.log(`\n  Configuration:`);
        console.log(`  API Key:        ${display.openRouterApiKey}`);
        console.log(`  API URL:        ${display.openRouterApiUrl}`);
        console.log(`  Council:        ${display.councilModels.join(', ')}`);
        console.log(`  Chairman:       ${display.chairmanModel}`);
        console.log(`  Web Search:     ${display.webSearchEnabled ? 'on' : 'off'}`);
        console.log(`  Config Dir:     ${display.configDir}`);
        console.log();
      }
    });

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', `Configuration key (${CONFIG_KEYS})`)
    .argument('[value]', 'Value to set')
    .action(async (key: string, value?: string) => {
      const { configService } = createConfigService();

      switch (key) {
        case 'api-key': {
          const apiKey = value ?? await prompt('OpenRouter API Key: ');
          if (!apiKey) {
            console.error('No API key provided.');
            process.exit(1);
          }
          await configService.saveCouncilConfig({ apiKey });
          console.log('API key saved.');
          break;
        }
        case 'chairman': {
          if (!value) {
            console.error('Usage: synod config set chairman <model-id>');
            process.exit(1);
          }
          await configService.saveCouncilConfig({ chairmanModel: value });
          console.log(`Chairman model set to: ${value}`);
          break;
        }
        case 'council': {
          const models = parseModelList(value ?? '');
          if (models.length === 0) {
            console.error('Usage: synod config set council <model1,model2,...>');
            process.exit(1);
          }
          await configService.saveCouncilConfig({ councilModels: models });
          console.log(`Council models set to: ${models.join(', ')}`);
          break;
        }
        case 'web-search': {
          const enabled = parseBoolean(value ?? '');
          if (enabled === null) {
            console.error('Usage: synod config set web-search <on|off>');
            process.exit(1);
          }
          await configService.saveCouncilConfig({ webSearchEnabled: enabled });
          console.log(`Web search ${enabled ? 'enabled' : 'disabled'}.`);
          break;
        }
        default:
          console.error(`Unknown config key: ${key}. Valid keys: ${CONFIG_KEYS}`);
          process.exit(1);
      }
    });

  config
    .command('reset')
    .description('Reset council configuration to defaults')
    .action(async () => {
      const { configService } = createConfigService();
      await configService.reset();
      console.log('Configuration reset to defaults.');
    });

  config
    .command('path')
    .description('Print the preferences file location')
    .action(() => {
      console.log(createConfigService().configStore.prefsPath);
    });

  config.action(async () => {
    await config.commands.find((c) => c.name() === 'show')?.parseAsync([], { from: 'user' });
  });
}
