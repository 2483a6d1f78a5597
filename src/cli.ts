#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { errorLabel } from './errors.js';
import { printBanner, VERSION } from './ui.js';

const program = new Command();

function fail(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`${chalk.red(errorLabel(err))} ${message}`);
  process.exit(1);
}

program
  .name('commitcraft')
  .description('Generate git commit messages with AI')
  .version(VERSION)
  .option('-c, --commit', 'Automatically create commit with generated message')
  .option('-m, --model <model>', 'Model to use for generation (overrides default_model from config)')
  .hook('preAction', () => {
    printBanner();
  })
  .action(async (opts: { commit?: boolean; model?: string }) => {
    const { loadConfig } = await import('./config.js');
    const { runGenerate } = await import('./generate.js');
    const { OpenRouterClient } = await import('./agent/openrouter.js');
    const { SpawnGitExecutor } = await import('./git/index.js');
    const { TerminalView, ReadlineLineReader, printModel } = await import('./ui.js');

    const config = loadConfig();
    const input = new ReadlineLineReader();
    try {
      await runGenerate(
        { autoCommit: opts.commit, model: opts.model },
        {
          config,
          git: new SpawnGitExecutor(process.cwd()),
          client: new OpenRouterClient({ apiUrl: config.apiUrl, apiKey: config.apiKey }),
          view: new TerminalView(),
          input,
          cwd: process.cwd(),
          showModel: (model) => printModel(model),
        },
      );
    } catch (err) {
      fail(err);
    } finally {
      input.close();
    }
  });

program
  .command('set')
  .description('Set configuration values like API key, URL, and default model')
  .argument('<key>', 'api_key, api_url or default_model')
  .argument('<value>', 'New value')
  .action(async (key: string, value: string) => {
    const { getConfigPath, parseConfigKey, readConfigFile, saveConfig, setConfigValue } = await import('./config.js');
    const { formatApiKey } = await import('./ui.js');
    try {
      const configKey = parseConfigKey(key);
      const configPath = getConfigPath();
      // file values only: an API key from the environment must not be written
      const updated = setConfigValue(readConfigFile(configPath), configKey, value);
      saveConfig(updated, configPath);
      const shown = configKey === 'api_key' ? formatApiKey(value) : chalk.cyan(value);
      console.log(`${chalk.green('✅ Configuration updated:')} ${chalk.blue(configKey)} = ${shown}`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('get')
  .description('Get configuration values like API key, URL, and default model')
  .argument('[key]', 'api_key, api_url or default_model')
  .action(async (key: string | undefined) => {
    const { getConfigPath, getConfigValue, loadConfig, parseConfigKey } = await import('./config.js');
    const { formatApiKey, printConfig } = await import('./ui.js');
    try {
      const configPath = getConfigPath();
      const config = loadConfig({ configPath });
      if (key === undefined) {
        printConfig(config, configPath);
        return;
      }
      const configKey = parseConfigKey(key);
      const value = getConfigValue(config, configKey);
      console.log(configKey === 'api_key' ? formatApiKey(value) : chalk.blue(value));
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync().catch(fail);
