import type { Command } from 'commander';
import chalk from 'chalk';
import { resolveConfigPath } from '../config.js';
import { findProvider, isRegisteredModel } from '../providers/base.js';
import { loadCliConfig } from './helpers.js';

export function registerModelsCommand(program: Command): void {
  program
    .command('models')
    .description('Show the configured council, chairman and provider')
    .option('--config <path>', 'Config file')
    .action(async (opts: { config?: string }) => {
      const config = await loadCliConfig(opts.config);
      const source = resolveConfigPath(opts.config) ?? 'built-in defaults';
      const provider = findProvider(config.provider.name);

      // Unregistered ids still work through the provider's first model
      const mark = (modelId: string): string =>
        provider && isRegisteredModel(provider, modelId) ? chalk.green('✓') : chalk.yellow('~');

      console.log('');
      console.log(chalk.dim(`Config: ${source}`));
      console.log(
        `Provider: ${chalk.bold(config.provider.name)}${provider ? '' : chalk.red(' (unknown to pi-ai)')}`,
      );
      console.log('');
      console.log(chalk.bold('Council:'));
      for (const model of config.councilModels) console.log(`  ${mark(model)} ${model}`);
      console.log(chalk.bold('Chairman:'));
      console.log(`  ${mark(config.chairmanModel)} ${config.chairmanModel}`);
      if (config.titleModel) {
        console.log(chalk.bold('Title model:'));
        console.log(`  ${mark(config.titleModel)} ${config.titleModel}`);
      }
      console.log('');
      console.log(
        chalk.dim(
          `fact-check: ${config.factCheck ? 'on' : 'off'} | streaming: ${config.streaming ? 'on' : 'off'} | timeout: ${config.timeoutSeconds}s`,
        ),
      );
    });
}
