import type { Command } from 'commander';
import chalk from 'chalk';
import { summarizeErrors } from '../classification.js';
import { toDeliberationConfig } from '../config.js';
import type { CouncilConfig } from '../config-schema.js';
import { Deliberation, type DeliberationConfig } from '../council.js';
import { ConfigError, DeliberationError } from '../errors.js';
import { createGateway } from '../providers/base.js';
import type { DeliberationResult, ModelGateway } from '../types.js';
import { CLIError, loadCliConfig, parseSeconds, readStdin, splitList } from './helpers.js';
import { ProgressRenderer, formatDiagnostic, formatErrorSummary } from './render.js';

export interface AskOptions {
  models?: string;
  chairman?: string;
  /** false when --no-fact-check is given */
  factCheck?: boolean;
  timeout?: string;
  live?: boolean;
  json?: boolean;
  title?: boolean;
  classify?: boolean;
  verbose?: boolean;
  config?: string;
}

/** Config file values with command-line overrides applied. */
export function resolveAskConfig(config: CouncilConfig, opts: AskOptions): DeliberationConfig {
  const base = toDeliberationConfig(config);
  let councilModels = base.councilModels;
  if (opts.models !== undefined) {
    councilModels = splitList(opts.models);
    if (councilModels.length === 0) {
      throw new CLIError(chalk.red('--models needs at least one model id'));
    }
  }
  return {
    ...base,
    councilModels,
    chairmanModel: opts.chairman?.trim() || base.chairmanModel,
    factCheck: opts.factCheck === false ? false : base.factCheck,
    streaming: opts.live ? true : base.streaming,
    timeoutMs: opts.timeout !== undefined ? parseSeconds(opts.timeout, '--timeout') * 1000 : base.timeoutMs,
    titleModel: opts.title ? (base.titleModel ?? base.chairmanModel) : base.titleModel,
    classifyErrors: opts.classify ? true : base.classifyErrors,
  };
}

async function resolveQuestion(question: string | undefined): Promise<string> {
  if (question?.trim()) return question.trim();
  if (process.stdin.isTTY) {
    throw new CLIError(
      chalk.red('No question provided. Usage: fact-council ask "your question"') +
        '\n' +
        chalk.dim('Or pipe: echo "question" | fact-council ask'),
    );
  }
  const piped = (await readStdin()).trim();
  if (!piped) throw new CLIError(chalk.red('Empty input.'));
  return piped;
}

function gatewayFor(config: CouncilConfig): ModelGateway {
  try {
    return createGateway({
      provider: config.provider.name,
      apiKey: config.provider.apiKey,
      baseUrl: config.provider.baseUrl,
    });
  } catch (err) {
    if (err instanceof ConfigError) throw new CLIError(chalk.red(err.message), 2);
    throw err;
  }
}

function printResult(result: DeliberationResult): void {
  console.log('');
  console.log(chalk.bold.green('━'.repeat(60)));
  if (result.title) console.log(chalk.bold(result.title));
  console.log('');
  console.log(result.synthesis.text);
  console.log('');
  console.log(chalk.bold.green('━'.repeat(60)));
  if (result.classifiedErrors) {
    for (const line of formatErrorSummary(summarizeErrors(result.classifiedErrors))) console.log(line);
  }
  const calls = result.stats.map((s) => `${s.stage} ${s.succeeded}/${s.attempted}`).join(' · ');
  console.log(chalk.dim(`  ${calls} | chairman: ${result.synthesis.modelId}`));
}

export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Ask the council a question')
    .argument('[question]', 'Question to ask (or pipe via stdin)')
    .option('-m, --models <ids>', 'Comma-separated council model ids (repeat an id for extra instances)')
    .option('-c, --chairman <id>', 'Chairman model id')
    .option('--no-fact-check', 'Skip the fact-checking stage')
    .option('--timeout <seconds>', 'Per-call timeout in seconds')
    .option('--live', 'Show streaming text from each model as it arrives')
    .option('--json', 'Output the full result as JSON (for piping)')
    .option('--title', 'Generate a conversation title')
    .option('--classify', 'Classify factual errors found by the fact-checkers')
    .option('-v, --verbose', 'Show diagnostics (failed calls, parse fallbacks, discarded labels)')
    .option('--config <path>', 'Config file (default: ./council.yaml, then ~/.fact-council/config.yaml)')
    .action(async (question: string | undefined, opts: AskOptions) => {
      const text = await resolveQuestion(question);

      const config = await loadCliConfig(opts.config);
      const gateway = gatewayFor(config);
      const deliberationConfig = resolveAskConfig(config, opts);

      const controller = new AbortController();
      process.once('SIGINT', () => controller.abort());

      const renderer = opts.json ? null : new ProgressRenderer(Boolean(opts.live));
      if (renderer) {
        console.log('');
        console.log(chalk.bold.cyan(`🏛️  Council of ${deliberationConfig.councilModels.length}`));
        for (const model of deliberationConfig.councilModels) {
          console.log(`  ${chalk.green('✓')} ${chalk.bold(model)}`);
        }
        console.log(chalk.dim(`  Chairman: ${deliberationConfig.chairmanModel}`));
      }

      const deliberation = new Deliberation(gateway, deliberationConfig, {
        signal: controller.signal,
        onEvent: renderer ? (event) => renderer.handle(event) : undefined,
        onDiagnostic: opts.verbose ? (d) => console.error(formatDiagnostic(d)) : undefined,
      });

      try {
        const result = await deliberation.run(text);
        if (opts.json) console.log(JSON.stringify(result, null, 2));
        else printResult(result);
      } catch (err) {
        if (err instanceof DeliberationError) {
          if (opts.json) {
            console.log(JSON.stringify({ error: { stage: err.stage, reason: err.reason }, partial: err.partial }, null, 2));
          }
          throw new CLIError(chalk.red(err.message), err.stage === 'cancelled' ? 130 : 1);
        }
        throw err;
      }
    });
}
