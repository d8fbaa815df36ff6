#!/usr/bin/env node
import { Command } from 'commander';
import { isLogLevel, setLogLevel } from '@stacksmith/shared';
import type { Config } from '@stacksmith/shared';
import { loadConfig } from './config-loader.js';
import { planCommand } from './commands/plan.js';
import { applyCommand } from './commands/apply.js';
import { destroyCommand } from './commands/destroy.js';
import { validateCommand } from './commands/validate.js';

interface CommonOptions {
  config?: string;
  stack?: string;
  logLevel?: string;
}

interface ApplyOptions extends CommonOptions {
  parallelism?: string;
  failFast?: boolean;
}

function resolveConfig(options: ApplyOptions): Config {
  const config = loadConfig(options.config);
  if (options.stack) config.stacksmith.stackFile = options.stack;
  if (options.parallelism) config.apply.parallelism = parseInt(options.parallelism, 10);
  if (options.failFast) config.apply.failFast = true;

  const level = options.logLevel ?? config.logging.level;
  if (isLogLevel(level)) setLogLevel(level);
  return config;
}

// In-flight operations finish; nothing new is dispatched after Ctrl+C
function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);
  process.once('SIGTERM', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onInterrupt);
      process.off('SIGTERM', onInterrupt);
    },
  };
}

const program = new Command();

program
  .name('stacksmith')
  .description('Stacksmith - dependency-aware plan and apply for serverless stacks')
  .version('0.1.0');

program
  .command('plan')
  .description('Show what apply would change')
  .option('-c, --config <path>', 'Path to config file')
  .option('-s, --stack <path>', 'Path to stack file')
  .option('-l, --log-level <level>', 'Log level (debug, info, warn, error)')
  .action(async (options: CommonOptions) => {
    process.exitCode = await planCommand(resolveConfig(options));
  });

program
  .command('apply')
  .description('Create, update, replace and destroy resources to match the stack')
  .option('-c, --config <path>', 'Path to config file')
  .option('-s, --stack <path>', 'Path to stack file')
  .option('-l, --log-level <level>', 'Log level (debug, info, warn, error)')
  .option('-p, --parallelism <n>', 'Maximum concurrent provider operations')
  .option('--fail-fast', 'Stop dispatching after the first failure')
  .action(async (options: ApplyOptions) => {
    const interrupt = interruptSignal();
    try {
      process.exitCode = await applyCommand(resolveConfig(options), undefined, interrupt.signal);
    } finally {
      interrupt.dispose();
    }
  });

program
  .command('destroy')
  .description('Destroy every recorded resource, dependents first')
  .option('-c, --config <path>', 'Path to config file')
  .option('-l, --log-level <level>', 'Log level (debug, info, warn, error)')
  .option('-p, --parallelism <n>', 'Maximum concurrent provider operations')
  .action(async (options: ApplyOptions) => {
    const interrupt = interruptSignal();
    try {
      process.exitCode = await destroyCommand(resolveConfig(options), undefined, interrupt.signal);
    } finally {
      interrupt.dispose();
    }
  });

program
  .command('validate')
  .description('Validate the configuration and stack files')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: CommonOptions) => {
    process.exitCode = await validateCommand(options.config);
  });

await program.parseAsync();
