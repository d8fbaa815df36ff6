import { buildGraph } from '@stacksmith/engine';
import { loadConfig } from '../config-loader.js';
import { describeError, stdout, type Print } from '../output.js';
import { loadStack } from '../stack-loader.js';

export async function validateCommand(
  configPath?: string,
  print: Print = stdout,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  try {
    const config = loadConfig(configPath, env);
    const stack = await loadStack(config.stacksmith.stackFile, env);
    const graph = buildGraph(stack.nodes);

    print('Configuration is valid!');
    print('');
    print('Settings:');
    print(`  Stack:            ${stack.name} (${config.stacksmith.stackFile})`);
    print(`  Resources:        ${graph.nodes.size}`);
    print(`  State backend:    ${config.stacksmith.stateBackend} (${config.stacksmith.statePath})`);
    print(`  Provider db:      ${config.stacksmith.providerDbPath}`);
    print(`  Parallelism:      ${config.apply.parallelism}`);
    print(`  Max attempts:     ${config.apply.maxAttempts}`);
    print(`  Fail fast:        ${config.apply.failFast}`);
    print(`  Apply order:      ${graph.order.join(', ')}`);
    return 0;
  } catch (err) {
    print('Configuration validation failed!');
    print(describeError(err));
    return 1;
  }
}
