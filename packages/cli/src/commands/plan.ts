import { createLogger } from '@stacksmith/shared';
import type { Config } from '@stacksmith/shared';
import { createContext, type RunContext } from '../context.js';
import { describeError, stdout, type Print } from '../output.js';
import { formatPlan } from '../render.js';
import { loadStack } from '../stack-loader.js';

export async function planCommand(config: Config, print: Print = stdout): Promise<number> {
  const logger = createLogger('cli');
  let context: RunContext | undefined;

  try {
    const stack = await loadStack(config.stacksmith.stackFile);
    context = createContext(config);
    const plan = await context.reconciler.plan(stack.nodes);
    print(formatPlan(plan));
    return 0;
  } catch (err) {
    logger.error('Plan failed', describeError(err));
    print(`Error: ${describeError(err)}`);
    return 1;
  } finally {
    context?.close();
  }
}
