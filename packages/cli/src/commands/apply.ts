import { createLogger } from '@stacksmith/shared';
import type { Config } from '@stacksmith/shared';
import { StatePersistenceError } from '@stacksmith/engine';
import { createContext, type RunContext } from '../context.js';
import { describeError, stdout, type Print } from '../output.js';
import { formatPlan, formatReport } from '../render.js';
import { loadStack } from '../stack-loader.js';

/**
 * Exit code 0 only when every node reached Succeeded.
 */
export async function applyCommand(
  config: Config,
  print: Print = stdout,
  signal?: AbortSignal
): Promise<number> {
  const logger = createLogger('cli');
  let context: RunContext | undefined;

  try {
    const stack = await loadStack(config.stacksmith.stackFile);
    context = createContext(config, {
      onStatusChange: (result) => logger.debug(`${result.id}: ${result.status}`),
    });

    const plan = await context.reconciler.plan(stack.nodes);
    print(formatPlan(plan));
    print('');

    const report = await context.reconciler.applyPlan(plan, { signal });
    print(formatReport(report));
    return report.succeeded ? 0 : 1;
  } catch (err) {
    if (err instanceof StatePersistenceError && err.report) {
      print(formatReport(err.report));
    }
    logger.error('Apply failed', describeError(err));
    print(`Error: ${describeError(err)}`);
    return 1;
  } finally {
    context?.close();
  }
}
