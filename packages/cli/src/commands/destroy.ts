import { createLogger } from '@stacksmith/shared';
import type { Config } from '@stacksmith/shared';
import { StatePersistenceError } from '@stacksmith/engine';
import { createContext, type RunContext } from '../context.js';
import { describeError, stdout, type Print } from '../output.js';
import { formatPlan, formatReport } from '../render.js';

export async function destroyCommand(
  config: Config,
  print: Print = stdout,
  signal?: AbortSignal
): Promise<number> {
  const logger = createLogger('cli');
  let context: RunContext | undefined;

  try {
    context = createContext(config);
    const plan = await context.reconciler.planDestroy();
    print(formatPlan(plan));
    print('');

    const report = await context.reconciler.applyPlan(plan, { signal });
    print(formatReport(report));
    return report.succeeded ? 0 : 1;
  } catch (err) {
    if (err instanceof StatePersistenceError && err.report) {
      print(formatReport(err.report));
    }
    logger.error('Destroy failed', describeError(err));
    print(`Error: ${describeError(err)}`);
    return 1;
  } finally {
    context?.close();
  }
}
