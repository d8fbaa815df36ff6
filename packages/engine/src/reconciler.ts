import { createLogger } from "@stacksmith/shared";
import type { ApplyReport, Plan, ResourceNode } from "@stacksmith/shared";
import { ApplyExecutor, type ApplyOptions, type ApplyRunOptions } from "./apply/executor.js";
import { Planner } from "./plan/planner.js";
import type { ProvisioningProvider } from "./provider/types.js";
import type { StateStore } from "./state/store.js";

export interface ReconcilerOptions {
  store: StateStore;
  provider: ProvisioningProvider;
  apply?: ApplyOptions;
}

export interface ApplyOutcome {
  plan: Plan;
  report: ApplyReport;
}

/**
 * Reconciler ties the Planner and ApplyExecutor together over one state store.
 */
export class Reconciler {
  private logger = createLogger("reconciler");
  private planner = new Planner();
  private executor: ApplyExecutor;
  private store: StateStore;

  constructor(options: ReconcilerOptions) {
    this.store = options.store;
    this.executor = new ApplyExecutor(options.store, options.provider, options.apply);
  }

  async plan(declared: ResourceNode[]): Promise<Plan> {
    const records = await this.store.load();
    return this.planner.plan(declared, records);
  }

  async apply(declared: ResourceNode[], run: ApplyRunOptions = {}): Promise<ApplyOutcome> {
    const plan = await this.plan(declared);
    const report = await this.applyPlan(plan, run);
    return { plan, report };
  }

  /**
   * Execute a plan computed earlier. The plan should come from the current
   * state; records are re-read before execution.
   */
  async applyPlan(plan: Plan, run: ApplyRunOptions = {}): Promise<ApplyReport> {
    const pending = plan.entries.filter((entry) => entry.action !== "NoOp").length;
    this.logger.info(`Applying plan: ${pending} of ${plan.entries.length} entries change something`);
    return this.executor.apply(plan, run);
  }

  async planDestroy(): Promise<Plan> {
    return this.planner.planDestroy(await this.store.load());
  }

  async destroy(run: ApplyRunOptions = {}): Promise<ApplyOutcome> {
    const plan = await this.planDestroy();
    const report = await this.applyPlan(plan, run);
    return { plan, report };
  }
}
