import { attemptsOf, createLogger, retryWithAttempts } from "@stacksmith/shared";
import type {
  AppliedRecord,
  AppliedStatus,
  ApplyReport,
  Attributes,
  NodeResult,
  Plan,
  PlanEntry,
  RetryOptions,
  StateRecords,
} from "@stacksmith/shared";
import {
  ProviderError,
  ReferenceResolutionError,
  StatePersistenceError,
  isTransient,
} from "../errors.js";
import { descendantsOf } from "../graph/dependency-graph.js";
import { resolveRefs } from "../graph/references.js";
import type { ProvisioningProvider } from "../provider/types.js";
import type { StateStore } from "../state/store.js";
import { WorkerPool } from "./pool.js";

export interface ApplyOptions {
  parallelism?: number;
  retry?: Partial<Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "backoffMultiplier">>;
  // Stop dispatching everything after the first failure instead of only its dependents
  failFast?: boolean;
  onStatusChange?: (result: NodeResult) => void;
}

export interface ApplyRunOptions {
  signal?: AbortSignal;
}

type HaltReason = "cancelled" | "failure" | "persistence";

const SKIP_REASONS: Record<HaltReason, string> = {
  cancelled: "not dispatched: run cancelled",
  failure: "not dispatched: run stopped after a failure",
  persistence: "not dispatched: state could not be saved",
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Executes a plan against the provider. Nodes are dispatched once all of their
 * dependencies succeeded; state is saved after each node's operation lands.
 */
export class ApplyExecutor {
  constructor(
    private readonly store: StateStore,
    private readonly provider: ProvisioningProvider,
    private readonly options: ApplyOptions = {}
  ) {}

  async apply(plan: Plan, run: ApplyRunOptions = {}): Promise<ApplyReport> {
    const records = await this.store.load();
    return new ApplyRun(plan, records, this.store, this.provider, this.options).execute(run.signal);
  }
}

interface Progress {
  attempts: number;
}

class ApplyRun {
  private logger = createLogger("apply-executor");
  private entries = new Map<string, PlanEntry>();
  private results = new Map<string, NodeResult>();
  private remaining = new Map<string, number>();
  private dependents = new Map<string, string[]>();
  private pool: WorkerPool;
  private halted: HaltReason | undefined;
  private persistenceError: StatePersistenceError | undefined;
  private saveQueue: Promise<void> = Promise.resolve();
  // Nodes whose superseded resources wait for every dependent to finish
  private cleanups = new Set<string>();
  // Destroys held back until a node's superseded resources, which may still
  // use the resource being destroyed, are gone
  private held = new Map<string, string[]>();

  constructor(
    private readonly plan: Plan,
    private readonly records: StateRecords,
    private readonly store: StateStore,
    private readonly provider: ProvisioningProvider,
    private readonly options: ApplyOptions
  ) {
    this.pool = new WorkerPool(options.parallelism ?? 4);

    for (const entry of plan.entries) {
      const id = entry.node.id;
      this.entries.set(id, entry);
      this.dependents.set(id, []);
      this.results.set(id, { id, action: entry.action, status: "Pending", attempts: 0 });
    }
    for (const entry of plan.entries) {
      // Dependencies outside the plan are already settled
      const deps = entry.dependencies.filter((dep) => this.entries.has(dep));
      this.remaining.set(entry.node.id, deps.length);
      for (const dep of deps) this.dependents.get(dep)?.push(entry.node.id);
    }
  }

  async execute(signal?: AbortSignal): Promise<ApplyReport> {
    const onAbort = () => this.halt("cancelled");
    if (signal?.aborted) this.halt("cancelled");
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      for (const entry of this.plan.entries) {
        if (this.halted) break;
        if (this.remaining.get(entry.node.id) === 0) this.dispatch(entry);
      }
      await this.pool.onIdle();
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }

    for (const id of this.cleanups) {
      this.logger.warn(`Superseded resources of ${id} left for a later run`);
    }

    for (const result of this.results.values()) {
      if (result.status === "Pending") {
        result.status = "Skipped";
        result.error = SKIP_REASONS[this.halted ?? "failure"];
        this.notify(result);
      }
    }

    const results = [...this.results.values()];
    const report: ApplyReport = {
      results,
      succeeded: results.every((r) => r.status === "Succeeded" && r.cleanupError === undefined),
      cancelled: this.halted === "cancelled",
    };

    const failed = results.filter((r) => r.status !== "Succeeded").length;
    this.logger.info(
      `Apply finished: ${results.length - failed}/${results.length} succeeded` +
        (report.cancelled ? " (cancelled)" : "")
    );

    if (this.persistenceError) {
      this.persistenceError.report = report;
      throw this.persistenceError;
    }
    return report;
  }

  private dispatch(entry: PlanEntry): void {
    const { active, queued, max } = this.pool.stats;
    this.logger.debug(`Dispatching ${entry.node.id} (active ${active}/${max}, queued ${queued})`);
    this.pool.submit(entry.node.id, () => this.runEntry(entry));
  }

  private halt(reason: HaltReason): void {
    if (this.halted) return;
    this.halted = reason;
    const dropped = this.pool.cancelPending();
    this.logger.warn(
      `Halting apply (${reason}); ${dropped.length} queued operation(s) will not be dispatched`
    );
  }

  private async runEntry(entry: PlanEntry): Promise<void> {
    const id = entry.node.id;
    const result = this.results.get(id);
    if (!result) return;

    result.status = "InProgress";
    result.startedAt = new Date().toISOString();
    this.notify(result);
    this.logger.info(`${entry.action} ${id}`);

    const progress: Progress = { attempts: 0 };
    try {
      await this.perform(entry, progress);
      result.status = "Succeeded";
    } catch (err) {
      result.status = "Failed";
      result.error = errorMessage(err);
      this.logger.error(`${entry.action} ${id} failed: ${result.error}`);
      if (err instanceof StatePersistenceError) {
        this.persistenceError ??= err;
        this.halt("persistence");
      } else if (this.options.failFast) {
        this.halt("failure");
      }
    }
    result.attempts = progress.attempts;
    result.finishedAt = new Date().toISOString();
    this.notify(result);

    if (result.status === "Succeeded") {
      const stale = this.records.get(id)?.staleExternalIds ?? [];
      if (entry.action !== "Destroy" && stale.length > 0) {
        this.cleanups.add(id);
      }
      this.release(id);
    } else {
      this.skipDescendants(id);
    }
    this.flushCleanups();
  }

  // Superseded resources are destroyed only once nothing in this run can still
  // be pointing at them: every descendant has to have succeeded. Destroys of
  // removed nodes come after the cleanup instead.
  private flushCleanups(): void {
    for (const id of [...this.cleanups]) {
      const descendants = [...descendantsOf(this.dependents, id)]
        .filter((d) => this.entries.get(d)?.action !== "Destroy")
        .map((d) => this.results.get(d)?.status);
      if (descendants.some((status) => status === "Pending" || status === "InProgress")) continue;
      this.cleanups.delete(id);

      if (this.halted) {
        this.logger.warn(`Superseded resources of ${id} left for a later run (${this.halted})`);
        this.held.delete(id);
      } else if (descendants.every((status) => status === "Succeeded")) {
        this.pool.submit(`${id}:cleanup`, () => this.runCleanup(id));
      } else {
        this.logger.warn(`Superseded resources of ${id} left for a later run: a dependent did not succeed`);
        this.skipHeld(id);
      }
    }
  }

  private async runCleanup(id: string): Promise<void> {
    const result = this.results.get(id);
    if (!result) return;

    const progress: Progress = { attempts: 0 };
    try {
      await this.cleanup(id, progress);
    } catch (err) {
      result.cleanupError = errorMessage(err);
      this.logger.warn(`Cleanup of ${id} failed: ${result.cleanupError}`);
      if (err instanceof StatePersistenceError) {
        this.persistenceError ??= err;
        this.halt("persistence");
      }
    }
    result.attempts += progress.attempts;
    if (result.cleanupError !== undefined) {
      this.notify(result);
      this.skipHeld(id);
    } else {
      for (const dependent of this.held.get(id) ?? []) this.countDown(dependent);
      this.held.delete(id);
    }
  }

  private skipHeld(id: string): void {
    for (const dependent of this.held.get(id) ?? []) {
      const result = this.results.get(dependent);
      if (result?.status !== "Pending") continue;
      result.status = "Skipped";
      result.error = `superseded resources of "${id}" were not destroyed`;
      this.notify(result);
      this.skipDescendants(dependent);
    }
    this.held.delete(id);
  }

  private release(id: string): void {
    const held: string[] = [];
    for (const dependent of this.dependents.get(id) ?? []) {
      if (this.cleanups.has(id) && this.entries.get(dependent)?.action === "Destroy") {
        held.push(dependent);
      } else {
        this.countDown(dependent);
      }
    }
    if (held.length > 0) this.held.set(id, held);
  }

  private countDown(id: string): void {
    const count = (this.remaining.get(id) ?? 0) - 1;
    this.remaining.set(id, count);
    const entry = this.entries.get(id);
    if (count === 0 && entry && !this.halted && this.results.get(id)?.status === "Pending") {
      this.dispatch(entry);
    }
  }

  private skipDescendants(id: string): void {
    for (const descendant of [...descendantsOf(this.dependents, id)].sort()) {
      const result = this.results.get(descendant);
      if (result?.status !== "Pending") continue;
      result.status = "Skipped";
      result.error = `dependency "${id}" did not succeed`;
      this.notify(result);
    }
  }

  private notify(result: NodeResult): void {
    this.options.onStatusChange?.({ ...result });
  }

  private async perform(entry: PlanEntry, progress: Progress): Promise<void> {
    switch (entry.action) {
      case "Create":
        return this.create(entry, progress);
      case "Update":
        return this.update(entry, progress);
      case "ReplaceCreateThenDestroy":
        return this.replace(entry, progress);
      case "Destroy":
        return this.destroy(entry, progress);
      case "NoOp":
        return;
    }
  }

  private async create(entry: PlanEntry, progress: Progress): Promise<void> {
    const attributes = this.resolve(entry);
    const created = await this.call(() => this.provider.create(entry.node.kind, attributes), progress);
    this.records.set(entry.node.id, this.toRecord(entry, created.externalId, created.attributes, []));
    await this.persist();
  }

  private async update(entry: PlanEntry, progress: Progress): Promise<void> {
    const record = this.records.get(entry.node.id);
    if (!record) {
      throw ProviderError.permanent(`No applied record for "${entry.node.id}" to update`);
    }
    const attributes = this.resolve(entry);
    const outputs = await this.call(() => this.provider.update(record.externalId, attributes), progress);
    this.records.set(
      entry.node.id,
      this.toRecord(entry, record.externalId, outputs, record.staleExternalIds)
    );
    await this.persist();
  }

  // Create-before-destroy: the old resource joins the stale ids and is
  // destroyed by a later cleanup, after the node's dependents have moved over.
  private async replace(entry: PlanEntry, progress: Progress): Promise<void> {
    const previous = this.records.get(entry.node.id);
    const attributes = this.resolve(entry);
    const created = await this.call(() => this.provider.create(entry.node.kind, attributes), progress);
    const stale = previous ? [...previous.staleExternalIds, previous.externalId] : [];
    this.records.set(entry.node.id, this.toRecord(entry, created.externalId, created.attributes, stale));
    await this.persist();
  }

  private async destroy(entry: PlanEntry, progress: Progress): Promise<void> {
    const id = entry.node.id;
    await this.cleanup(id, progress);
    const record = this.records.get(id);
    if (!record) {
      this.logger.info(`${id} has no applied record, nothing to destroy`);
      return;
    }
    await this.call(() => this.provider.destroy(record.externalId), progress);
    this.records.delete(id);
    await this.persist();
  }

  // Destroy superseded resources one at a time, recording each success.
  private async cleanup(id: string, progress: Progress): Promise<void> {
    const stale = [...(this.records.get(id)?.staleExternalIds ?? [])];
    for (const externalId of stale) {
      await this.call(() => this.provider.destroy(externalId), progress);
      const current = this.records.get(id);
      if (!current) return;
      const rest = current.staleExternalIds.filter((other) => other !== externalId);
      this.records.set(id, { ...current, staleExternalIds: rest, status: statusFor(rest) });
      await this.persist();
    }
  }

  private resolve(entry: PlanEntry): Attributes {
    const from = entry.node.id;
    return resolveRefs(entry.node.attributes, (ref) => {
      const target = this.records.get(ref.$ref);
      if (!target) throw new ReferenceResolutionError(from, ref.$ref, ref.attr);
      if (ref.attr === "id") return target.externalId;
      const value = target.outputs[ref.attr];
      if (value === undefined) throw new ReferenceResolutionError(from, ref.$ref, ref.attr);
      return value;
    });
  }

  private async call<T>(fn: () => Promise<T>, progress: Progress): Promise<T> {
    try {
      const { value, attempts } = await retryWithAttempts(fn, {
        ...this.options.retry,
        shouldRetry: (err) => isTransient(err),
        onRetry: (err, attempt, delayMs) =>
          this.logger.warn(`Attempt ${attempt} failed (${err.message}); retrying in ${delayMs}ms`),
      });
      progress.attempts += attempts;
      return value;
    } catch (err) {
      progress.attempts += attemptsOf(err);
      throw err;
    }
  }

  private toRecord(
    entry: PlanEntry,
    externalId: string,
    outputs: Attributes,
    staleExternalIds: string[]
  ): AppliedRecord {
    return {
      id: entry.node.id,
      kind: entry.node.kind,
      externalId,
      lastFingerprint: entry.fingerprint,
      lastAppliedAttributes: entry.node.attributes,
      outputs,
      dependsOn: [...entry.dependencies],
      status: statusFor(staleExternalIds),
      staleExternalIds: [...staleExternalIds],
      appliedAt: new Date().toISOString(),
    };
  }

  // Saves are chained so snapshots land in the order they were taken.
  private persist(): Promise<void> {
    const snapshot = new Map(this.records);
    const saved = this.saveQueue.then(() => this.store.save(snapshot));
    this.saveQueue = saved.catch(() => undefined);
    return saved.catch((err: unknown) => {
      throw err instanceof StatePersistenceError
        ? err
        : new StatePersistenceError(`Failed to save state: ${errorMessage(err)}`, { cause: err });
    });
  }
}

function statusFor(staleExternalIds: string[]): AppliedStatus {
  return staleExternalIds.length > 0 ? "CreatedNotCleanedUp" : "Applied";
}
