import { createLogger } from "@stacksmith/shared";
import type { Fingerprint, PlanAction, ResourceNode, StateRecords } from "@stacksmith/shared";
import type { DependencyGraph } from "../graph/dependency-graph.js";
import { fingerprintAggregate, fingerprintNode } from "./fingerprint.js";

export interface TriggerEvaluation {
  fingerprints: Map<string, Fingerprint>;
  warnings: string[];
}

export function isAggregate(node: ResourceNode): boolean {
  return (node.triggers?.length ?? 0) > 0;
}

/**
 * Computes current fingerprints for every node. Aggregates digest the current
 * fingerprints of their curated triggers, so an upstream change surfaces as a
 * fingerprint change on the aggregate even when its own fields are untouched.
 */
export class ChangeTriggerEvaluator {
  private logger = createLogger("change-triggers");

  evaluate(graph: DependencyGraph): TriggerEvaluation {
    const fingerprints = new Map<string, Fingerprint>();
    const warnings: string[] = [];

    for (const id of graph.order) {
      const node = graph.nodes.get(id);
      if (!node) continue;

      if (isAggregate(node)) {
        const upstream = (node.triggers ?? []).map((trigger) => {
          const fp = fingerprints.get(trigger);
          // Triggers are dependency edges, so they precede the aggregate in order
          if (fp === undefined) {
            throw new Error(`Trigger "${trigger}" of "${id}" has no fingerprint yet`);
          }
          return fp;
        });
        fingerprints.set(id, fingerprintAggregate(node, upstream));
        continue;
      }

      if (node.triggers !== undefined || node.kind === "Deployment") {
        const warning = `${node.kind} "${id}" has no triggers; upstream changes will never redeploy it`;
        warnings.push(warning);
        this.logger.warn(warning);
      }
      fingerprints.set(id, fingerprintNode(node));
    }

    return { fingerprints, warnings };
  }

  /**
   * Triggers of `node` whose current fingerprint differs from the one last
   * applied, or that are planned to change anyway. A trigger recreated because
   * a node it references is recreated keeps its fingerprint but gets a new
   * external id, which the aggregate has to redeploy against.
   */
  changedTriggers(
    node: ResourceNode,
    fingerprints: Map<string, Fingerprint>,
    records: StateRecords,
    planned: ReadonlyMap<string, PlanAction>
  ): string[] {
    return (node.triggers ?? []).filter(
      (trigger) =>
        records.get(trigger)?.lastFingerprint !== fingerprints.get(trigger) ||
        (planned.get(trigger) ?? "NoOp") !== "NoOp"
    );
  }
}
