import { createLogger } from "@stacksmith/shared";
import type {
  AppliedRecord,
  Fingerprint,
  Plan,
  PlanAction,
  PlanEntry,
  ResourceNode,
  StateRecords,
} from "@stacksmith/shared";
import { DependencyGraphBuilder, reverseOrder } from "../graph/dependency-graph.js";
import { collectRefs, fieldsReferencing } from "../graph/references.js";
import { diffAttributes } from "./fingerprint.js";
import { replacementFields } from "./kinds.js";
import { ChangeTriggerEvaluator } from "./triggers.js";

interface Decision {
  action: PlanAction;
  reason: string;
  changedFields: string[];
}

// Actions after which a node's external id and outputs are new
const RECREATING: ReadonlySet<PlanAction> = new Set(["Create", "ReplaceCreateThenDestroy"]);

export function recordToNode(record: AppliedRecord): ResourceNode {
  return {
    id: record.id,
    kind: record.kind,
    attributes: record.lastAppliedAttributes,
    dependsOn: [...record.dependsOn],
  };
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/**
 * Diff/Plan engine. Pure: reads declared nodes and applied records, never
 * writes either.
 */
export class Planner {
  private logger = createLogger("planner");
  private graphBuilder = new DependencyGraphBuilder();
  private triggers = new ChangeTriggerEvaluator();

  plan(declared: ResourceNode[], records: StateRecords): Plan {
    const graph = this.graphBuilder.build(declared);
    const { fingerprints, warnings } = this.triggers.evaluate(graph);

    const entries: PlanEntry[] = [];
    const actions = new Map<string, PlanAction>();

    for (const id of graph.order) {
      const node = graph.nodes.get(id);
      const fingerprint = fingerprints.get(id);
      if (!node || fingerprint === undefined) continue;

      const record = records.get(id);
      const decision = this.decide(node, fingerprint, record, fingerprints, records, actions);
      actions.set(id, decision.action);

      entries.push({
        node,
        action: decision.action,
        reason: decision.reason,
        fingerprint,
        changedFields: decision.changedFields,
        dependencies: graph.dependencies.get(id) ?? [],
        cleanup: record ? [...record.staleExternalIds] : [],
      });
    }

    entries.push(...this.planRemovals(graph.nodes, records));

    this.logger.info(`Plan: ${this.summarize(entries)}`);
    return { entries, warnings };
  }

  /**
   * Tear down everything recorded, dependents before their dependencies.
   */
  planDestroy(records: StateRecords): Plan {
    const entries = this.planRemovals(new Map(), records);
    this.logger.info(`Destroy plan: ${plural(entries.length, "resource")}`);
    return { entries, warnings: [] };
  }

  private decide(
    node: ResourceNode,
    fingerprint: Fingerprint,
    record: AppliedRecord | undefined,
    fingerprints: Map<string, Fingerprint>,
    records: StateRecords,
    actions: Map<string, PlanAction>
  ): Decision {
    if (!record) {
      return { action: "Create", reason: "not yet created", changedFields: [] };
    }

    if (record.kind !== node.kind) {
      return {
        action: "ReplaceCreateThenDestroy",
        reason: `kind changed from ${record.kind} to ${node.kind}`,
        changedFields: [],
      };
    }

    const changedFields = diffAttributes(record.lastAppliedAttributes, node.attributes);
    if (changedFields.length > 0) {
      const forcing = replacementFields(node.kind, changedFields);
      if (forcing.length > 0) {
        return {
          action: "ReplaceCreateThenDestroy",
          reason: `cannot change ${forcing.join(", ")} in place`,
          changedFields,
        };
      }
      return { action: "Update", reason: `changed ${changedFields.join(", ")}`, changedFields };
    }

    const changed = this.triggers.changedTriggers(node, fingerprints, records, actions);
    if (fingerprint !== record.lastFingerprint || changed.length > 0) {
      const reason =
        changed.length > 0 ? `triggered by ${changed.join(", ")}` : "fingerprint changed";
      return {
        action: node.lifecycle?.replaceOnTrigger ? "ReplaceCreateThenDestroy" : "Update",
        reason,
        changedFields: [],
      };
    }

    const recreated = [...new Set(collectRefs(node.attributes).map((ref) => ref.$ref))]
      .filter((target) => RECREATING.has(actions.get(target) ?? "NoOp"))
      .sort();
    if (recreated.length > 0) {
      const fields = [
        ...new Set(recreated.flatMap((target) => fieldsReferencing(node.attributes, target))),
      ];
      const forcing = replacementFields(node.kind, fields);
      return {
        action: forcing.length > 0 ? "ReplaceCreateThenDestroy" : "Update",
        reason: `references ${recreated.join(", ")}, which will be recreated`,
        changedFields: fields,
      };
    }

    if (record.staleExternalIds.length > 0) {
      return {
        action: "NoOp",
        reason: `retry destroy of ${plural(record.staleExternalIds.length, "superseded resource")}`,
        changedFields: [],
      };
    }

    return { action: "NoOp", reason: "up to date", changedFields: [] };
  }

  private planRemovals(
    declared: Map<string, ResourceNode>,
    records: StateRecords
  ): PlanEntry[] {
    const removed = [...records.values()].filter((record) => !declared.has(record.id));
    if (removed.length === 0) return [];

    const removedIds = new Set(removed.map((record) => record.id));
    const graph = this.graphBuilder.build(
      removed.map((record) => ({
        id: record.id,
        kind: record.kind,
        attributes: {},
        dependsOn: record.dependsOn.filter((dep) => removedIds.has(dep)),
      }))
    );

    return reverseOrder(graph).flatMap((id) => {
      const record = records.get(id);
      if (!record) return [];
      // Destroy only after every node that used to depend on it is gone or moved on
      const waitFor = [...records.values()]
        .filter((other) => other.id !== id && other.dependsOn.includes(id))
        .map((other) => other.id)
        .sort();
      return [
        {
          node: recordToNode(record),
          action: "Destroy" as const,
          reason: "no longer declared",
          fingerprint: record.lastFingerprint,
          changedFields: [],
          dependencies: waitFor,
          cleanup: [...record.staleExternalIds],
        },
      ];
    });
  }

  private summarize(entries: PlanEntry[]): string {
    const counts = new Map<PlanAction, number>();
    for (const entry of entries) {
      counts.set(entry.action, (counts.get(entry.action) ?? 0) + 1);
    }
    if (counts.size === 0) return "nothing declared";
    return [...counts.entries()].map(([action, count]) => `${count} ${action}`).join(", ");
  }
}
