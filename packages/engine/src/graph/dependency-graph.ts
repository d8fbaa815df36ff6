import { createLogger } from "@stacksmith/shared";
import type { ResourceNode } from "@stacksmith/shared";
import { CycleError, DanglingReferenceError } from "../errors.js";
import { collectRefs } from "./references.js";

export interface DependencyGraph {
  nodes: Map<string, ResourceNode>;
  dependencies: Map<string, string[]>; // id -> ids it depends on, sorted
  dependents: Map<string, string[]>; // id -> ids depending on it, sorted
  order: string[]; // topological order, dependencies first
}

/**
 * Every id a node depends on: explicit `dependsOn`, trigger ids and
 * derived-attribute references. Sorted and de-duplicated.
 */
export function dependencyIds(node: ResourceNode): string[] {
  const ids = new Set<string>(node.dependsOn);
  for (const id of node.triggers ?? []) ids.add(id);
  for (const ref of collectRefs(node.attributes)) ids.add(ref.$ref);
  return [...ids].sort();
}

export function reverseOrder(graph: DependencyGraph): string[] {
  return [...graph.order].reverse();
}

/**
 * Ids reachable from `id` through the dependents relation, excluding `id`.
 */
export function descendantsOf(
  dependents: Map<string, string[]>,
  id: string
): Set<string> {
  const seen = new Set<string>();
  const stack = [...(dependents.get(id) ?? [])];
  while (stack.length > 0) {
    const next = stack.pop();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    stack.push(...(dependents.get(next) ?? []));
  }
  return seen;
}

export class DependencyGraphBuilder {
  private logger = createLogger("dependency-graph");

  build(declared: ResourceNode[]): DependencyGraph {
    const nodes = new Map<string, ResourceNode>();
    for (const node of declared) {
      if (nodes.has(node.id)) {
        throw new Error(`Duplicate resource id "${node.id}"`);
      }
      nodes.set(node.id, node);
    }

    const ids = [...nodes.keys()].sort();
    const dependencies = new Map<string, string[]>();
    const dependents = new Map<string, string[]>();
    for (const id of ids) dependents.set(id, []);

    for (const id of ids) {
      const node = nodes.get(id);
      if (!node) continue;
      const deps = dependencyIds(node);
      for (const dep of deps) {
        if (!nodes.has(dep)) throw new DanglingReferenceError(id, dep);
        dependents.get(dep)?.push(id);
      }
      dependencies.set(id, deps);
    }

    const order = this.sort(ids, dependencies, dependents);

    this.logger.debug(
      `Dependency graph: ${nodes.size} nodes, order: ${order.join(", ")}`
    );

    return { nodes, dependencies, dependents, order };
  }

  // Kahn's algorithm, smallest ready id first
  private sort(
    ids: string[],
    dependencies: Map<string, string[]>,
    dependents: Map<string, string[]>
  ): string[] {
    const remaining = new Map<string, number>();
    for (const id of ids) remaining.set(id, dependencies.get(id)?.length ?? 0);

    const ready = ids.filter((id) => remaining.get(id) === 0);
    const order: string[] = [];

    while (ready.length > 0) {
      const id = ready.shift();
      if (id === undefined) break;
      order.push(id);
      remaining.delete(id);

      let added = false;
      for (const dependent of dependents.get(id) ?? []) {
        const count = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, count);
        if (count === 0) {
          ready.push(dependent);
          added = true;
        }
      }
      if (added) ready.sort();
    }

    if (remaining.size > 0) {
      throw new CycleError(this.findCycle([...remaining.keys()].sort(), dependencies));
    }
    return order;
  }

  private findCycle(
    candidates: string[],
    dependencies: Map<string, string[]>
  ): string[] {
    const pending = new Set(candidates);
    const done = new Set<string>();

    const visit = (id: string, path: string[]): string[] | undefined => {
      const at = path.indexOf(id);
      if (at !== -1) return [...path.slice(at), id];
      if (done.has(id)) return undefined;
      path.push(id);
      for (const dep of dependencies.get(id) ?? []) {
        if (!pending.has(dep)) continue;
        const cycle = visit(dep, path);
        if (cycle) return cycle;
      }
      path.pop();
      done.add(id);
      return undefined;
    };

    for (const id of candidates) {
      const cycle = visit(id, []);
      if (cycle) return cycle;
    }
    return candidates;
  }
}

export function buildGraph(declared: ResourceNode[]): DependencyGraph {
  return new DependencyGraphBuilder().build(declared);
}
