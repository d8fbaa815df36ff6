import { describe, it, expect } from "vitest";
import {
  buildGraph,
  dependencyIds,
  descendantsOf,
  reverseOrder,
} from "../graph/dependency-graph.js";
import { CycleError, DanglingReferenceError } from "../errors.js";
import { node } from "./helpers.js";

describe("DependencyGraphBuilder", () => {
  it("orders dependencies first with lexicographic tie-break", () => {
    const graph = buildGraph([
      node("c", "Stage", {}, { dependsOn: ["b"] }),
      node("b", "Deployment"),
      node("a", "Function"),
    ]);

    expect(graph.order).toEqual(["a", "b", "c"]);
  });

  it("produces the same order regardless of declaration order", () => {
    const nodes = [
      node("z", "ApiGateway"),
      node("m", "Route", {}, { dependsOn: ["z"] }),
      node("a", "Method", {}, { dependsOn: ["m"] }),
      node("k", "Table"),
    ];

    const first = buildGraph(nodes).order;
    const second = buildGraph([...nodes].reverse()).order;

    expect(first).toEqual(["k", "z", "m", "a"]);
    expect(second).toEqual(first);
  });

  it("derives edges from references and triggers", () => {
    const fn = node("fn", "Function");
    const integration = node("integration", "Integration", {
      uri: { $ref: "fn", attr: "invokeArn" },
      nested: [{ api: { $ref: "api", attr: "id" } }],
    });
    const api = node("api", "ApiGateway");
    const deployment = node("deployment", "Deployment", {}, { triggers: ["integration"], dependsOn: ["api"] });

    const graph = buildGraph([deployment, integration, fn, api]);

    expect(dependencyIds(integration)).toEqual(["api", "fn"]);
    expect(graph.dependencies.get("deployment")).toEqual(["api", "integration"]);
    expect(graph.dependents.get("fn")).toEqual(["integration"]);
    expect(graph.order).toEqual(["api", "fn", "integration", "deployment"]);
    expect(reverseOrder(graph)).toEqual(["deployment", "integration", "fn", "api"]);
  });

  it("rejects a reference to an undeclared id", () => {
    const nodes = [node("stage", "Stage", { deploymentId: { $ref: "deployment", attr: "id" } })];

    expect(() => buildGraph(nodes)).toThrow(DanglingReferenceError);
    try {
      buildGraph(nodes);
    } catch (err) {
      expect(err).toBeInstanceOf(DanglingReferenceError);
      if (err instanceof DanglingReferenceError) {
        expect(err.from).toBe("stage");
        expect(err.missing).toBe("deployment");
      }
    }
  });

  it("reports the cycle path", () => {
    const nodes = [
      node("a", "Role", {}, { dependsOn: ["b"] }),
      node("b", "Policy", {}, { dependsOn: ["c"] }),
      node("c", "PolicyAttachment", {}, { dependsOn: ["a"] }),
      node("d", "Table"),
    ];

    expect(() => buildGraph(nodes)).toThrow("Dependency cycle detected: a -> b -> c -> a");
  });

  it("treats a self reference as a cycle", () => {
    const nodes = [node("a", "Function", { self: { $ref: "a", attr: "arn" } })];

    expect(() => buildGraph(nodes)).toThrow(CycleError);
  });

  it("rejects duplicate ids", () => {
    expect(() => buildGraph([node("a", "Table"), node("a", "Bucket")])).toThrow(
      'Duplicate resource id "a"'
    );
  });

  it("finds transitive dependents", () => {
    const graph = buildGraph([
      node("a", "Function"),
      node("b", "Integration", {}, { dependsOn: ["a"] }),
      node("c", "Deployment", {}, { dependsOn: ["b"] }),
      node("d", "Table"),
    ]);

    expect([...descendantsOf(graph.dependents, "a")].sort()).toEqual(["b", "c"]);
    expect(descendantsOf(graph.dependents, "d").size).toBe(0);
  });
});
