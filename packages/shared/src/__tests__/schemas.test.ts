import { describe, it, expect, afterEach } from "vitest";
import { parseConfig } from "../types/config.js";
import { parseStack } from "../types/stack.js";
import { createLogger, isLogLevel, setLogLevel, setLogSink } from "../utils/logger.js";

describe("parseConfig", () => {
  it("fills in defaults", () => {
    const config = parseConfig({ stacksmith: {}, apply: {}, logging: {} });

    expect(config).toEqual({
      stacksmith: {
        stackFile: "stack.json",
        stateBackend: "file",
        statePath: ".stacksmith/state.json",
        providerDbPath: ".stacksmith/provider.db",
      },
      apply: { parallelism: 4, maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30000, failFast: false },
      logging: { level: "info" },
    });
  });

  it("rejects a parallelism of zero", () => {
    expect(() => parseConfig({ stacksmith: {}, apply: { parallelism: 0 }, logging: {} })).toThrow();
  });
});

describe("parseStack", () => {
  it("defaults attributes, dependencies and cors", () => {
    const stack = parseStack({
      name: "weather",
      resources: [{ id: "table", kind: "Table" }],
    });

    expect(stack).toEqual({
      name: "weather",
      resources: [{ id: "table", kind: "Table", attributes: {}, dependsOn: [] }],
      cors: [],
    });
  });

  it("rejects unknown kinds", () => {
    expect(() => parseStack({ name: "x", resources: [{ id: "q", kind: "Queue" }] })).toThrow();
  });

  it("only allows artifacts on functions", () => {
    expect(() =>
      parseStack({ name: "x", resources: [{ id: "t", kind: "Table", artifact: "t.zip" }] })
    ).toThrow("artifact is only valid on Function resources");
  });

  it("requires at least one allowed origin in a cors declaration", () => {
    expect(() =>
      parseStack({
        name: "x",
        resources: [],
        cors: [
          {
            id: "cors",
            restApi: "api",
            resource: "route",
            allowedHeaders: ["Content-Type"],
            allowedMethods: ["GET"],
            allowedOrigins: [],
          },
        ],
      })
    ).toThrow();
  });
});

describe("createLogger", () => {
  afterEach(() => {
    setLogSink();
    setLogLevel("info");
  });

  it("writes component-tagged lines at or above the current level", () => {
    const lines: string[] = [];
    setLogSink((_level, line) => lines.push(line));
    setLogLevel("warn");
    const logger = createLogger("planner");

    logger.info("hidden");
    logger.warn("shown");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[WARN\] \[planner\] shown$/);
  });

  it("recognises log levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});
