import type { ApplyReport } from "@stacksmith/shared";

export class CycleError extends Error {
  override readonly name = "CycleError";

  constructor(readonly cycle: string[]) {
    super(`Dependency cycle detected: ${cycle.join(" -> ")}`);
  }
}

export class DanglingReferenceError extends Error {
  override readonly name = "DanglingReferenceError";

  constructor(
    readonly from: string,
    readonly missing: string
  ) {
    super(`Resource "${from}" references unknown resource "${missing}"`);
  }
}

export type ProviderErrorCategory = "transient" | "permanent";

export class ProviderError extends Error {
  override readonly name = "ProviderError";

  constructor(
    readonly category: ProviderErrorCategory,
    message: string
  ) {
    super(message);
  }

  static transient(message: string): ProviderError {
    return new ProviderError("transient", message);
  }

  static permanent(message: string): ProviderError {
    return new ProviderError("permanent", message);
  }

  get isTransient(): boolean {
    return this.category === "transient";
  }
}

export class ReferenceResolutionError extends Error {
  override readonly name = "ReferenceResolutionError";

  constructor(
    readonly from: string,
    readonly target: string,
    readonly attr: string
  ) {
    super(`Resource "${from}" cannot resolve ${target}.${attr}: no such output`);
  }
}

export class StatePersistenceError extends Error {
  override readonly name = "StatePersistenceError";
  // Set when the failure interrupted an apply run
  report?: ApplyReport;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isTransient(err: unknown): boolean {
  return err instanceof ProviderError && err.isTransient;
}
