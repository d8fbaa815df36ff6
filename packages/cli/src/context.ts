import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import {
  FileStateStore,
  LocalProvider,
  MemoryStateStore,
  Reconciler,
  SqliteStateStore,
  type StateStore,
} from '@stacksmith/engine';
import type { Config, NodeResult } from '@stacksmith/shared';

export interface RunContext {
  reconciler: Reconciler;
  close(): void;
}

export interface ContextHooks {
  onStatusChange?: (result: NodeResult) => void;
}

function sqlitePath(path: string): string {
  if (path === ':memory:') return path;
  const resolved = resolve(path);
  mkdirSync(dirname(resolved), { recursive: true });
  return resolved;
}

/**
 * Wire the configured state backend and the local provider into a Reconciler.
 */
export function createContext(config: Config, hooks: ContextHooks = {}): RunContext {
  const closers: Array<() => void> = [];

  let store: StateStore;
  switch (config.stacksmith.stateBackend) {
    case 'memory':
      store = new MemoryStateStore();
      break;
    case 'sqlite': {
      const sqlite = new SqliteStateStore(sqlitePath(config.stacksmith.statePath));
      closers.push(() => sqlite.close());
      store = sqlite;
      break;
    }
    case 'file':
      store = new FileStateStore(resolve(config.stacksmith.statePath));
      break;
  }

  const provider = new LocalProvider(sqlitePath(config.stacksmith.providerDbPath));
  closers.push(() => provider.close());

  const reconciler = new Reconciler({
    store,
    provider,
    apply: {
      parallelism: config.apply.parallelism,
      failFast: config.apply.failFast,
      retry: {
        maxAttempts: config.apply.maxAttempts,
        baseDelayMs: config.apply.baseDelayMs,
        maxDelayMs: config.apply.maxDelayMs,
      },
      onStatusChange: hooks.onStatusChange,
    },
  });

  return {
    reconciler,
    close: () => {
      for (const close of closers) close();
    },
  };
}
