import { homedir } from "node:os";
import { join } from "node:path";

export type EngineKind = "cli" | "http" | "ws";
export type PayloadStrategyName = "lineage" | "content";
export type ValidationMode = "lazy" | "eager";

export type DagflowConfig = {
  timeouts: {
    /** Per-node engine call bound in ms. 0 disables the bound. */
    engine: number;
    connect: number;
  };
  limits: {
    maxConcurrency: number;
    outputPreview: number;
  };
  engine: {
    kind: EngineKind;
    command: string;
    env: Record<string, string>;
    url: string;
  };
  scheduler: {
    payloadStrategy: PayloadStrategyName;
    cancelInFlight: boolean;
  };
  workflow: {
    validation: ValidationMode;
  };
  persistence: {
    dbPath: string;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: DagflowConfig = {
  timeouts: {
    engine: 100_000,
    connect: 10_000,
  },
  limits: {
    maxConcurrency: 4,
    outputPreview: 100,
  },
  engine: {
    kind: "cli",
    command: "pie-cli",
    env: { RUST_LOG: "error" },
    url: "ws://127.0.0.1:8080",
  },
  scheduler: {
    payloadStrategy: "lineage",
    cancelInFlight: true,
  },
  workflow: {
    validation: "lazy",
  },
  persistence: {
    dbPath: join(homedir(), ".dagflow", "runs.db"),
  },
};

let current: DagflowConfig = structuredClone(DEFAULTS);

function mergeEnv(base: Record<string, string>, overrides?: Record<string, string | undefined>): Record<string, string> {
  const env = { ...base };
  for (const [key, val] of Object.entries(overrides ?? {})) {
    if (val !== undefined) env[key] = val;
  }
  return env;
}

/** Override config values. Unset or undefined fields keep their defaults. */
export function configure(overrides: DeepPartial<DagflowConfig>): void {
  const { timeouts, limits, engine, scheduler, workflow, persistence } = overrides;
  current = {
    timeouts: {
      engine: timeouts?.engine ?? DEFAULTS.timeouts.engine,
      connect: timeouts?.connect ?? DEFAULTS.timeouts.connect,
    },
    limits: {
      maxConcurrency: limits?.maxConcurrency ?? DEFAULTS.limits.maxConcurrency,
      outputPreview: limits?.outputPreview ?? DEFAULTS.limits.outputPreview,
    },
    engine: {
      kind: engine?.kind ?? DEFAULTS.engine.kind,
      command: engine?.command ?? DEFAULTS.engine.command,
      env: mergeEnv(DEFAULTS.engine.env, engine?.env),
      url: engine?.url ?? DEFAULTS.engine.url,
    },
    scheduler: {
      payloadStrategy: scheduler?.payloadStrategy ?? DEFAULTS.scheduler.payloadStrategy,
      cancelInFlight: scheduler?.cancelInFlight ?? DEFAULTS.scheduler.cancelInFlight,
    },
    workflow: {
      validation: workflow?.validation ?? DEFAULTS.workflow.validation,
    },
    persistence: {
      dbPath: persistence?.dbPath ?? DEFAULTS.persistence.dbPath,
    },
  };
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<DagflowConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<DagflowConfig> = Object.freeze(structuredClone(DEFAULTS));
