#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { configure, getConfig } from "./config.js";
import type { EngineKind, PayloadStrategyName } from "./config.js";
import { Dispatcher } from "./dispatcher/dispatcher.js";
import { payloadStrategy } from "./dispatcher/payload.js";
import { createEngineClient, ensureEngineReady } from "./engine/factory.js";
import { errorMessage } from "./errors.js";
import { createDependencyGraph, topologicalOrder } from "./graph/dependency-graph.js";
import { RunStore } from "./persistence/store.js";
import { formatBlocked, formatClock, formatResults, formatSeconds, formatSummary, preview } from "./report/summary.js";
import { Scheduler } from "./scheduler/scheduler.js";
import { EngineKindSchema, PayloadStrategySchema } from "./schemas.js";
import { setLogLevel } from "./utils/logger.js";
import { loadWorkflow } from "./workflow/loader.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", errorMessage(reason));
});

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative integer.");
  return n;
}

function parseStrategy(value: string): PayloadStrategyName {
  const result = PayloadStrategySchema.safeParse(value);
  if (!result.success) throw new InvalidArgumentError("Expected lineage or content.");
  return result.data;
}

function parseEngineKind(value: string): EngineKind {
  const result = EngineKindSchema.safeParse(value);
  if (!result.success) throw new InvalidArgumentError("Expected cli, http or ws.");
  return result.data;
}

type RunCommandOptions = {
  concurrency?: number;
  strategy?: PayloadStrategyName;
  timeout?: number;
  engine?: EngineKind;
  engineCommand?: string;
  engineUrl?: string;
  eagerValidation?: boolean;
  cancel: boolean;
  save?: boolean;
  db?: string;
  json?: boolean;
};

const program = new Command();

program
  .name("dagflow")
  .description("Run workflow DAGs against an inference engine with bounded parallelism")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("--quiet", "Only log errors");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals<{ debug?: boolean; quiet?: boolean }>();
  if (opts.debug) setLogLevel("debug");
  else if (opts.quiet) setLogLevel("error");
});

// --- run ---
program
  .command("run")
  .description("Execute every node of a workflow file")
  .argument("<workflow>", "Path to the workflow JSON file")
  .option("-c, --concurrency <n>", "Max nodes in flight", parsePositiveInt)
  .option("-s, --strategy <name>", "Payload strategy: lineage | content", parseStrategy)
  .option("-t, --timeout <ms>", "Per-node engine timeout in ms (0 = none)", parseNonNegativeInt)
  .option("-e, --engine <kind>", "Engine client: cli | http | ws", parseEngineKind)
  .option("--engine-command <cmd>", "Engine CLI binary")
  .option("--engine-url <url>", "Engine URL for http/ws clients")
  .option("--eager-validation", "Reject unknown dependencies and cycles before running")
  .option("--no-cancel", "Let in-flight nodes finish after a failure")
  .option("--save", "Store the run report in the history database")
  .option("--db <path>", "History database path")
  .option("--json", "Print the run report as JSON")
  .action(async (workflowPath: string, opts: RunCommandOptions) => {
    configure({
      timeouts: { engine: opts.timeout },
      limits: { maxConcurrency: opts.concurrency },
      engine: { kind: opts.engine, command: opts.engineCommand, url: opts.engineUrl },
      scheduler: { payloadStrategy: opts.strategy, cancelInFlight: opts.cancel },
      workflow: { validation: opts.eagerValidation ? "eager" : undefined },
      persistence: { dbPath: opts.db },
    });
    const cfg = getConfig();

    const workflow = await loadWorkflow(workflowPath);
    const engine = createEngineClient(cfg.engine.kind);
    const scheduler = new Scheduler(
      new Dispatcher({ engine, strategy: payloadStrategy(cfg.scheduler.payloadStrategy) }),
    );

    // Ctrl-C cancels the run; in-flight engine calls are aborted.
    const interrupt = new AbortController();
    const onSigint = () => interrupt.abort();
    process.once("SIGINT", onSigint);

    try {
      await ensureEngineReady(engine);
      const report = await scheduler.run(workflow, {
        abortSignal: interrupt.signal,
        onNodeStart: (nodeId) => {
          if (!opts.json) console.log(`[${formatClock(Date.now())}] > [Start] ${nodeId}`);
        },
        onNodeEnd: (nodeId, outcome) => {
          if (opts.json) return;
          const took = formatSeconds(outcome.durationMs);
          if (outcome.status === "Success") {
            console.log(`[${formatClock(outcome.finishedAt)}] + [Finish] ${nodeId} (${took})`);
            console.log(`    ${preview(outcome.output ?? "", cfg.limits.outputPreview)}`);
          } else {
            console.log(`[${formatClock(outcome.finishedAt)}] x [${outcome.status}] ${nodeId} (${took})`);
            if (outcome.diagnostic) console.log(outcome.diagnostic);
          }
        },
      });

      if (opts.save) {
        const store = new RunStore(cfg.persistence.dbPath);
        try {
          store.insert(report);
        } finally {
          store.close();
        }
      }

      if (opts.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        if (report.blocked) {
          console.log("\nDeadlock detected. Remaining:");
          console.log(formatBlocked(report.blocked));
        }
        if (Object.keys(report.results).length > 0) {
          console.log(`\n${report.completed ? "=== Workflow Completed Successfully! ===" : "=== Partial Results ==="}`);
          console.log(formatResults(report));
        }
        console.log(`\n${formatSummary(report)}`);
      }

      if (!report.completed) process.exitCode = 1;
    } finally {
      process.off("SIGINT", onSigint);
      await engine.close?.();
    }
  });

// --- validate ---
program
  .command("validate")
  .description("Check a workflow file and print its nodes in dependency order")
  .argument("<workflow>", "Path to the workflow JSON file")
  .action(async (workflowPath: string) => {
    const workflow = await loadWorkflow(workflowPath, { validation: "eager" });
    const graph = createDependencyGraph(workflow.nodes);
    console.log(`Workflow "${workflow.name}" is valid (${workflow.nodes.length} nodes).`);
    topologicalOrder(graph).forEach((id, i) => {
      const deps = graph.byId.get(id)?.dependencies ?? [];
      console.log(`  ${i + 1}. ${id}${deps.length > 0 ? ` <- ${deps.join(", ")}` : ""}`);
    });
  });

// --- history ---
program
  .command("history")
  .description("List stored runs, or show one run's summary")
  .argument("[runId]", "Run to show")
  .option("--db <path>", "History database path")
  .option("-n, --limit <n>", "Number of runs to list", parsePositiveInt, 20)
  .action((runId: string | undefined, opts: { db?: string; limit: number }) => {
    const store = new RunStore(opts.db);
    try {
      if (runId) {
        const report = store.get(runId);
        if (!report) {
          console.error(`Run "${runId}" not found.`);
          process.exitCode = 1;
          return;
        }
        console.log(formatSummary(report));
        return;
      }

      const runs = store.list(opts.limit);
      if (runs.length === 0) {
        console.log("No stored runs.");
        return;
      }
      for (const r of runs) {
        const failed = r.failingNode ? ` at ${r.failingNode}` : "";
        console.log(`${r.runId}  ${new Date(r.startedAt).toISOString()}  ${r.status}${failed}  ${formatSeconds(r.wallTimeMs)}  ${r.workflow}`);
      }
    } finally {
      store.close();
    }
  });

void (async () => {
  try {
    await program.parseAsync();
  } catch (err) {
    console.error(errorMessage(err));
    process.exit(1);
  }
})();
