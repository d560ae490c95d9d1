import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { getConfig } from "../config.js";
import type { ValidationMode } from "../config.js";
import { ParseError, ValidationError, errorMessage } from "../errors.js";
import { createDependencyGraph, validate } from "../graph/dependency-graph.js";
import { WorkflowFileSchema, parseOrThrow } from "../schemas.js";
import type { WorkflowFile } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { Workflow } from "./types.js";

export type LoadWorkflowOptions = {
  validation?: ValidationMode;
};

/** Build a workflow from already-parsed data. */
export function createWorkflow(
  data: unknown,
  baseDir: string,
  opts?: LoadWorkflowOptions & { sourcePath?: string },
): Workflow {
  const file: WorkflowFile = parseOrThrow(WorkflowFileSchema, data, "workflow");
  const workflow: Workflow = {
    name: file.name,
    nodes: file.nodes.map((n) => ({
      id: n.id,
      dependencies: n.dependencies,
      image: n.image,
      instruction: n.instruction,
      config: n.config,
    })),
    baseDir: resolve(baseDir),
    sourcePath: opts?.sourcePath,
  };

  const graph = createDependencyGraph(workflow.nodes);
  if ((opts?.validation ?? getConfig().workflow.validation) === "eager") {
    validate(graph);
  }
  return workflow;
}

/** Read a workflow document. Artifact paths resolve against its directory. */
export async function loadWorkflow(path: string, opts?: LoadWorkflowOptions): Promise<Workflow> {
  const sourcePath = resolve(path);

  let text: string;
  try {
    text = await readFile(sourcePath, "utf-8");
  } catch (err) {
    throw new ValidationError("WORKFLOW_NOT_FOUND", `Workflow file not found: ${sourcePath}`, {
      cause: errorMessage(err),
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ParseError(`Workflow file is not valid JSON: ${sourcePath}`, { cause: errorMessage(err) });
  }

  const workflow = createWorkflow(data, dirname(sourcePath), { ...opts, sourcePath });
  log.debug(`Loaded workflow "${workflow.name}"`, { path: sourcePath, nodes: workflow.nodes.length });
  return workflow;
}
