import { z } from "zod";
import { ERROR_CODES, ValidationError } from "./errors.js";

export const WorkflowNodeSchema = z.object({
  id: z.string().min(1, "node id must not be empty"),
  dependencies: z.array(z.string()).default([]),
  image: z.string().min(1, "node image must not be empty"),
  instruction: z.string().optional(),
  config: z.record(z.unknown()).optional(),
});

export const WorkflowFileSchema = z
  .object({
    name: z.string().default("Untitled"),
    nodes: z.array(WorkflowNodeSchema),
  })
  .superRefine((wf, ctx) => {
    const seen = new Set<string>();
    wf.nodes.forEach((node, i) => {
      if (seen.has(node.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["nodes", i, "id"],
          message: `duplicate node id "${node.id}"`,
        });
      }
      seen.add(node.id);
    });
  });

export type WorkflowFile = z.infer<typeof WorkflowFileSchema>;

export const PayloadStrategySchema = z.enum(["lineage", "content"]);
export const EngineKindSchema = z.enum(["cli", "http", "ws"]);

/** Parse `data` with `schema`, throwing a ValidationError listing every issue. */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, label: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => {
      const path = i.path.length > 0 ? `${i.path.join(".")}: ` : "";
      return `${path}${i.message}`;
    });
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${label}: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}

const BlockedNodeSchema = z.object({
  id: z.string(),
  unmet: z.array(z.string()),
  missing: z.array(z.string()),
});

const NodeOutcomeSchema = z.object({
  nodeId: z.string(),
  taskId: z.string(),
  status: z.enum(["Success", "Failed", "Timeout", "Exception", "Cancelled"]),
  startedAt: z.number(),
  finishedAt: z.number(),
  durationMs: z.number(),
  parentTaskIds: z.array(z.string()),
  upstreamIds: z.array(z.string()),
  output: z.string().optional(),
  diagnostic: z.string().optional(),
  errorCode: z.enum(ERROR_CODES).optional(),
});

/** Shape of a stored run report. */
export const RunReportSchema = z.object({
  runId: z.string(),
  workflow: z.string(),
  status: z.enum(["completed", "failed", "deadlock", "cancelled"]),
  completed: z.boolean(),
  failingNode: z.string().optional(),
  error: z.object({ code: z.enum(ERROR_CODES), message: z.string() }).optional(),
  blocked: z.array(BlockedNodeSchema).optional(),
  nodes: z.array(NodeOutcomeSchema),
  results: z.record(z.string()),
  notStarted: z.array(z.string()),
  blockedByFailure: z.array(z.string()),
  startedAt: z.number(),
  finishedAt: z.number(),
  wallTimeMs: z.number(),
});
