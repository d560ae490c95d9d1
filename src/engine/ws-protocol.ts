import { z } from "zod";

// Engine WebSocket protocol frames
export type RequestFrame = {
  type: "req";
  id: string;
  method: "task.submit" | "task.cancel" | "health";
  params?: unknown;
};

export type SubmitParams = {
  taskId: string;
  parentTaskIds: string[];
  artifact: string;
  input: Record<string, unknown>;
};

export const ResponseFrameSchema = z.object({
  type: z.literal("res"),
  id: z.string(),
  ok: z.boolean(),
  payload: z.unknown().optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      details: z.unknown().optional(),
    })
    .optional(),
});

export const EventFrameSchema = z.object({
  type: z.literal("event"),
  event: z.string(),
  payload: z.unknown().optional(),
  seq: z.number().optional(),
});

export const EngineFrameSchema = z.discriminatedUnion("type", [ResponseFrameSchema, EventFrameSchema]);

export const SubmitResultSchema = z.object({
  output: z.string(),
  exitCode: z.number().optional(),
});

export type ResponseFrame = z.infer<typeof ResponseFrameSchema>;
export type EventFrame = z.infer<typeof EventFrameSchema>;
