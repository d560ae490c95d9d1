import { randomUUID } from "node:crypto";
import WebSocket from "ws";
import { getConfig } from "../config.js";
import { EngineError } from "../errors.js";
import { log } from "../utils/logger.js";
import type { EngineClient, EngineRequest, EngineResponse, SubmitOptions } from "./client.js";
import { EngineFrameSchema, SubmitResultSchema } from "./ws-protocol.js";
import type { EventFrame, RequestFrame, ResponseFrame, SubmitParams } from "./ws-protocol.js";

type Pending = {
  resolve: (frame: ResponseFrame) => void;
  reject: (err: Error) => void;
};

export type WebSocketEngineClientOptions = {
  name?: string;
  /** ws://host:port (default: engine.url from config) */
  url?: string;
  /** Connection timeout in ms (default: timeouts.connect from config) */
  connectTimeout?: number;
};

/**
 * Keeps one connection to the engine server and multiplexes task submissions
 * over it. Requests and responses are correlated by frame id, so concurrent
 * submits are safe.
 */
export class WebSocketEngineClient implements EngineClient {
  readonly name: string;
  readonly kind = "ws" as const;
  readonly url: string;

  private ws: WebSocket | null = null;
  private pending = new Map<string, Pending>();
  private connectPromise: Promise<WebSocket> | null = null;
  private connectTimeout: number;

  onEvent?: (evt: EventFrame) => void;

  constructor(opts?: WebSocketEngineClientOptions) {
    const cfg = getConfig();
    this.name = opts?.name ?? "ws";
    this.url = opts?.url ?? cfg.engine.url;
    this.connectTimeout = opts?.connectTimeout ?? cfg.timeouts.connect;
  }

  get connected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  async connect(): Promise<WebSocket> {
    if (this.ws && this.connected) return this.ws;
    if (this.connectPromise) return this.connectPromise;

    this.connectPromise = this.doConnect();
    try {
      return await this.connectPromise;
    } finally {
      this.connectPromise = null;
    }
  }

  private doConnect(): Promise<WebSocket> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        fn();
      };

      const ws = new WebSocket(this.url);
      this.ws = ws;

      const timeout = setTimeout(() => {
        settle(() => {
          ws.terminate();
          reject(new EngineError("ENGINE_UNAVAILABLE", `Connection to ${this.url} timed out`));
        });
      }, this.connectTimeout);

      ws.on("open", () => {
        log.debug(`[${this.name}] Connected to ${this.url}`);
        settle(() => resolve(ws));
      });

      ws.on("message", (raw) => this.handleMessage(raw.toString()));

      ws.on("error", (err) => {
        log.error(`[${this.name}] Engine connection error`, { error: String(err) });
        settle(() => reject(new EngineError("ENGINE_UNAVAILABLE", `Cannot reach engine at ${this.url}: ${err.message}`)));
      });

      ws.on("close", (code) => {
        if (this.ws === ws) this.ws = null;
        settle(() => reject(new EngineError("ENGINE_UNAVAILABLE", `Connection closed (code=${code})`)));
        for (const [id, p] of this.pending) {
          p.reject(new EngineError("ENGINE_UNAVAILABLE", `Connection closed (code=${code})`));
          this.pending.delete(id);
        }
        log.debug(`[${this.name}] Connection closed`, { code });
      });
    });
  }

  private handleMessage(data: string): void {
    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch {
      log.warn(`[${this.name}] Failed to parse engine frame`, { data: data.slice(0, 200) });
      return;
    }

    const parsed = EngineFrameSchema.safeParse(json);
    if (!parsed.success) {
      log.warn(`[${this.name}] Ignoring unknown engine frame`, { data: data.slice(0, 200) });
      return;
    }

    const frame = parsed.data;
    if (frame.type === "event") {
      this.onEvent?.(frame);
      return;
    }

    const p = this.pending.get(frame.id);
    if (!p) return;
    this.pending.delete(frame.id);
    p.resolve(frame);
  }

  private async request(method: RequestFrame["method"], params: unknown, signal?: AbortSignal): Promise<ResponseFrame> {
    const ws = await this.connect();
    const id = randomUUID();
    const frame: RequestFrame = { type: "req", id, method, params };

    return new Promise<ResponseFrame>((resolve, reject) => {
      const onAbort = () => {
        this.pending.delete(id);
        reject(new EngineError("RUN_CANCELLED", `Request ${method} aborted`));
      };
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener("abort", onAbort, { once: true });

      this.pending.set(id, {
        resolve: (res) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(res);
        },
        reject: (err) => {
          signal?.removeEventListener("abort", onAbort);
          reject(err);
        },
      });

      ws.send(JSON.stringify(frame));
    });
  }

  private notify(method: RequestFrame["method"], params: unknown): void {
    if (!this.ws || !this.connected) return;
    const frame: RequestFrame = { type: "req", id: randomUUID(), method, params };
    this.ws.send(JSON.stringify(frame));
  }

  async submit(request: EngineRequest, opts?: SubmitOptions): Promise<EngineResponse> {
    const params: SubmitParams = {
      taskId: request.taskId,
      parentTaskIds: request.parentTaskIds,
      artifact: request.artifactPath,
      input: request.input,
    };

    const onAbort = () => this.notify("task.cancel", { taskId: request.taskId });
    opts?.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      log.debug(`[${this.name}] Submitting task "${request.taskId}"`);
      const res = await this.request("task.submit", params, opts?.signal);

      if (!res.ok) {
        const err = res.error;
        return { ok: false, diagnostic: err ? `${err.code}: ${err.message}` : "Unknown engine error" };
      }

      const result = SubmitResultSchema.safeParse(res.payload);
      if (!result.success) {
        throw new EngineError("ENGINE_EXCEPTION", `Malformed task.submit result for "${request.taskId}"`);
      }
      return { ok: true, output: result.data.output, exitCode: result.data.exitCode };
    } finally {
      opts?.signal?.removeEventListener("abort", onAbort);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await this.request("health", undefined, AbortSignal.timeout(this.connectTimeout));
      return res.ok;
    } catch (err) {
      log.debug(`[${this.name}] Health check failed`, { error: String(err) });
      return false;
    }
  }

  close(): void {
    if (this.ws) {
      this.ws.close(1000, "scheduler disconnect");
      this.ws = null;
    }
  }
}
