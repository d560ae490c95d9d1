import { getConfig } from "../config.js";
import type { EngineKind } from "../config.js";
import { EngineError } from "../errors.js";
import { log } from "../utils/logger.js";
import { CliEngineClient } from "./cli-client.js";
import type { EngineClient } from "./client.js";
import { HttpEngineClient } from "./http-client.js";
import { WebSocketEngineClient } from "./ws-client.js";

/** Build the engine client selected by `engine.kind`. */
export function createEngineClient(kind: EngineKind = getConfig().engine.kind): EngineClient {
  const cfg = getConfig().engine;
  switch (kind) {
    case "cli":
      return new CliEngineClient({ command: cfg.command, env: cfg.env });
    case "http":
      return new HttpEngineClient({ url: cfg.url });
    case "ws": {
      const client = new WebSocketEngineClient({ url: cfg.url });
      client.onEvent = (evt) => log.debug(`[${client.name}] Engine event "${evt.event}"`, { seq: evt.seq });
      return client;
    }
  }
}

/** Fail before any node is dispatched when the engine says it is not reachable. */
export async function ensureEngineReady(engine: EngineClient): Promise<void> {
  if (!engine.healthCheck) return;
  const healthy = await engine.healthCheck();
  if (!healthy) {
    throw new EngineError("ENGINE_UNAVAILABLE", `Engine "${engine.name}" did not pass its health check`);
  }
  log.debug(`[${engine.name}] Health check passed`);
}
