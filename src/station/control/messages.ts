import type { TimingUpdate } from "../runtimeSettings";

/** Envelope used in both directions: `{ type, payload?, timestamp }`. */
export interface ControlEnvelope {
  type: string;
  payload?: unknown;
  timestamp: string;
}

export interface StatusUpdatePayload {
  version: string;
  uptime_seconds: number;
  config: {
    health_check_interval: number;
    process_delay: number;
  };
}

export type ControlMessage =
  | { kind: "ping" }
  | { kind: "pong" }
  | { kind: "settings_update"; update: TimingUpdate }
  | { kind: "restart_command" }
  | { kind: "unknown"; type: string }
  | { kind: "invalid"; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positiveInt(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : undefined;
}

export function parseControlMessage(raw: string): ControlMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { kind: "invalid", error: "message is not JSON" };
  }
  if (!isRecord(parsed) || typeof parsed.type !== "string") {
    return { kind: "invalid", error: "message has no type" };
  }

  switch (parsed.type) {
    case "ping":
      return { kind: "ping" };
    case "pong":
      return { kind: "pong" };
    case "restart_command":
      return { kind: "restart_command" };
    case "settings_update": {
      const payload = parsed.payload;
      if (!isRecord(payload)) {
        return { kind: "invalid", error: "settings_update without payload" };
      }
      const update: TimingUpdate = {};
      const healthCheck = positiveInt(payload.health_check_interval);
      const processDelay = positiveInt(payload.process_delay);
      if (healthCheck !== undefined) update.healthCheckIntervalSeconds = healthCheck;
      if (processDelay !== undefined) update.processDelaySeconds = processDelay;
      return { kind: "settings_update", update };
    }
    default:
      return { kind: "unknown", type: parsed.type };
  }
}

export function encodeControlMessage(type: string, payload?: unknown, now: Date = new Date()): string {
  const envelope: ControlEnvelope = { type, timestamp: now.toISOString() };
  if (payload !== undefined) envelope.payload = payload;
  return JSON.stringify(envelope);
}

/** `http(s)://host/base` → `ws(s)://host/base/api/stations/<id>/ws` */
export function controlChannelUrl(apiUrl: string, stationId: string): string {
  const url = new URL(apiUrl);
  url.protocol = url.protocol === "https:" ? "wss:" : "ws:";
  const base = url.pathname.replace(/\/+$/, "");
  url.pathname = `${base}/api/stations/${encodeURIComponent(stationId)}/ws`;
  return url.toString();
}

export const INITIAL_BACKOFF_MS = 5_000;
export const MAX_BACKOFF_MS = 60_000;

export function nextBackoff(currentMs: number): number {
  return Math.min(currentMs * 2, MAX_BACKOFF_MS);
}
