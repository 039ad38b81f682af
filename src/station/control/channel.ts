import WebSocket from "ws";
import { errorMessage } from "../../lib/errors";
import type { Logger } from "../logger";
import type { Mailbox, StationMessage } from "../mailbox";
import {
  INITIAL_BACKOFF_MS,
  encodeControlMessage,
  nextBackoff,
  parseControlMessage,
  type StatusUpdatePayload,
} from "./messages";

export const PING_INTERVAL_MS = 30_000;
export const READ_DEADLINE_MS = 90_000;

export interface ControlChannelOptions {
  url: string;
  stationToken: string;
  insecure: boolean;
  mailbox: Mailbox<StationMessage>;
  logger: Logger;
  /** Current status, sent after every successful connect */
  status: () => StatusUpdatePayload;
}

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

/**
 * Long-lived WebSocket to the collection service. Inbound commands become
 * mailbox messages for the station loop; the channel never touches station
 * state itself. Reconnects with exponential backoff until stopped.
 */
export class ControlChannel {
  private readonly url: string;
  private readonly stationToken: string;
  private readonly insecure: boolean;
  private readonly mailbox: Mailbox<StationMessage>;
  private readonly log: Logger;
  private readonly status: () => StatusUpdatePayload;

  private socket: WebSocket | null = null;
  private backoffMs = INITIAL_BACKOFF_MS;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private deadlineTimer: NodeJS.Timeout | null = null;
  private stopped = false;

  constructor(options: ControlChannelOptions) {
    this.url = options.url;
    this.stationToken = options.stationToken;
    this.insecure = options.insecure;
    this.mailbox = options.mailbox;
    this.log = options.logger;
    this.status = options.status;
  }

  start(): void {
    this.stopped = false;
    this.connect();
  }

  stop(): void {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.clearConnectionTimers();
    const socket = this.socket;
    this.socket = null;
    if (socket) {
      socket.removeAllListeners();
      socket.on("error", (err) => this.log.debug("Socket error while closing", { error: err.message }));
      socket.terminate();
    }
  }

  /** Route one inbound frame. */
  handleMessage(raw: string): void {
    const message = parseControlMessage(raw);
    switch (message.kind) {
      case "ping":
        this.send("pong");
        break;
      case "pong":
        break;
      case "settings_update":
        this.log.info("Received settings update", {
          health_check_interval: message.update.healthCheckIntervalSeconds,
          process_delay: message.update.processDelaySeconds,
        });
        this.mailbox.post({ type: "settings_changed", update: message.update });
        break;
      case "restart_command":
        this.log.warn("Received restart command");
        this.mailbox.post({ type: "restart_requested" });
        break;
      case "unknown":
        this.log.warn("Unknown control message type", { type: message.type });
        break;
      case "invalid":
        this.log.warn("Ignoring control message", { error: message.error });
        break;
    }
  }

  /** Returns false when no open connection exists. */
  send(type: string, payload?: unknown): boolean {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) return false;
    socket.send(encodeControlMessage(type, payload));
    return true;
  }

  private connect(): void {
    if (this.stopped) return;
    this.log.debug("Connecting control channel", { url: this.url });

    const socket = new WebSocket(this.url, {
      headers: { authorization: `Station ${this.stationToken}` },
      rejectUnauthorized: !this.insecure,
    });
    this.socket = socket;

    socket.on("open", () => {
      this.backoffMs = INITIAL_BACKOFF_MS;
      this.log.info("Control channel connected");
      this.armDeadline(socket);
      this.pingTimer = setInterval(() => socket.ping(), PING_INTERVAL_MS);
      this.send("status_update", this.status());
    });

    socket.on("message", (data) => {
      this.armDeadline(socket);
      this.handleMessage(rawToString(data));
    });

    socket.on("pong", () => this.armDeadline(socket));

    socket.on("error", (err) => {
      this.log.warn("Control channel error", { error: errorMessage(err) });
    });

    socket.on("close", (code) => {
      this.clearConnectionTimers();
      if (this.socket === socket) this.socket = null;
      if (this.stopped) return;
      this.log.warn("Control channel closed, reconnecting", { code, delay_ms: this.backoffMs });
      this.reconnectTimer = setTimeout(() => {
        this.reconnectTimer = null;
        this.connect();
      }, this.backoffMs);
      this.backoffMs = nextBackoff(this.backoffMs);
    });
  }

  private armDeadline(socket: WebSocket): void {
    if (this.deadlineTimer) clearTimeout(this.deadlineTimer);
    this.deadlineTimer = setTimeout(() => {
      this.log.warn("Control channel silent too long, dropping connection");
      socket.terminate();
    }, READ_DEADLINE_MS);
  }

  private clearConnectionTimers(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    if (this.deadlineTimer) {
      clearTimeout(this.deadlineTimer);
      this.deadlineTimer = null;
    }
  }
}
