import { setTimeout as delay } from "timers/promises";
import type { CompletenessReason, IngestedPass } from "../contracts";
import { errorMessage } from "../lib/errors";
import { classifyPassDir } from "../pipeline/classify";
import { ingestPass } from "../pipeline/ingest";
import { describeDataset } from "../pipeline/metadata";
import type { CandidateQueue } from "./detector";
import type { Logger } from "./logger";
import type { ProcessedState } from "./processedState";
import type { RuntimeSettings } from "./runtimeSettings";
import type { SubmissionOutcome } from "./uploader";

export type DispatchOutcome =
  | { status: "incomplete"; passDir: string; reason: CompletenessReason }
  | { status: "malformed"; passDir: string; error: string }
  | { status: "already_marked"; passDir: string }
  | { status: "cancelled"; passDir: string }
  | SubmissionOutcome;

export interface PassSubmitter {
  submit(pass: IngestedPass): Promise<SubmissionOutcome>;
}

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface DispatcherOptions {
  tracker: ProcessedState;
  submitter: PassSubmitter;
  settings: RuntimeSettings;
  logger: Logger;
  sleep?: Sleep;
  onOutcome?: (outcome: DispatchOutcome) => void;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Single serial dispatch path. Candidates from sweeps and live events are
 * queued without duplicates (a path in flight counts as queued) and handled
 * one at a time:
 * delay (first sighting only) → classify → ingest → mark → submit.
 */
export class PassDispatcher implements CandidateQueue {
  private readonly tracker: ProcessedState;
  private readonly submitter: PassSubmitter;
  private readonly settings: RuntimeSettings;
  private readonly log: Logger;
  private readonly sleep: Sleep;
  private readonly onOutcome: ((outcome: DispatchOutcome) => void) | undefined;

  private pending: string[] = [];
  private readonly queued = new Set<string>();
  /** Paths that already served their process delay; pruned on archive or disappearance */
  private readonly delayed = new Set<string>();
  private running: Promise<void> | null = null;
  private stopped = false;
  private readonly abort = new AbortController();

  constructor(options: DispatcherOptions) {
    this.tracker = options.tracker;
    this.submitter = options.submitter;
    this.settings = options.settings;
    this.log = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
    this.onOutcome = options.onOutcome;
  }

  get queueLength(): number {
    return this.pending.length;
  }

  enqueue(passDir: string): void {
    if (this.stopped) return;
    if (this.queued.has(passDir) || this.tracker.isMarked(passDir)) return;
    this.queued.add(passDir);
    this.pending.push(passDir);
    this.drain();
  }

  /** Resolves once the queue is empty and nothing is in flight. */
  async whenIdle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  /**
   * Drop queued candidates, cut short a pending process delay, and wait for
   * the in-flight candidate to finish.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.pending = [];
    this.queued.clear();
    this.abort.abort();
    await this.whenIdle();
  }

  private drain(): void {
    if (this.running) return;
    this.running = this.loop().finally(() => {
      this.running = null;
      if (!this.stopped && this.pending.length > 0) this.drain();
    });
  }

  private async loop(): Promise<void> {
    let next = this.pending.shift();
    while (next !== undefined && !this.stopped) {
      let outcome: DispatchOutcome;
      try {
        outcome = await this.dispatch(next);
      } catch (err) {
        // No per-pass error escapes the loop.
        const error = errorMessage(err);
        this.log.error("Unexpected failure while dispatching pass", { path: next, error });
        this.tracker.clear(next);
        outcome = { status: "malformed", passDir: next, error };
      }
      this.queued.delete(next);
      this.onOutcome?.(outcome);
      next = this.pending.shift();
    }
  }

  private async dispatch(passDir: string): Promise<DispatchOutcome> {
    if (!this.delayed.has(passDir)) {
      this.delayed.add(passDir);
      const delayMs = this.settings.processDelayMs;
      this.log.debug("Waiting before processing", { path: passDir, delay_ms: delayMs });
      try {
        await this.sleep(delayMs, this.abort.signal);
      } catch (err) {
        if (this.abort.signal.aborted) {
          this.delayed.delete(passDir);
          return { status: "cancelled", passDir };
        }
        throw err;
      }
      if (this.stopped) {
        this.delayed.delete(passDir);
        return { status: "cancelled", passDir };
      }
    }

    const classification = classifyPassDir(passDir);
    if (!classification.complete) {
      if (classification.reason === "not_a_directory") this.delayed.delete(passDir);
      this.log.debug("Skipping incomplete pass", { path: passDir, reason: classification.reason });
      return { status: "incomplete", passDir, reason: classification.reason };
    }

    let pass: IngestedPass;
    try {
      pass = ingestPass(passDir);
    } catch (err) {
      const error = errorMessage(err);
      this.log.error("Failed to read pass", { path: passDir, error });
      return { status: "malformed", passDir, error };
    }

    for (const warning of pass.warnings) {
      this.log.warn(warning, { path: passDir });
    }
    this.log.debug("Dataset", describeDataset(pass.record.metadata));

    if (!this.tracker.tryMark(passDir)) {
      return { status: "already_marked", passDir };
    }

    this.log.info("Processing pass", {
      path: passDir,
      satellite: pass.record.satelliteName,
      timestamp_source: pass.timestampSource,
    });
    const outcome = await this.submitter.submit(pass);
    if (outcome.status === "archived") {
      this.delayed.delete(passDir);
    }
    return outcome;
  }
}
