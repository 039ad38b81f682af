import * as fs from "fs";
import * as path from "path";
import * as chokidar from "chokidar";
import { errorMessage } from "../lib/errors";
import type { Logger } from "./logger";
import type { ProcessedState } from "./processedState";

/** Receives candidate pass directories. Duplicates are expected. */
export interface CandidateQueue {
  enqueue(passDir: string): void;
}

/** The subset of a chokidar watcher the detector drives. */
export interface RootWatcher {
  on(event: "addDir", listener: (dirPath: string) => void): unknown;
  on(event: "error", listener: (err: unknown) => void): unknown;
  on(event: "ready", listener: () => void): unknown;
  close(): Promise<void>;
}

export type WatchRoot = (root: string) => RootWatcher;

export interface DetectorOptions {
  roots: readonly string[];
  tracker: ProcessedState;
  queue: CandidateQueue;
  logger: Logger;
  /** Creates the watcher for one root; defaults to chokidar */
  watch?: WatchRoot;
}

const watchWithChokidar: WatchRoot = (root) =>
  chokidar.watch(root, {
    persistent: true,
    ignoreInitial: true,
    depth: 0,
  });

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Finds candidate pass directories: immediate subdirectories of each watch
 * root, both those already present (sweep) and those created later
 * (filesystem notifications). Delivery is at-least-once.
 */
export class DirectoryDetector {
  private readonly roots: string[];
  private readonly tracker: ProcessedState;
  private readonly queue: CandidateQueue;
  private readonly log: Logger;
  private readonly watch: WatchRoot;
  private readonly watchers = new Map<string, RootWatcher>();

  constructor(options: DetectorOptions) {
    this.roots = options.roots.map((r) => path.resolve(r));
    this.tracker = options.tracker;
    this.queue = options.queue;
    this.log = options.logger;
    this.watch = options.watch ?? watchWithChokidar;
  }

  /** Roots with a live subscription. */
  watchedRoots(): string[] {
    return [...this.watchers.keys()];
  }

  /** Roots that currently exist as directories. */
  activeRoots(): string[] {
    return this.roots.filter((root) => isDirectory(root));
  }

  /**
   * Sweep, subscribe, sweep again. The second sweep covers directories
   * created between the first sweep and the subscription becoming live.
   */
  async start(): Promise<void> {
    this.sweep();

    const roots = this.activeRoots();
    for (const root of this.roots) {
      if (!roots.includes(root)) {
        this.log.warn("Watch path is missing or not a directory, skipping", { path: root });
      }
    }

    for (const root of roots) {
      await this.subscribe(root);
    }

    this.sweep();
  }

  /**
   * Forward every immediate subdirectory of every root that the tracker has
   * not marked. Returns the forwarded paths.
   */
  sweep(): string[] {
    const forwarded: string[] = [];
    for (const root of this.roots) {
      let entries: fs.Dirent[];
      try {
        entries = fs.readdirSync(root, { withFileTypes: true });
      } catch (err) {
        this.log.warn("Cannot list watch path", { path: root, error: errorMessage(err) });
        continue;
      }

      entries.sort((a, b) => a.name.localeCompare(b.name));
      for (const entry of entries) {
        if (!entry.isDirectory()) continue;
        const passDir = path.join(root, entry.name);
        if (this.tracker.isMarked(passDir)) continue;
        this.queue.enqueue(passDir);
        forwarded.push(passDir);
      }
    }
    if (forwarded.length > 0) {
      this.log.debug("Sweep found candidates", { count: forwarded.length });
    }
    return forwarded;
  }

  async stop(): Promise<void> {
    const watchers = [...this.watchers.values()];
    this.watchers.clear();
    await Promise.all(watchers.map((w) => w.close()));
  }

  /**
   * Subscribe to one root. An error before the watcher is ready skips that
   * root with a warning; the others keep their subscriptions. A failure to
   * create the watcher at all propagates.
   */
  private async subscribe(root: string): Promise<void> {
    const watcher = this.watch(root);

    watcher.on("addDir", (dirPath: string) => {
      const resolved = path.resolve(dirPath);
      if (path.dirname(resolved) !== root) return;
      this.log.debug("New directory", { path: resolved });
      this.queue.enqueue(resolved);
    });

    const ready = await new Promise<boolean>((resolve) => {
      let settled = false;
      watcher.on("error", (err: unknown) => {
        if (!settled) {
          settled = true;
          this.log.warn("Cannot watch path, skipping", { path: root, error: errorMessage(err) });
          resolve(false);
          return;
        }
        this.log.error("Watcher error", { path: root, error: errorMessage(err) });
      });
      watcher.on("ready", () => {
        if (settled) return;
        settled = true;
        resolve(true);
      });
    });

    if (!ready) {
      await watcher.close();
      return;
    }
    this.watchers.set(root, watcher);
    this.log.info("Watching directory", { path: root });
  }
}
