import type { TimingUpdate } from "./runtimeSettings";

/** Everything the station main loop reacts to. */
export type StationMessage =
  | { type: "health_tick" }
  | { type: "sweep_tick" }
  | { type: "settings_changed"; update: TimingUpdate }
  | { type: "restart_requested" }
  | { type: "shutdown"; signal: string };

/**
 * Unbounded FIFO with a single async consumer. Producers post and move on;
 * the consumer awaits `next()`.
 */
export class Mailbox<T = StationMessage> {
  private readonly items: T[] = [];
  private waiter: ((item: T) => void) | null = null;

  post(item: T): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  next(): Promise<T> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve(item);
    return new Promise<T>((resolve) => {
      this.waiter = resolve;
    });
  }

  get size(): number {
    return this.items.length;
  }
}
