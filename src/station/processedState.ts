/**
 * In-memory record of pass directories the station currently owns or has
 * already posted. Lives for one process; the archive move is the durable
 * "done" signal across restarts.
 *
 * Only the dispatch path mutates it. `tryMark` is the combined
 * check-and-set that keeps at most one dispatch in flight per path.
 */
export class ProcessedState {
  private readonly marked = new Set<string>();

  isMarked(passDir: string): boolean {
    return this.marked.has(passDir);
  }

  /** Record ownership before any remote call. Idempotent. */
  markInProgress(passDir: string): void {
    this.marked.add(passDir);
  }

  /** Mark if unmarked. Returns false when the path was already owned. */
  tryMark(passDir: string): boolean {
    if (this.marked.has(passDir)) return false;
    this.marked.add(passDir);
    return true;
  }

  /** Post creation failed: make the path eligible again. */
  clear(passDir: string): void {
    this.marked.delete(passDir);
  }

  get size(): number {
    return this.marked.size;
  }
}
