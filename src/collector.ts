/**
 * Gathers results from every chapter task and detects when the crawl is done.
 *
 * Completion is an explicit count of outstanding tasks: `spawn` increments it,
 * a settled task decrements it, and the run is quiescent when it reaches zero.
 * A task spawns its continuation before it settles, so the count cannot touch
 * zero while the chain is still growing.
 */

import type { ChapterFailure, ChapterResult, CollectedRun, PageIdentity } from "./types.js";

export class ResultCollector {
  private readonly chapters: ChapterResult[] = [];
  private readonly failures: ChapterFailure[] = [];
  private readonly skipped: PageIdentity[] = [];
  private outstanding = 0;
  private quiescent = false;
  private readonly done: Promise<CollectedRun>;
  private readonly markDone: (run: CollectedRun) => void;

  constructor() {
    let resolve: (run: CollectedRun) => void = () => undefined;
    this.done = new Promise<CollectedRun>((r) => {
      resolve = r;
    });
    this.markDone = resolve;
  }

  /**
   * Start a task and count it as outstanding until it settles.
   * A rejected task is logged; the collector never leaves it unhandled.
   *
   * @throws {Error} If the run already went quiescent
   */
  spawn(task: () => Promise<void>): void {
    if (this.quiescent) {
      throw new Error("Cannot spawn a task after the crawl has finished");
    }
    this.outstanding++;
    void Promise.resolve()
      .then(task)
      .catch((error: unknown) => {
        console.error("Unhandled error in chapter task:", error);
      })
      .finally(() => this.settle());
  }

  emit(result: ChapterResult): void {
    this.chapters.push(result);
  }

  fail(failure: ChapterFailure): void {
    this.failures.push(failure);
  }

  skip(url: PageIdentity): void {
    this.skipped.push(url);
  }

  /** Number of tasks spawned but not yet settled */
  get inFlight(): number {
    return this.outstanding;
  }

  /**
   * Resolves once no task is outstanding. Results are in arrival order.
   */
  drained(): Promise<CollectedRun> {
    if (this.outstanding === 0) {
      this.finish();
    }
    return this.done;
  }

  private settle(): void {
    this.outstanding--;
    if (this.outstanding === 0) {
      this.finish();
    }
  }

  private finish(): void {
    this.quiescent = true;
    this.markDone({
      chapters: [...this.chapters],
      failures: [...this.failures],
      skipped: [...this.skipped],
    });
  }
}
