/**
 * Single-consumer queue for the spectral + classification stage.
 *
 * Jobs run one at a time, off the producer's call, in the order they were
 * queued. cancelAll() bumps the generation so every job queued before it is
 * dropped without running; a job that is already running finishes but its
 * owner is expected to check isCurrent() before publishing.
 */

import { logger } from "@/lib/logger";

export type QueueJob = (isCurrent: () => boolean) => void;

export class ClassificationQueue {
  private tail: Promise<void> = Promise.resolve();
  private generation = 0;
  private pending = 0;

  /** Jobs queued or running */
  get size(): number {
    return this.pending;
  }

  enqueue(job: QueueJob): void {
    const gen = this.generation;
    const isCurrent = () => gen === this.generation;
    this.pending++;
    this.tail = this.tail
      .then(() => {
        if (isCurrent()) job(isCurrent);
      })
      .catch((err: unknown) => {
        logger.error("[ClassificationQueue] job failed:", err);
      })
      .finally(() => {
        this.pending--;
      });
  }

  /** Drop everything queued so far */
  cancelAll(): void {
    this.generation++;
  }

  /** Resolves once every job queued before this call has settled */
  drain(): Promise<void> {
    return this.tail;
  }
}
