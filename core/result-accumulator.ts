import type { PostRecord } from '../types/post';
import { SearchErrors } from './errors';

/**
 * Append-only store for the posts of one run, in page arrival order.
 * Duplicate IDs across pages are kept as they arrive.
 */
export class ResultAccumulator {
  private readonly posts: PostRecord[] = [];
  private sealed = false;

  append(batch: readonly PostRecord[]): void {
    if (this.sealed) {
      throw SearchErrors.internal('Cannot append to a sealed result accumulator', { batchSize: batch.length });
    }
    this.posts.push(...batch);
  }

  count(): number {
    return this.posts.length;
  }

  snapshot(): readonly PostRecord[] {
    return Object.freeze([...this.posts]);
  }

  /** Called once the run outcome is final */
  seal(): readonly PostRecord[] {
    this.sealed = true;
    return this.snapshot();
  }
}
