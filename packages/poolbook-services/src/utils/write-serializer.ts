/**
 * Write Serializer
 *
 * Single-writer guard for a registry. Writes queue in FIFO order and never
 * interleave, even though they await collaborators mid-write. A write started
 * from inside an in-flight write (for instance a collaborator calling back into
 * the registry) is rejected instead of queued, since it would wait on itself.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ConflictError } from '../errors/index.js';

export class WriteSerializer {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private readonly activeWrite = new AsyncLocalStorage<string>();

  constructor(private readonly owner: string) {}

  /**
   * Number of writes queued or running
   */
  get size(): number {
    return this.pending;
  }

  /**
   * Run `write` once every earlier write has settled
   *
   * @throws ConflictError (ReentrantWrite) when called from inside a running write
   */
  run<T>(operation: string, write: () => Promise<T>): Promise<T> {
    const running = this.activeWrite.getStore();
    if (running !== undefined) {
      return Promise.reject(
        new ConflictError(
          'ReentrantWrite',
          `${this.owner}.${operation} called while ${this.owner}.${running} is in progress`,
          { owner: this.owner, operation, running }
        )
      );
    }

    this.pending += 1;
    const result = this.tail.then(() => this.activeWrite.run(operation, write));
    // the queue only waits for settlement; the outcome goes to the caller via `result`
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  private settle(): void {
    this.pending -= 1;
  }
}
