/**
 * Serial job dispatcher.
 *
 * Jobs posted from watcher callbacks and the connectivity monitor are
 * handled one at a time in arrival order. While a handler awaits an upload
 * no other job starts, so uploads never overlap and filesystem events keep
 * their order. A failing job is reported and the next one runs.
 */

export type JobHandler<T> = (job: T) => Promise<void>;

export class SerialDispatcher<T> {
  private readonly jobs: T[] = [];
  private readonly handler: JobHandler<T>;
  private readonly onError: (error: Error, job: T) => void;
  private pumping: Promise<void> | null = null;
  private closed = false;

  constructor(handler: JobHandler<T>, onError: (error: Error, job: T) => void) {
    this.handler = handler;
    this.onError = onError;
  }

  /** Jobs waiting behind the one being handled */
  get pending(): number {
    return this.jobs.length;
  }

  get isBusy(): boolean {
    return this.pumping !== null;
  }

  /**
   * Queue a job.
   * @returns false if the dispatcher is closed and the job was dropped
   */
  post(job: T): boolean {
    if (this.closed) return false;
    this.jobs.push(job);
    if (!this.pumping) {
      this.pumping = this.pump();
    }
    return true;
  }

  /** Resolves once the queue is empty and no job is running */
  async whenIdle(): Promise<void> {
    while (this.pumping) {
      await this.pumping;
    }
  }

  /**
   * Stop accepting jobs, drop the queued ones and wait for the running
   * job to finish.
   * @returns number of queued jobs dropped
   */
  async close(): Promise<number> {
    this.closed = true;
    const dropped = this.jobs.length;
    this.jobs.length = 0;
    await this.whenIdle();
    return dropped;
  }

  private async pump(): Promise<void> {
    try {
      let job = this.jobs.shift();
      while (job !== undefined) {
        try {
          await this.handler(job);
        } catch (err) {
          this.onError(err instanceof Error ? err : new Error(String(err)), job);
        }
        job = this.jobs.shift();
      }
    } finally {
      this.pumping = null;
    }
  }
}
