/**
 * SerialTaskQueue: one statement at a time per handle.
 *
 * Drivers whose client cannot run concurrent statements on one connection
 * route every call through `run`, which resolves with the task's own result
 * once every task enqueued before it has settled.
 */

type Task = () => Promise<void>;

export class SerialTaskQueue {
  private queue: Task[] = [];
  private running = false;

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => Promise.resolve().then(task).then(resolve, reject));
      if (!this.running) {
        void this.drain();
      }
    });
  }

  private async drain(): Promise<void> {
    this.running = true;
    let next = this.queue.shift();
    while (next) {
      // entries forward their own rejection to the caller of run()
      await next();
      next = this.queue.shift();
    }
    this.running = false;
  }

  /** Number of tasks waiting in the queue */
  get pendingCount(): number {
    return this.queue.length;
  }
}
