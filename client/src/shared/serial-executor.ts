/**
 * Synchronous FIFO executor.
 *
 * Runs one task at a time in submission order. A task submitted while
 * another is running (for example from a subscriber callback) is queued
 * behind it instead of running re-entrantly.
 *
 * @module shared/serial-executor
 */

export type Task = () => void;

export interface SerialExecutor {
  run(task: Task): void;
  isRunning(): boolean;
  pending(): number;
}

export function createSerialExecutor(
  onTaskError: (error: unknown) => void
): SerialExecutor {
  const queue: Task[] = [];
  let running = false;

  function drain(): void {
    running = true;
    try {
      let task = queue.shift();
      while (task !== undefined) {
        try {
          task();
        } catch (err) {
          onTaskError(err);
        }
        task = queue.shift();
      }
    } finally {
      running = false;
    }
  }

  return {
    run(task: Task): void {
      queue.push(task);
      if (!running) {
        drain();
      }
    },
    isRunning: () => running,
    pending: () => queue.length,
  };
}
