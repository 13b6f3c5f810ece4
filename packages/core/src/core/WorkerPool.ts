/**
 * WorkerPool - fixed number of async workers draining a UnitQueue
 *
 * Workers share one thread. Concurrency comes from the handler awaiting I/O,
 * so several units are in flight at once and their events interleave.
 */

import { EventEmitter } from 'events';
import type { UnitTask } from './UnitTask.js';
import type { UnitQueue } from './UnitQueue.js';

export type TaskHandler = (task: UnitTask) => Promise<void>;

export interface WorkerTaskCompletedEvent {
  workerId: number;
  task: UnitTask;
}

export interface WorkerTaskFailedEvent {
  workerId: number;
  task: UnitTask;
  error: Error;
}

export class WorkerPool extends EventEmitter {
  private readonly workerCount: number;

  constructor(workerCount: number, private readonly handler: TaskHandler) {
    super();
    this.workerCount = Math.max(1, workerCount);
  }

  /**
   * Resolves once every task was handled. Handler failures mark the task
   * failed and the worker moves on.
   */
  async processQueue(queue: UnitQueue): Promise<void> {
    const workers: Promise<void>[] = [];
    for (let i = 0; i < this.workerCount; i++) {
      workers.push(this.worker(i, queue));
    }
    await Promise.all(workers);
  }

  private async worker(workerId: number, queue: UnitQueue): Promise<void> {
    for (let task = queue.next(); task; task = queue.next()) {
      try {
        await this.handler(task);
        queue.complete(task);
        this.emit('worker:task:completed', { workerId, task } satisfies WorkerTaskCompletedEvent);
      } catch (caught) {
        const error = caught instanceof Error ? caught : new Error(String(caught));
        queue.fail(task, error);
        this.emit('worker:task:failed', { workerId, task, error } satisfies WorkerTaskFailedEvent);
      }
    }
  }
}
