/**
 * UnitQueue - the units of one phase, handed out in discovery order
 *
 * A failed task leaves the queue like a completed one; there are no retries,
 * a unit that fails once fails the run.
 */

import { UnitTask, type AnalysisPhase } from './UnitTask.js';

export interface UnitSource {
  relativePath: string;
  absolutePath: string;
}

export class UnitQueue {
  private readonly tasks: UnitTask[];
  private cursor = 0;

  constructor(phase: AnalysisPhase, units: readonly UnitSource[]) {
    const seen = new Set<string>();
    this.tasks = [];
    for (const unit of units) {
      if (seen.has(unit.relativePath)) {
        throw new Error(`Unit ${unit.relativePath} already queued for ${phase}`);
      }
      seen.add(unit.relativePath);
      this.tasks.push(new UnitTask(phase, unit.relativePath, unit.absolutePath));
    }
  }

  /**
   * Next pending task, marked running; null once every task was handed out.
   */
  next(): UnitTask | null {
    const task = this.tasks[this.cursor];
    if (!task) return null;
    this.cursor++;
    task.status = 'running';
    return task;
  }

  complete(task: UnitTask): void {
    task.status = 'completed';
  }

  fail(task: UnitTask, error: Error): void {
    task.status = 'failed';
    task.error = error;
  }

  get size(): number {
    return this.tasks.length;
  }

  get isEmpty(): boolean {
    return this.cursor >= this.tasks.length;
  }

  getFailedTasks(): UnitTask[] {
    return this.tasks.filter(task => task.status === 'failed');
  }
}
