/**
 * UnitTask - one source unit scheduled for one analysis phase
 */

/**
 * index: read, parse, class index, field declarations
 * usage: parameters, locals and every occurrence
 */
export type AnalysisPhase = 'index' | 'usage';

export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed';

export class UnitTask {
  readonly id: string;
  status: TaskStatus = 'pending';
  error: Error | null = null;

  constructor(
    readonly phase: AnalysisPhase,
    /** Project-relative path */
    readonly unitId: string,
    /** Absolute path */
    readonly path: string
  ) {
    this.id = `${phase}:${unitId}`;
  }
}
