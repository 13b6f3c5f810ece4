/**
 * ProgressRenderer - formats Orchestrator progress events for the terminal
 *
 * Interactive (TTY): one line rewritten in place with a spinner.
 * Otherwise: one line per displayed event.
 *
 * @example
 * ```typescript
 * const renderer = new ProgressRenderer({ isInteractive: process.stderr.isTTY });
 * const orchestrator = new Orchestrator({ onProgress: info => renderer.update(info) });
 * ```
 */

import type { ProgressInfo, RunPhase } from '@unread/core';

export interface ProgressRendererOptions {
  /** Whether output is a TTY (enables spinner and line overwriting) */
  isInteractive?: boolean;
  /** Minimum milliseconds between display updates (default: 100) */
  throttle?: number;
  /** Output sink (default: process.stderr.write) */
  write?: (text: string) => void;
}

const PHASES: readonly RunPhase[] = ['discovery', 'index', 'usage', 'finalize'];

const PHASE_LABELS: Record<RunPhase, string> = {
  discovery: 'Discovery',
  index: 'Indexing',
  usage: 'Usage',
  finalize: 'Finalize',
};

export class ProgressRenderer {
  private currentPhaseIndex: number = -1;
  private currentPhase: RunPhase | null = null;
  private message: string = '';
  private totalFiles: number = 0;
  private processedFiles: number = 0;
  private spinnerIndex: number = 0;
  private isInteractive: boolean;
  private startTime: number;
  private lastDisplayTime: number = 0;
  private displayThrottle: number;
  private write: (text: string) => void;
  private spinnerFrames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

  constructor(options?: ProgressRendererOptions) {
    this.isInteractive = options?.isInteractive ?? process.stderr.isTTY ?? false;
    this.displayThrottle = options?.throttle ?? 100;
    this.startTime = Date.now();
    this.write = options?.write ?? ((text: string) => { process.stderr.write(text); });
  }

  update(info: ProgressInfo): void {
    if (info.phase !== this.currentPhase) {
      this.currentPhase = info.phase;
      this.currentPhaseIndex = PHASES.indexOf(info.phase);
      this.message = '';
      this.totalFiles = 0;
      this.processedFiles = 0;
    }

    if (info.message !== undefined) this.message = info.message;
    if (info.totalFiles !== undefined) this.totalFiles = info.totalFiles;
    if (info.processedFiles !== undefined) this.processedFiles = info.processedFiles;

    this.spinnerIndex = (this.spinnerIndex + 1) % this.spinnerFrames.length;

    const now = Date.now();
    if (now - this.lastDisplayTime < this.displayThrottle) {
      return;
    }
    this.lastDisplayTime = now;

    this.display();
  }

  private display(): void {
    if (this.isInteractive) {
      // Pad so a shorter line fully covers the previous one
      this.write(`\r${this.formatInteractive().padEnd(80, ' ')}`);
    } else {
      this.write(`${this.formatNonInteractive()}\n`);
    }
  }

  private formatElapsed(): string {
    const elapsed = (Date.now() - this.startTime) / 1000;
    if (elapsed < 60) {
      return `${elapsed.toFixed(1)}s`;
    }
    const minutes = Math.floor(elapsed / 60);
    const seconds = Math.floor(elapsed % 60);
    return `${minutes}m${seconds}s`;
  }

  private formatInteractive(): string {
    const spinner = this.spinnerFrames[this.spinnerIndex];
    // Format: ⠋ [2/4] Indexing... 150/4047 files | 12.5s
    return `${spinner} ${this.getPhaseLabel()}${this.formatFileProgress()} | ${this.formatElapsed()}`;
  }

  private formatNonInteractive(): string {
    const detail = this.message || this.formatFileProgress().trim();
    return `[${this.currentPhase ?? ''}] ${detail} (${this.formatElapsed()})`;
  }

  /**
   * "[2/4] Indexing..."
   */
  private getPhaseLabel(): string {
    if (!this.currentPhase) return '';
    return `[${this.currentPhaseIndex + 1}/${PHASES.length}] ${PHASE_LABELS[this.currentPhase]}...`;
  }

  private formatFileProgress(): string {
    if (this.totalFiles === 0) return '';
    return ` ${this.processedFiles}/${this.totalFiles} files`;
  }

  /**
   * Line ending the progress display. In TTY mode it starts with "\r" to
   * replace the spinner line.
   */
  finish(durationSeconds: number): string {
    const text = `Analysis complete in ${durationSeconds.toFixed(2)}s`;
    return this.isInteractive ? `\r${text.padEnd(80, ' ')}` : text;
  }

  /**
   * @internal
   */
  getState(): {
    phaseIndex: number;
    phase: RunPhase | null;
    processedFiles: number;
    totalFiles: number;
    spinnerIndex: number;
  } {
    return {
      phaseIndex: this.currentPhaseIndex,
      phase: this.currentPhase,
      processedFiles: this.processedFiles,
      totalFiles: this.totalFiles,
      spinnerIndex: this.spinnerIndex,
    };
  }
}
