/**
 * Progress Reporter for the Movie Dataset Pipeline
 * Provides formatted console output for tracking build progress
 */

import { describeWarning, PipelineWarning } from './error-handler';

export interface ReporterOptions {
  verbose: boolean;
  /** Line writer; defaults to console.log */
  write?: (line: string) => void;
}

const PREFIX = '[build-movies]';

export class ProgressReporter {
  readonly verbose: boolean;
  private readonly write: (line: string) => void;
  private runStart: number | null = null;
  private stepStart: number | null = null;
  private currentStep: string | null = null;

  constructor(options: ReporterOptions) {
    this.verbose = options.verbose;
    this.write = options.write ?? (line => console.log(line));
  }

  /**
   * Log the start of a build run
   */
  logRunStart(message: string): void {
    this.runStart = Date.now();
    this.logInfo(message);
  }

  /**
   * Log the start of a step; timings are only shown in verbose mode
   */
  logStep(step: string): void {
    this.currentStep = step;
    this.stepStart = Date.now();
    this.logDetail(step);
  }

  /**
   * Log step completion
   */
  logStepComplete(recordsProcessed?: number): void {
    if (!this.currentStep || this.stepStart === null) return;

    let message = `${this.currentStep} done`;
    if (recordsProcessed !== undefined) {
      message += ` (${this.formatNumber(recordsProcessed)} records)`;
    }
    message += ` in ${this.formatDuration((Date.now() - this.stepStart) / 1000)}`;
    this.logDetail(message);

    this.currentStep = null;
    this.stepStart = null;
  }

  /**
   * Log run completion
   */
  logRunComplete(message: string): void {
    if (this.runStart !== null) {
      this.logInfo(`${message} (${this.formatDuration((Date.now() - this.runStart) / 1000)})`);
      this.runStart = null;
    } else {
      this.logInfo(message);
    }
  }

  logWarning(warning: PipelineWarning | string): void {
    const text = typeof warning === 'string' ? warning : describeWarning(warning);
    this.emit(`Warning: ${text}`);
  }

  /**
   * Always printed
   */
  logInfo(message: string): void {
    this.emit(message);
  }

  /**
   * Printed only with --verbose
   */
  logDetail(message: string): void {
    if (this.verbose) {
      this.emit(message);
    }
  }

  formatNumber(num: number): string {
    return num.toLocaleString('en-US');
  }

  formatDuration(seconds: number): string {
    if (seconds < 60) {
      return `${seconds.toFixed(1)}s`;
    } else if (seconds < 3600) {
      const minutes = Math.floor(seconds / 60);
      const secs = seconds % 60;
      return `${minutes}m ${secs.toFixed(0)}s`;
    } else {
      const hours = Math.floor(seconds / 3600);
      const minutes = Math.floor((seconds % 3600) / 60);
      return `${hours}h ${minutes}m`;
    }
  }

  private emit(message: string): void {
    this.write(`${PREFIX} ${message}`);
  }
}
