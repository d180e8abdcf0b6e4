export type TrackedLevel = 'error' | 'warn';

export interface TrackerSnapshot {
  errors: number;
  warnings: number;
  lastError?: string;
}

/**
 * Run-wide tally of notable log entries. The CLI entry points read it after a run to
 * decide the exit code, so an error that was caught and logged still fails the run.
 */
export class ErrorTracker {
  private errors = 0;
  private warnings = 0;
  private lastError?: string;

  record(level: TrackedLevel, message?: string): void {
    if (level === 'error') {
      this.errors += 1;
      if (message) {
        this.lastError = message;
      }
      return;
    }
    this.warnings += 1;
  }

  get fired(): boolean {
    return this.errors > 0;
  }

  exitCode(): number {
    return this.fired ? 1 : 0;
  }

  snapshot(): TrackerSnapshot {
    return { errors: this.errors, warnings: this.warnings, lastError: this.lastError };
  }
}
