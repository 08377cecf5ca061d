/** Frozen view of the job counters handed out by the report. */
export interface JobMetricsSnapshot {
  readonly readCount: number;
  readonly writeCount: number;
  readonly filterCount: number;
  readonly errorCount: number;
  readonly startTime?: number;
  readonly endTime?: number;
  /** Milliseconds between start and end (or now, while the job runs). `0` before start. */
  readonly duration: number;
}

/**
 * Counters and timestamps of one job run.
 *
 * Internal to the engine: only the orchestrator increments the counters.
 * Everyone else reads a `JobMetricsSnapshot`.
 */
export class JobMetrics {
  private read = 0;
  private written = 0;
  private filtered = 0;
  private errors = 0;
  private start?: number;
  private end?: number;

  get readCount(): number {
    return this.read;
  }

  get writeCount(): number {
    return this.written;
  }

  get filterCount(): number {
    return this.filtered;
  }

  get errorCount(): number {
    return this.errors;
  }

  get startTime(): number | undefined {
    return this.start;
  }

  get endTime(): number | undefined {
    return this.end;
  }

  get duration(): number {
    if (this.start === undefined) return 0;
    return (this.end ?? Date.now()) - this.start;
  }

  incrementReadCount(): void {
    this.read++;
  }

  incrementWriteCount(count: number): void {
    this.written += count;
  }

  incrementFilterCount(): void {
    this.filtered++;
  }

  incrementErrorCount(): void {
    this.errors++;
  }

  setStartTime(timestamp: number): void {
    this.start = timestamp;
  }

  setEndTime(timestamp: number): void {
    this.end = timestamp;
  }

  snapshot(): JobMetricsSnapshot {
    return Object.freeze({
      readCount: this.read,
      writeCount: this.written,
      filterCount: this.filtered,
      errorCount: this.errors,
      startTime: this.start,
      endTime: this.end,
      duration: this.duration,
    });
  }
}
