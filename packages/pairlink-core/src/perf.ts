// Named timers for connector operations.

/** One completed timing. */
export interface Measurement {
  name: string;
  /** Elapsed milliseconds. */
  time: number;
}

/** Snapshot of the measurements drained by `PerfCollector.report()`. */
export class PerfReport {
  constructor(readonly measurements: readonly Measurement[]) {}

  /** Measurements with the given name, in completion order. */
  named(name: string): Measurement[] {
    return this.measurements.filter((m) => m.name === name);
  }

  toJSON(): { measurements: Measurement[] } {
    return { measurements: this.measurements.map((m) => ({ ...m })) };
  }
}

export interface PerfCollectorOptions {
  /** Timers still running after this long are stopped by `report()`. Default: 1000 */
  danglingTimeoutMs?: number;
  /** Clock in milliseconds. Default: performance.now */
  now?: () => number;
}

/**
 * Collects named timings.
 *
 * Injected into a connector instead of living in process-wide state, so two
 * connectors in one process keep separate reports.
 */
export class PerfCollector {
  private readonly danglingTimeoutMs: number;
  private readonly now: () => number;
  private readonly running = new Map<number, { name: string; startedAt: number }>();
  private measurements: Measurement[] = [];
  private nextId = 1;

  constructor(options: PerfCollectorOptions = {}) {
    this.danglingTimeoutMs = options.danglingTimeoutMs ?? 1000;
    this.now = options.now ?? (() => performance.now());
  }

  /** Timers started and not yet stopped. */
  get active(): number {
    return this.running.size;
  }

  /** Start a timer and return its id. */
  start(name: string): number {
    const id = this.nextId++;
    this.running.set(id, { name, startedAt: this.now() });
    return id;
  }

  /**
   * Stop a timer and record it.
   *
   * @returns elapsed milliseconds, or -1 if the id is unknown or already stopped
   */
  stop(id: number): number {
    const timer = this.running.get(id);
    if (!timer) return -1;
    this.running.delete(id);
    const time = this.now() - timer.startedAt;
    this.measurements.push({ name: timer.name, time });
    return time;
  }

  /** Time an async operation, recording it whether it resolves or rejects. */
  async measure<T>(name: string, op: () => Promise<T>): Promise<T> {
    const id = this.start(name);
    try {
      return await op();
    } finally {
      this.stop(id);
    }
  }

  /**
   * Stop dangling timers, then drain every recorded measurement.
   */
  report(): PerfReport {
    const now = this.now();
    for (const [id, timer] of [...this.running]) {
      if (now - timer.startedAt > this.danglingTimeoutMs) {
        this.stop(id);
      }
    }
    const measurements = this.measurements;
    this.measurements = [];
    return new PerfReport(measurements);
  }
}
