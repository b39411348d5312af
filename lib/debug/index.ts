/**
 * Debug/Metrics Module
 *
 * Timing, counters and a pluggable logger for a conversion run.
 */

// ============================================================================
// Types
// ============================================================================

/** `read`: opening the package and parsing worksheets; `write`: rendering and saving */
export type ConversionPhase = 'read' | 'write';

export interface ConversionMetrics {
  /** Total run time in ms */
  totalTime: number;
  /** Accumulated time per phase */
  phases: Record<ConversionPhase, number>;
  /** Worksheets processed */
  sheets: number;
  /** Cell elements seen across all worksheets */
  cells: number;
  /** Files written */
  files: string[];
  /** Errors recorded before they were rethrown */
  errors: number;
  /** Warnings and notes */
  warnings: string[];
  /** Detailed trace logs */
  trace?: TraceEvent[];
}

export interface TraceEvent {
  timestamp: number;
  phase: string;
  event: string;
  duration?: number;
  metadata?: Record<string, unknown>;
}

export interface SessionOptions {
  /** Enable detailed tracing */
  tracing?: boolean;
  /** Log to console */
  verbose?: boolean;
  /** Custom logger */
  logger?: (message: string, data?: Record<string, unknown>) => void;
}

// ============================================================================
// Conversion Session
// ============================================================================

/**
 * Tracks one conversion run
 *
 * @example
 * ```typescript
 * const session = new ConversionSession({ logger: (msg) => console.error(msg) });
 *
 * session.startPhase('read');
 * // ... read sheets
 * session.endPhase('read');
 *
 * session.recordFile('./report.01_Sales.csv');
 * console.log(session.getMetrics().files);
 * ```
 */
export class ConversionSession {
  private readonly startTime: number;
  private readonly phaseStartTimes = new Map<ConversionPhase, number>();
  private readonly phaseDurations: Record<ConversionPhase, number> = { read: 0, write: 0 };
  private sheets = 0;
  private cells = 0;
  private errors = 0;
  private readonly files: string[] = [];
  private readonly warnings: string[] = [];
  private readonly trace: TraceEvent[] = [];
  private readonly options: SessionOptions;

  constructor(options: SessionOptions = {}) {
    this.options = options;
    this.startTime = Date.now();
  }

  /**
   * Progress message, shown by the logger or in verbose mode
   */
  info(message: string, data?: Record<string, unknown>): void {
    if (this.options.logger) {
      this.options.logger(message, data);
    } else if (this.options.verbose) {
      console.error(`[xlsx-tabulate] ${message}`);
    }
  }

  /**
   * Detail message, shown in verbose mode only
   */
  debug(message: string, data?: Record<string, unknown>): void {
    if (this.options.verbose) {
      this.info(message, data);
    }
  }

  private addTrace(phase: string, event: string, metadata?: Record<string, unknown>, duration?: number): void {
    if (this.options.tracing) {
      this.trace.push({
        timestamp: Date.now() - this.startTime,
        phase,
        event,
        duration,
        metadata,
      });
    }
  }

  startPhase(phase: ConversionPhase): void {
    this.phaseStartTimes.set(phase, Date.now());
    this.addTrace(phase, 'start');
  }

  /**
   * End timing a phase; the duration is added to the phase total
   */
  endPhase(phase: ConversionPhase): number {
    const start = this.phaseStartTimes.get(phase);
    if (start === undefined) {
      this.warn(`Phase ${phase} was not started`);
      return 0;
    }

    const duration = Date.now() - start;
    this.phaseDurations[phase] += duration;
    this.phaseStartTimes.delete(phase);
    this.addTrace(phase, 'end', undefined, duration);
    this.debug(`${phase}: ${duration}ms`);

    return duration;
  }

  /**
   * Time a synchronous step
   */
  measure<T>(phase: ConversionPhase, step: () => T): T {
    this.startPhase(phase);
    try {
      return step();
    } finally {
      this.endPhase(phase);
    }
  }

  recordSheet(name: string, cells: number): void {
    this.sheets++;
    this.cells += cells;
    this.addTrace('read', 'sheet', { name, cells });
  }

  recordFile(filePath: string): void {
    this.files.push(filePath);
    this.addTrace('write', 'file', { path: filePath });
  }

  recordError(error: unknown): void {
    this.errors++;
    const message = error instanceof Error ? error.message : String(error);
    this.addTrace('error', message);
    this.debug(`Error: ${message}`);
  }

  warn(message: string): void {
    this.warnings.push(message);
    this.addTrace('warning', message);
    this.info(`Warning: ${message}`);
  }

  getMetrics(): ConversionMetrics {
    return {
      totalTime: Date.now() - this.startTime,
      phases: { ...this.phaseDurations },
      sheets: this.sheets,
      cells: this.cells,
      files: [...this.files],
      errors: this.errors,
      warnings: [...this.warnings],
      trace: this.options.tracing ? [...this.trace] : undefined,
    };
  }

  /**
   * One-line summary of the run
   */
  summary(): string {
    const metrics = this.getMetrics();
    return `${metrics.sheets} sheet(s), ${metrics.cells} cell(s), ${metrics.files.length} file(s) in ${metrics.totalTime}ms`;
  }
}
