import { formatError } from "./errors";
import { readTextIfExists, writeTextAtomic } from "./filesystem";
import { setIniValues } from "./ini";
import { silentLogger, type Logger } from "./logger";
import { createTimerScheduler, type TimerHandle, type TimerScheduler } from "./scheduler";

export const DEFAULT_DEBOUNCE_MS = 300;
export const DEFAULT_MAX_PENDING = 256;

export interface WorkFileWriterOptions {
  workFile: string;
  debounceMs?: number;
  /** Pending key count at which the writer flushes without waiting. */
  maxPending?: number;
  scheduler?: TimerScheduler;
  logger?: Logger;
}

export interface WriterStats {
  flushes: number;
  failures: number;
}

/**
 * Single consumer for key/value edits to the work file.
 *
 * Edits queued within one debounce window are coalesced (last value per key
 * wins) and written together. The window starts at the first queued edit and
 * is not extended by later ones, so a steady stream of edits still produces
 * one write per window.
 */
export class WorkFileWriter {
  private readonly workFile: string;
  private readonly debounceMs: number;
  private readonly maxPending: number;
  private readonly scheduler: TimerScheduler;
  private readonly logger: Logger;

  private pending = new Map<string, string>();
  private timer: TimerHandle | null = null;
  private writing: Promise<void> = Promise.resolve();
  private closed = false;
  private readonly stats: WriterStats = { flushes: 0, failures: 0 };

  constructor(options: WorkFileWriterOptions) {
    this.workFile = options.workFile;
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.maxPending = options.maxPending ?? DEFAULT_MAX_PENDING;
    this.scheduler = options.scheduler ?? createTimerScheduler();
    this.logger = options.logger ?? silentLogger;
  }

  /** Returns false once the writer is closed. */
  public enqueue(values: Record<string, string>): boolean {
    if (this.closed) {
      return false;
    }
    for (const [key, value] of Object.entries(values)) {
      this.pending.set(key, value);
    }
    if (this.pending.size >= this.maxPending) {
      void this.flush();
      return true;
    }
    if (!this.timer && this.pending.size > 0) {
      this.timer = this.scheduler.scheduleOnce(this.debounceMs, () => {
        this.timer = null;
        return this.flush();
      });
    }
    return true;
  }

  public pendingCount(): number {
    return this.pending.size;
  }

  public getStats(): Readonly<WriterStats> {
    return { ...this.stats };
  }

  /** Writes whatever is queued now. Resolves once the write has settled. */
  public flush(): Promise<void> {
    if (this.timer) {
      this.scheduler.cancel(this.timer);
      this.timer = null;
    }
    if (this.pending.size === 0) {
      return this.writing;
    }
    const values = Object.fromEntries(this.pending);
    this.pending = new Map();
    this.writing = this.writing.then(() => this.write(values));
    return this.writing;
  }

  /** Flushes queued edits and refuses new ones. */
  public async close(): Promise<void> {
    this.closed = true;
    await this.flush();
  }

  private async write(values: Record<string, string>): Promise<void> {
    try {
      const current = await readTextIfExists(this.workFile);
      if (current === null) {
        this.logger.warn("Work file missing; dropping queued edits", { keys: Object.keys(values) });
        return;
      }
      const { text, updated } = setIniValues(current, values);
      const missing = Object.keys(values).filter((key) => !updated.includes(key));
      if (missing.length > 0) {
        this.logger.warn("Keys not present in work file were not written", { keys: missing });
      }
      if (text !== current) {
        await writeTextAtomic(this.workFile, text);
      }
      this.stats.flushes += 1;
    } catch (error) {
      this.stats.failures += 1;
      this.logger.error("Failed to write work file", { error: formatError(error) });
    }
  }
}
