import { formatError } from "./errors";
import { ensureDir, fileExists, getModifiedTime } from "./filesystem";
import type { GameDetector } from "./gameDetector";
import { silentLogger, type Logger } from "./logger";
import { DEFAULT_MARKER } from "./merge";
import {
  createTimerScheduler,
  systemClock,
  type Clock,
  type TimerHandle,
  type TimerScheduler
} from "./scheduler";
import { syncTargets } from "./sync";
import type {
  ExcludedFieldsConfig,
  IntervalsConfig,
  LiveSyncConfigFile,
  SyncLayout,
  SyncReport,
  SyncSession
} from "./types";

export const GAME_START_DELAY_SECONDS = 10;

export const DEFAULT_INTERVALS: IntervalsConfig = {
  activeMs: 1_000,
  idleMs: 3_000,
  preGameMs: 10_000
};

export const EXCLUDED_FIELDS: readonly string[] = [
  "DifficultyGameplayTag",
  "DifficultyNameKey",
  "DifficultySubtextKey",
  "DifficultyDescriptionKey",
  "DifficultyFlavorKey",
  "DifficultyBackground",
  "StackupLevel",
  "GameplayTagList"
];

export interface LiveSyncManagerOptions {
  layout: SyncLayout;
  detector: GameDetector;
  /** When false, `start` and `refreshNow` do nothing. */
  enabled?: boolean;
  marker?: string;
  preGameSync?: boolean;
  intervals?: IntervalsConfig;
  startDelaySeconds?: number;
  excludedFields?: ExcludedFieldsConfig;
  atomicWrites?: boolean;
  scheduler?: TimerScheduler;
  clock?: Clock;
  logger?: Logger;
  /** Called after every sync run, e.g. to persist the report. */
  onReport?: (report: SyncReport) => void | Promise<void>;
}

export function liveSyncOptionsFromConfig(
  config: LiveSyncConfigFile
): Omit<LiveSyncManagerOptions, "layout" | "detector"> {
  return {
    enabled: config.enabled,
    marker: config.sync.marker,
    preGameSync: config.sync.preGameSync,
    intervals: config.sync.intervals,
    startDelaySeconds: config.game.startDelaySeconds,
    excludedFields: config.sync.excludedFields,
    atomicWrites: config.sync.atomicWrites
  };
}

function createSession(): SyncSession {
  return {
    lastSourceModifiedTime: null,
    isIdle: true,
    gameRunning: false,
    gameStartedAt: null,
    syncArmed: false,
    initialProbeDone: false,
    lastError: null,
    lastSyncAt: null,
    lastReport: null
  };
}

/**
 * Polls the work file and pushes its `[Global]` body into the difficulty
 * files.
 *
 * Ticks are chained rather than run on an interval: the next one is only
 * scheduled once the current poll has settled, so polls never overlap and
 * the session has a single writer.
 */
export class LiveSyncManager {
  private readonly layout: SyncLayout;
  private readonly detector: GameDetector;
  private readonly enabled: boolean;
  private readonly marker: string;
  private readonly preGameSync: boolean;
  private readonly intervals: IntervalsConfig;
  private readonly startDelayMs: number;
  private readonly excludedFields: ExcludedFieldsConfig;
  private readonly atomicWrites: boolean;
  private readonly scheduler: TimerScheduler;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly onReport?: (report: SyncReport) => void | Promise<void>;

  private session: SyncSession = createSession();
  private timer: TimerHandle | null = null;
  private started = false;
  private inFlight: Promise<void> | null = null;

  constructor(options: LiveSyncManagerOptions) {
    this.layout = options.layout;
    this.detector = options.detector;
    this.enabled = options.enabled ?? true;
    this.marker = options.marker ?? DEFAULT_MARKER;
    this.preGameSync = options.preGameSync ?? true;
    this.intervals = options.intervals ?? DEFAULT_INTERVALS;
    this.startDelayMs = (options.startDelaySeconds ?? GAME_START_DELAY_SECONDS) * 1000;
    this.excludedFields = options.excludedFields ?? { enforce: false, names: [...EXCLUDED_FIELDS] };
    this.atomicWrites = options.atomicWrites ?? false;
    this.scheduler = options.scheduler ?? createTimerScheduler();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.onReport = options.onReport;
  }

  public start(): void {
    if (!this.enabled || this.started) {
      return;
    }
    this.started = true;
    this.logger.info("Live sync started", { workFile: this.layout.workFile });
    this.scheduleNext();
  }

  /** Cancels the pending tick and resets the session. */
  public stop(): void {
    this.started = false;
    this.cancelPending();
    this.session = createSession();
    this.logger.info("Live sync stopped");
  }

  public isStarted(): boolean {
    return this.started;
  }

  public getSession(): Readonly<SyncSession> {
    return { ...this.session };
  }

  /** Delay before the next tick, picked from the current session state. */
  public nextInterval(): number {
    if (this.preGameSync && !this.session.gameRunning) {
      return this.intervals.preGameMs;
    }
    return this.session.isIdle ? this.intervals.idleMs : this.intervals.activeMs;
  }

  /** Runs one gated poll right away, then continues on the normal cadence. */
  public async refreshNow(): Promise<void> {
    if (!this.enabled || !this.started) {
      return;
    }
    while (this.inFlight) {
      await this.inFlight;
    }
    this.cancelPending();
    await this.tick();
  }

  /**
   * Merges the work file into all targets, ignoring game state, the pause
   * flag and modification times. Returns null when there is no work file.
   */
  public async forceSyncNow(): Promise<SyncReport | null> {
    const session = this.session;
    try {
      if (!(await fileExists(this.layout.workFile))) {
        return null;
      }
      await ensureDir(this.layout.activeDir);
      return await this.runSync(session, true);
    } catch (error) {
      this.recordError(session, error);
      return null;
    }
  }

  /** A single poll without rescheduling. */
  public async poll(): Promise<void> {
    const session = this.session;
    const { workFile, pauseFlag } = this.layout;

    if (!(await fileExists(workFile))) {
      session.isIdle = true;
      session.lastSourceModifiedTime = null;
      return;
    }

    const gameSyncAllowed = await this.checkGameState(session);
    const preGameSync = this.preGameSync && !gameSyncAllowed;
    if (!gameSyncAllowed && !preGameSync) {
      session.isIdle = true;
      return;
    }

    if (await fileExists(pauseFlag)) {
      // Track the mtime while paused so unpausing does not replay edits.
      session.lastSourceModifiedTime = await this.readModifiedTime(workFile);
      session.isIdle = false;
      return;
    }

    const modifiedTime = await this.readModifiedTime(workFile);
    if (modifiedTime === null) {
      session.isIdle = true;
      session.lastSourceModifiedTime = null;
      return;
    }

    if (session.lastSourceModifiedTime === null || modifiedTime > session.lastSourceModifiedTime) {
      session.lastSourceModifiedTime = modifiedTime;
      await this.runSync(session, gameSyncAllowed);
    }
    session.isIdle = false;
  }

  private async readModifiedTime(target: string): Promise<number | null> {
    try {
      return await getModifiedTime(target);
    } catch (error) {
      this.logger.debug("Could not stat work file", { error: formatError(error) });
      return null;
    }
  }

  /**
   * Game detection: NotRunning -> Starting -> Running.
   *
   * A game that is already running on the very first probe is armed at once;
   * one that starts later is held back for the start delay so its own config
   * writes land first.
   */
  private async checkGameState(session: SyncSession): Promise<boolean> {
    const running = await this.detector.isGameRunning();
    const now = this.clock();

    if (!session.initialProbeDone) {
      session.initialProbeDone = true;
      if (running) {
        session.gameRunning = true;
        session.syncArmed = true;
        this.logger.info("Game already running; live sync armed");
        return true;
      }
    }

    if (running && !session.gameRunning) {
      session.gameRunning = true;
      session.gameStartedAt = now;
      session.syncArmed = false;
      this.logger.info(`Game started; waiting ${this.startDelayMs / 1000}s before syncing`);
      return false;
    }

    if (!running && session.gameRunning) {
      session.gameRunning = false;
      session.gameStartedAt = null;
      session.syncArmed = false;
      this.logger.info("Game stopped");
      return false;
    }

    if (!running) {
      return false;
    }
    if (session.syncArmed) {
      return true;
    }
    if (session.gameStartedAt !== null && now - session.gameStartedAt >= this.startDelayMs) {
      session.syncArmed = true;
      this.logger.info("Start delay elapsed; live sync armed");
      return true;
    }
    return false;
  }

  private async runSync(session: SyncSession, preserveExcluded: boolean): Promise<SyncReport> {
    const report = await syncTargets({
      layout: this.layout,
      marker: this.marker,
      preserveExcluded,
      excludedFields: this.excludedFields,
      atomicWrites: this.atomicWrites,
      logger: this.logger,
      now: () => new Date(this.clock())
    });
    session.lastReport = report;
    session.lastSyncAt = this.clock();
    const failure = report.targets.find((target) => target.outcome === "failed");
    session.lastError = failure ? `${failure.path}: ${failure.error ?? "unknown error"}` : null;

    if (this.onReport) {
      try {
        await this.onReport(report);
      } catch (error) {
        this.logger.warn("Failed to record sync report", { error: formatError(error) });
      }
    }
    return report;
  }

  private recordError(session: SyncSession, error: unknown): void {
    session.lastError = formatError(error);
    this.logger.warn("Live sync tick failed", { error: session.lastError });
  }

  private tick(): Promise<void> {
    const session = this.session;
    const run = async (): Promise<void> => {
      try {
        await this.poll();
      } catch (error) {
        this.recordError(session, error);
      } finally {
        this.inFlight = null;
        if (this.started) {
          this.scheduleNext();
        }
      }
    };
    this.inFlight = run();
    return this.inFlight;
  }

  private scheduleNext(): void {
    this.cancelPending();
    const interval = this.nextInterval();
    this.timer = this.scheduler.scheduleOnce(interval, () => {
      this.timer = null;
      return this.tick();
    });
  }

  private cancelPending(): void {
    if (this.timer) {
      this.scheduler.cancel(this.timer);
      this.timer = null;
    }
  }
}
