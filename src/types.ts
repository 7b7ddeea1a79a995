export type ConflictPolicy = "overwrite" | "backup" | "skip";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface PathsConfig {
  installRoot: string;
  activeDir: string;
  workFile: string;
  pauseFlag: string;
  targets: string[];
}

export interface GameConfig {
  processName: string;
  startDelaySeconds: number;
}

export interface IntervalsConfig {
  activeMs: number;
  idleMs: number;
  preGameMs: number;
}

export interface ExcludedFieldsConfig {
  enforce: boolean;
  names: string[];
}

export interface SyncConfig {
  marker: string;
  preGameSync: boolean;
  intervals: IntervalsConfig;
  atomicWrites: boolean;
  excludedFields: ExcludedFieldsConfig;
}

export interface LiveSyncConfigFile {
  version: number;
  enabled: boolean;
  paths: PathsConfig;
  game: GameConfig;
  sync: SyncConfig;
  writer: {
    debounceMs: number;
  };
  logging: {
    level: LogLevel;
    file: string | null;
  };
}

/** Absolute paths derived from {@link PathsConfig}. */
export interface SyncLayout {
  installRoot: string;
  activeDir: string;
  workFile: string;
  pauseFlag: string;
  targets: string[];
}

export type TargetOutcome = "written" | "unchanged" | "skipped" | "failed";

export interface TargetResult {
  path: string;
  outcome: TargetOutcome;
  error?: string;
}

export interface SyncReport {
  startedAt: string;
  preserveExcluded: boolean;
  targets: TargetResult[];
}

export interface SyncSession {
  lastSourceModifiedTime: number | null;
  isIdle: boolean;
  gameRunning: boolean;
  gameStartedAt: number | null;
  syncArmed: boolean;
  initialProbeDone: boolean;
  lastError: string | null;
  lastSyncAt: number | null;
  lastReport: SyncReport | null;
}

export interface SyncState {
  version: number;
  updatedAt: string;
  lastReport: SyncReport | null;
}
