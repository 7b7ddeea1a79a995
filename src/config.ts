import fs from "fs/promises";
import path from "path";
import { parse as parseYaml, stringify as stringifyYaml, YAMLError } from "yaml";
import { LiveSyncError, ExitCodes, isErrnoException } from "./errors";
import { isLogLevel } from "./logger";
import type {
  GameConfig,
  IntervalsConfig,
  LiveSyncConfigFile,
  PathsConfig,
  SyncConfig
} from "./types";

export const DEFAULT_CONFIG_FILE = "livesync.yml";

export function getConfigPath(root: string): string {
  return path.join(root, DEFAULT_CONFIG_FILE);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === "string");
}

function isPathsConfig(value: unknown): value is PathsConfig {
  if (!isRecord(value)) {
    return false;
  }
  return (
    isNonEmptyString(value.installRoot) &&
    isNonEmptyString(value.activeDir) &&
    isNonEmptyString(value.workFile) &&
    isNonEmptyString(value.pauseFlag) &&
    isStringArray(value.targets) &&
    value.targets.length > 0
  );
}

function isGameConfig(value: unknown): value is GameConfig {
  if (!isRecord(value)) {
    return false;
  }
  return (
    isNonEmptyString(value.processName) &&
    typeof value.startDelaySeconds === "number" &&
    value.startDelaySeconds >= 0
  );
}

function isIntervalsConfig(value: unknown): value is IntervalsConfig {
  if (!isRecord(value)) {
    return false;
  }
  return (
    isPositiveNumber(value.activeMs) &&
    isPositiveNumber(value.idleMs) &&
    isPositiveNumber(value.preGameMs)
  );
}

function isSyncConfig(value: unknown): value is SyncConfig {
  if (!isRecord(value)) {
    return false;
  }
  if (!isNonEmptyString(value.marker) || typeof value.preGameSync !== "boolean") {
    return false;
  }
  if (!isIntervalsConfig(value.intervals) || typeof value.atomicWrites !== "boolean") {
    return false;
  }
  const excluded = value.excludedFields;
  if (!isRecord(excluded)) {
    return false;
  }
  return typeof excluded.enforce === "boolean" && isStringArray(excluded.names);
}

/** Returns the dotted path of the first invalid section, or null. */
export function findConfigProblem(value: unknown): string | null {
  if (!isRecord(value)) {
    return "root";
  }
  if (typeof value.version !== "number") {
    return "version";
  }
  if (typeof value.enabled !== "boolean") {
    return "enabled";
  }
  if (!isPathsConfig(value.paths)) {
    return "paths";
  }
  if (!isGameConfig(value.game)) {
    return "game";
  }
  if (!isSyncConfig(value.sync)) {
    return "sync";
  }
  const writer = value.writer;
  if (!isRecord(writer) || typeof writer.debounceMs !== "number" || writer.debounceMs < 0) {
    return "writer";
  }
  const logging = value.logging;
  if (!isRecord(logging) || !isLogLevel(logging.level)) {
    return "logging.level";
  }
  if (logging.file !== null && logging.file !== undefined && typeof logging.file !== "string") {
    return "logging.file";
  }
  return null;
}

function isLiveSyncConfigFile(value: unknown): value is LiveSyncConfigFile {
  return findConfigProblem(value) === null;
}

function formatYamlError(error: unknown, configPath: string): LiveSyncError {
  if (error instanceof YAMLError) {
    const linePos = error.linePos?.[0];
    const location = linePos ? ` (line ${linePos.line}, col ${linePos.col})` : "";
    return new LiveSyncError(
      `Invalid YAML in ${configPath}${location}: ${error.message}`,
      ExitCodes.Validation
    );
  }
  if (error instanceof Error) {
    return new LiveSyncError(`Invalid YAML in ${configPath}: ${error.message}`, ExitCodes.Validation);
  }
  return new LiveSyncError(`Invalid YAML in ${configPath}`, ExitCodes.Validation);
}

export async function readConfig(root: string): Promise<LiveSyncConfigFile> {
  const configPath = getConfigPath(root);
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new LiveSyncError(
        `Missing config: ${configPath} (run "difficulty-livesync init")`,
        ExitCodes.Validation
      );
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw, { prettyErrors: true });
  } catch (error) {
    throw formatYamlError(error, configPath);
  }

  if (isRecord(parsed) && isRecord(parsed.logging) && parsed.logging.file === undefined) {
    parsed.logging.file = null;
  }
  if (!isLiveSyncConfigFile(parsed)) {
    const problem = findConfigProblem(parsed) ?? "root";
    throw new LiveSyncError(
      `Invalid config format in ${configPath}: check "${problem}"`,
      ExitCodes.Validation
    );
  }

  return parsed;
}

export async function writeConfig(root: string, config: LiveSyncConfigFile): Promise<void> {
  const configPath = getConfigPath(root);
  await fs.mkdir(root, { recursive: true });
  await fs.writeFile(configPath, stringifyYaml(config), "utf8");
}
