import fs from "fs/promises";
import path from "path";
import { LiveSyncError, ExitCodes, isErrnoException } from "./errors";
import type { SyncReport, SyncState, TargetResult } from "./types";

const STATE_FILE = ".livesync-state.json";

export function getStatePath(root: string): string {
  return path.join(root, STATE_FILE);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

const TARGET_OUTCOMES: readonly string[] = ["written", "unchanged", "skipped", "failed"];

function isTargetResult(value: unknown): value is TargetResult {
  return (
    isRecord(value) &&
    typeof value.path === "string" &&
    typeof value.outcome === "string" &&
    TARGET_OUTCOMES.includes(value.outcome) &&
    (value.error === undefined || typeof value.error === "string")
  );
}

function isSyncReport(value: unknown): value is SyncReport {
  return (
    isRecord(value) &&
    typeof value.startedAt === "string" &&
    typeof value.preserveExcluded === "boolean" &&
    Array.isArray(value.targets) &&
    value.targets.every(isTargetResult)
  );
}

function isSyncState(value: unknown): value is SyncState {
  return (
    isRecord(value) &&
    typeof value.version === "number" &&
    typeof value.updatedAt === "string" &&
    (value.lastReport === null || isSyncReport(value.lastReport))
  );
}

export async function readState(root: string): Promise<SyncState | null> {
  const statePath = getStatePath(root);
  let parsed: unknown;
  try {
    const raw = await fs.readFile(statePath, "utf8");
    parsed = JSON.parse(raw);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    if (error instanceof SyntaxError) {
      throw new LiveSyncError(`Invalid JSON in ${statePath}: ${error.message}`, ExitCodes.Validation);
    }
    throw error;
  }
  if (!isSyncState(parsed)) {
    throw new LiveSyncError(`Invalid state format in ${statePath}`, ExitCodes.Validation);
  }
  return parsed;
}

export async function writeState(root: string, state: SyncState): Promise<void> {
  const statePath = getStatePath(root);
  await fs.mkdir(root, { recursive: true });
  await fs.writeFile(statePath, JSON.stringify(state, null, 2), "utf8");
}

export async function recordReport(root: string, report: SyncReport): Promise<void> {
  await writeState(root, {
    version: 1,
    updatedAt: new Date().toISOString(),
    lastReport: report
  });
}
