import { fileExists, readTextIfExists } from "./filesystem";
import { extractBody } from "./merge";
import type { SyncLayout } from "./types";

export interface TargetStatus {
  path: string;
  status: "missing" | "drifted" | "ok";
  reason?: string;
}

export interface LiveSyncStatus {
  sourceExists: boolean;
  paused: boolean;
  targets: TargetStatus[];
}

/**
 * Compares each target's synchronized body with the work file's. A target
 * is `ok` when both bodies match after trimming surrounding whitespace.
 */
export async function getStatus(layout: SyncLayout, marker: string): Promise<LiveSyncStatus> {
  const source = await readTextIfExists(layout.workFile);
  const sourceBody = source === null ? null : extractBody(source, marker);
  const paused = await fileExists(layout.pauseFlag);

  const targets: TargetStatus[] = [];
  for (const target of layout.targets) {
    const contents = await readTextIfExists(target);
    if (contents === null) {
      targets.push({ path: target, status: "missing", reason: "target missing" });
      continue;
    }
    if (sourceBody === null) {
      targets.push({ path: target, status: "drifted", reason: `work file has no ${marker} section` });
      continue;
    }
    const targetBody = extractBody(contents, marker);
    if (targetBody === null) {
      targets.push({ path: target, status: "drifted", reason: `no ${marker} section` });
      continue;
    }
    if (targetBody.trim() !== sourceBody.trim()) {
      targets.push({ path: target, status: "drifted", reason: "content changed" });
      continue;
    }
    targets.push({ path: target, status: "ok" });
  }

  return { sourceExists: source !== null, paused, targets };
}
