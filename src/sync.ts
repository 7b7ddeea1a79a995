import path from "path";
import { formatError } from "./errors";
import { ensureDir, readTextIfExists, writeText, writeTextAtomic } from "./filesystem";
import { silentLogger, type Logger } from "./logger";
import { extractBody, mergeSection, restoreExcludedFields } from "./merge";
import type { SyncLayout, SyncReport, TargetResult } from "./types";

export interface SyncTargetsOptions {
  layout: Pick<SyncLayout, "workFile" | "targets">;
  marker: string;
  /** True while in-game; excluded fields are then candidates for protection. */
  preserveExcluded: boolean;
  excludedFields: {
    enforce: boolean;
    names: readonly string[];
  };
  atomicWrites: boolean;
  logger?: Logger;
  now?: () => Date;
}

async function readPreviousTarget(target: string, logger: Logger): Promise<string | null> {
  try {
    return await readTextIfExists(target);
  } catch (error) {
    logger.debug("Treating unreadable target as absent", { target, error: formatError(error) });
    return null;
  }
}

/**
 * Merges the work file into every target. A failure on one target is
 * recorded and the remaining targets are still attempted.
 */
export async function syncTargets(options: SyncTargetsOptions): Promise<SyncReport> {
  const { layout, marker, preserveExcluded, excludedFields, atomicWrites } = options;
  const logger = options.logger ?? silentLogger;
  const startedAt = (options.now ?? (() => new Date()))().toISOString();

  let source: string | null;
  try {
    source = await readTextIfExists(layout.workFile);
  } catch (error) {
    const message = `Failed to read ${layout.workFile}: ${formatError(error)}`;
    logger.warn(message);
    return {
      startedAt,
      preserveExcluded,
      targets: layout.targets.map((target) => ({ path: target, outcome: "failed", error: message }))
    };
  }

  const sourceHasMarker = source !== null && extractBody(source, marker) !== null;
  const restore = preserveExcluded && excludedFields.enforce;
  const write = atomicWrites ? writeTextAtomic : writeText;
  const results: TargetResult[] = [];

  for (const target of layout.targets) {
    if (source === null || !sourceHasMarker) {
      results.push({ path: target, outcome: "skipped" });
      continue;
    }
    try {
      await ensureDir(path.dirname(target));
      const previous = await readPreviousTarget(target, logger);
      let merged = mergeSection(source, previous, marker);
      if (restore) {
        merged = restoreExcludedFields(merged, previous, excludedFields.names, marker);
      }
      if (merged === previous) {
        results.push({ path: target, outcome: "unchanged" });
        continue;
      }
      await write(target, merged);
      results.push({ path: target, outcome: "written" });
    } catch (error) {
      const message = formatError(error);
      logger.warn(`Failed to sync ${path.basename(target)}`, { target, error: message });
      results.push({ path: target, outcome: "failed", error: message });
    }
  }

  const written = results.filter((result) => result.outcome === "written").length;
  if (written > 0) {
    logger.info(`Synced ${written} of ${results.length} difficulty files`, { preserveExcluded });
  } else if (!sourceHasMarker) {
    logger.debug(`Work file has no ${marker} section; targets left untouched`);
  }

  return { startedAt, preserveExcluded, targets: results };
}
