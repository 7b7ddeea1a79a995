import fs from "fs/promises";
import { formatError } from "./errors";
import { fileExists, touchFile, writeText } from "./filesystem";
import { silentLogger, type Logger } from "./logger";
import { createTimerScheduler, type TimerHandle, type TimerScheduler } from "./scheduler";
import type { SyncLayout } from "./types";

export const PAUSE_FLAG_CONTENTS = "paused";

export interface PauseCoordinatorOptions {
  layout: Pick<SyncLayout, "activeDir" | "pauseFlag" | "workFile">;
  scheduler?: TimerScheduler;
  logger?: Logger;
}

/**
 * Suppresses live syncing through a flag file next to the targets.
 *
 * Every method is best-effort: failures are logged and never reach the
 * caller.
 */
export class PauseCoordinator {
  private readonly layout: PauseCoordinatorOptions["layout"];
  private readonly scheduler: TimerScheduler;
  private readonly logger: Logger;

  constructor(options: PauseCoordinatorOptions) {
    this.layout = options.layout;
    this.scheduler = options.scheduler ?? createTimerScheduler();
    this.logger = options.logger ?? silentLogger;
  }

  public async isPaused(): Promise<boolean> {
    try {
      return await fileExists(this.layout.pauseFlag);
    } catch (error) {
      this.logger.warn("Could not check pause flag", { error: formatError(error) });
      return false;
    }
  }

  /** Creates the pause flag. Does nothing when the target directory is absent. */
  public async pause(): Promise<void> {
    try {
      if (!(await fileExists(this.layout.activeDir))) {
        return;
      }
      await writeText(this.layout.pauseFlag, PAUSE_FLAG_CONTENTS);
      this.logger.info("Live sync paused");
    } catch (error) {
      this.logger.warn("Failed to pause live sync", { error: formatError(error) });
    }
  }

  /**
   * Removes the pause flag. With `triggerSync`, bumps the work file's
   * modification time so the next poll treats it as changed.
   */
  public async resume(triggerSync = true): Promise<void> {
    try {
      if (!(await fileExists(this.layout.activeDir))) {
        return;
      }
      await fs.rm(this.layout.pauseFlag, { force: true });
      this.logger.info("Live sync resumed", { triggerSync });
    } catch (error) {
      this.logger.warn("Failed to remove pause flag", { error: formatError(error) });
    }

    if (!triggerSync) {
      return;
    }
    try {
      if (await fileExists(this.layout.workFile)) {
        await touchFile(this.layout.workFile);
      }
    } catch (error) {
      this.logger.warn("Failed to touch work file", { error: formatError(error) });
    }
  }

  /**
   * Schedules {@link resume} without waiting for it. The pause flag stays in
   * place until the delay has passed.
   */
  public resumeAfter(delaySeconds: number, triggerSync = true): TimerHandle {
    const delayMs = Number.isFinite(delaySeconds) ? Math.max(0, delaySeconds) * 1000 : 0;
    return this.scheduler.scheduleOnce(delayMs, () => this.resume(triggerSync));
  }

  public cancelResume(handle: TimerHandle): void {
    this.scheduler.cancel(handle);
  }
}
