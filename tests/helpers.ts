import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { GameDetector } from "../src/gameDetector";
import { resolveLayout } from "../src/paths";
import type { TimerCallback, TimerHandle, TimerScheduler } from "../src/scheduler";
import { createDefaultConfig } from "../src/templates";
import type { SyncLayout } from "../src/types";

export async function createTempDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), "livesync-"));
}

export async function writeFile(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents, "utf8");
}

export async function exists(filePath: string): Promise<boolean> {
  return await fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);
}

/** Default layout rooted in a fresh temporary install root. */
export async function createLayout(): Promise<{ root: string; layout: SyncLayout }> {
  const root = await createTempDir();
  const paths = { ...createDefaultConfig().paths, installRoot: root };
  return { root, layout: resolveLayout(paths, {}) };
}

export async function setModifiedTime(filePath: string, seconds: number): Promise<number> {
  const when = new Date(seconds * 1000);
  await fs.utimes(filePath, when, when);
  const stat = await fs.stat(filePath);
  return stat.mtimeMs;
}

export function fakeDetector(running: boolean): { state: { running: boolean }; detector: GameDetector } {
  const state = { running };
  return {
    state,
    detector: {
      isGameRunning: async () => state.running
    }
  };
}

interface PendingTimer {
  id: number;
  at: number;
  callback: TimerCallback;
}

/** Virtual clock + timer queue; callbacks run only when time is advanced. */
export class ManualScheduler implements TimerScheduler {
  public now = 0;
  private seq = 0;
  private timers: PendingTimer[] = [];

  public readonly clock = (): number => this.now;

  public scheduleOnce(delayMs: number, callback: TimerCallback): TimerHandle {
    this.seq += 1;
    this.timers.push({ id: this.seq, at: this.now + delayMs, callback });
    return { id: this.seq };
  }

  public cancel(handle: TimerHandle): void {
    this.timers = this.timers.filter((timer) => timer.id !== handle.id);
  }

  /** Due times of the pending timers, earliest first. */
  public pending(): number[] {
    return this.timers.map((timer) => timer.at).sort((a, b) => a - b);
  }

  public async advance(ms: number): Promise<void> {
    const target = this.now + ms;
    for (;;) {
      const due = this.timers
        .filter((timer) => timer.at <= target)
        .sort((a, b) => a.at - b.at || a.id - b.id)[0];
      if (!due) {
        break;
      }
      this.timers = this.timers.filter((timer) => timer.id !== due.id);
      this.now = due.at;
      await due.callback();
    }
    this.now = target;
  }
}
