export type TimerCallback = () => void | Promise<void>;

export interface TimerHandle {
  readonly id: number;
}

/**
 * One-shot timers. The live sync loop and delayed resumes go through this so
 * tests can drive them with a manual clock.
 */
export interface TimerScheduler {
  scheduleOnce(delayMs: number, callback: TimerCallback): TimerHandle;
  cancel(handle: TimerHandle): void;
}

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function createTimerScheduler(): TimerScheduler {
  const timers = new Map<number, NodeJS.Timeout>();
  let seq = 0;

  return {
    scheduleOnce(delayMs, callback) {
      const id = (seq += 1);
      const timer = setTimeout(() => {
        timers.delete(id);
        void callback();
      }, Math.max(0, delayMs));
      timers.set(id, timer);
      return { id };
    },
    cancel(handle) {
      const timer = timers.get(handle.id);
      if (timer) {
        clearTimeout(timer);
        timers.delete(handle.id);
      }
    }
  };
}
