import { execFile } from "child_process";
import { formatError } from "./errors";
import { silentLogger, type Logger } from "./logger";

export const GAME_PROCESS_NAME = "ReadyOrNotSteam-Win64-Shipping.exe";

const PROCESS_EXEC_TIMEOUT_MS = 6_000;

/** Lists the image names of all running processes. */
export type ProcessLister = () => Promise<string[]>;

/**
 * Parses `tasklist /FO CSV /NH` output. The first quoted column of each
 * row is the image name.
 */
export function parseTasklistCsv(stdout: string): string[] {
  const names: string[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const match = /^"([^"]*)"/.exec(line.trim());
    if (match) {
      names.push(match[1]);
    }
  }
  return names;
}

export const listWindowsProcesses: ProcessLister = async () => {
  return await new Promise<string[]>((resolve, reject) => {
    execFile(
      "tasklist",
      ["/FO", "CSV", "/NH"],
      {
        encoding: "utf8",
        windowsHide: true,
        timeout: PROCESS_EXEC_TIMEOUT_MS,
        maxBuffer: 1024 * 1024
      },
      (error, stdout) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(parseTasklistCsv(stdout));
      }
    );
  });
};

export interface GameDetector {
  isGameRunning(): Promise<boolean>;
}

/**
 * Reports whether the game process is running.
 *
 * When the process list cannot be read the detector answers `true`, so a
 * machine without `tasklist` keeps syncing instead of going silent.
 */
export function createGameDetector(
  processName: string = GAME_PROCESS_NAME,
  listProcesses: ProcessLister = listWindowsProcesses,
  logger: Logger = silentLogger
): GameDetector {
  return {
    async isGameRunning() {
      try {
        const names = await listProcesses();
        return names.some((name) => name === processName);
      } catch (error) {
        logger.debug("Process list unavailable; assuming game is running", {
          error: formatError(error)
        });
        return true;
      }
    }
  };
}
