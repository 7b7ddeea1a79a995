import { GAME_PROCESS_NAME } from "./gameDetector";
import { DEFAULT_INTERVALS, EXCLUDED_FIELDS, GAME_START_DELAY_SECONDS } from "./liveSync";
import { DEFAULT_MARKER } from "./merge";
import { DEFAULT_DEBOUNCE_MS } from "./writer";
import type { LiveSyncConfigFile } from "./types";

export function createDefaultConfig(): LiveSyncConfigFile {
  return {
    version: 1,
    enabled: true,
    paths: {
      installRoot: "${LOCALAPPDATA:-~/AppData/Local}/ReadyOrNot/Saved/Config",
      activeDir: "Difficulties",
      workFile: "StrategoAI_Live_Mod/Work/work.ini",
      pauseFlag: "LiveSync.PAUSE",
      targets: ["CasualDifficulty.ini", "HardDifficulty.ini", "StandardDifficulty.ini"]
    },
    game: {
      processName: GAME_PROCESS_NAME,
      startDelaySeconds: GAME_START_DELAY_SECONDS
    },
    sync: {
      marker: DEFAULT_MARKER,
      preGameSync: true,
      intervals: { ...DEFAULT_INTERVALS },
      atomicWrites: false,
      excludedFields: {
        enforce: false,
        names: [...EXCLUDED_FIELDS]
      }
    },
    writer: {
      debounceMs: DEFAULT_DEBOUNCE_MS
    },
    logging: {
      level: "info",
      file: null
    }
  };
}
