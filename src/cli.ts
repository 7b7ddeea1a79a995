#!/usr/bin/env node
import { LiveSyncError, ExitCodes } from "./errors";
import { readConfig } from "./config";
import { fileExists } from "./filesystem";
import { createGameDetector, listWindowsProcesses } from "./gameDetector";
import { initConfig } from "./init";
import { LiveSyncManager, liveSyncOptionsFromConfig } from "./liveSync";
import { createLogger, type Logger } from "./logger";
import { PauseCoordinator } from "./pause";
import { resolveHome, resolveLayout, resolvePath } from "./paths";
import { readState, recordReport } from "./state";
import { getStatus } from "./status";
import type { ConflictPolicy, LiveSyncConfigFile, SyncLayout, SyncReport } from "./types";
import { WorkFileWriter } from "./writer";

type Command = "init" | "watch" | "sync" | "pause" | "resume" | "status" | "set" | "doctor";

const COMMANDS: readonly Command[] = [
  "init",
  "watch",
  "sync",
  "pause",
  "resume",
  "status",
  "set",
  "doctor"
];

interface ParsedArgs {
  command: Command | null;
  unknownCommand?: string;
  positionals: string[];
  force: boolean;
  conflictPolicy?: ConflictPolicy;
  delaySeconds?: number;
  trigger: boolean;
  help: boolean;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    command: null,
    positionals: [],
    force: false,
    trigger: true,
    help: false
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!result.command && !result.unknownCommand && !arg.startsWith("-")) {
      if (isCommand(arg)) {
        result.command = arg;
      } else {
        result.unknownCommand = arg;
      }
      continue;
    }
    if (arg === "--force") {
      result.force = true;
      continue;
    }
    if (arg === "--on-conflict") {
      const value = args[i + 1];
      if (value === "overwrite" || value === "backup" || value === "skip") {
        result.conflictPolicy = value;
      }
      i += 1;
      continue;
    }
    if (arg === "--delay") {
      const value = Number.parseFloat(args[i + 1] ?? "");
      if (Number.isFinite(value)) {
        result.delaySeconds = value;
      }
      i += 1;
      continue;
    }
    if (arg === "--no-trigger") {
      result.trigger = false;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      result.help = true;
      continue;
    }
    if (!arg.startsWith("-")) {
      result.positionals.push(arg);
    }
  }

  return result;
}

function printHelp(): void {
  const lines = [
    "difficulty-livesync <command> [options]",
    "",
    "Commands:",
    "  init        Create livesync.yml in $LIVESYNC_HOME (default ~/.difficulty-livesync)",
    "  watch       Sync once, then keep difficulty files in sync until interrupted",
    "  sync        Sync work.ini into the difficulty files now, ignoring game state",
    "  pause       Suspend live sync (creates the pause flag)",
    "  resume      Remove the pause flag",
    "  status      Show pause/game state and per-file drift",
    "  set         Write Key=Value pairs into work.ini",
    "  doctor      Validate config and paths",
    "",
    "Options:",
    "  --force                 Overwrite an existing config (init)",
    "  --on-conflict <policy>  overwrite | backup | skip (init)",
    "  --delay <seconds>       Resume after a delay (resume)",
    "  --no-trigger            Resume without forcing a sync (resume)",
    "  -h, --help              Show help"
  ];
  console.log(lines.join("\n"));
}

interface Context {
  home: string;
  config: LiveSyncConfigFile;
  layout: SyncLayout;
  logger: Logger;
}

async function loadContext(home: string): Promise<Context> {
  const config = await readConfig(home);
  const layout = resolveLayout(config.paths, process.env);
  const logger = createLogger({
    level: config.logging.level,
    file: config.logging.file ? resolvePath(config.logging.file, process.env) : null
  });
  return { home, config, layout, logger };
}

function createManager(context: Context): LiveSyncManager {
  const { home, config, layout, logger } = context;
  return new LiveSyncManager({
    layout,
    detector: createGameDetector(config.game.processName, listWindowsProcesses, logger),
    logger,
    onReport: (report) => recordReport(home, report),
    ...liveSyncOptionsFromConfig(config)
  });
}

function printReport(report: SyncReport): boolean {
  let failed = false;
  for (const target of report.targets) {
    const suffix = target.error ? ` (${target.error})` : "";
    console.log(`${target.outcome}: ${target.path}${suffix}`);
    failed = failed || target.outcome === "failed";
  }
  return !failed;
}

export function parseAssignments(values: string[]): Record<string, string> {
  const assignments: Record<string, string> = {};
  for (const value of values) {
    const separator = value.indexOf("=");
    if (separator <= 0) {
      throw new LiveSyncError(`Expected Key=Value, got: ${value}`, ExitCodes.Usage);
    }
    assignments[value.slice(0, separator).trim()] = value.slice(separator + 1);
  }
  return assignments;
}

async function waitForShutdown(manager: LiveSyncManager): Promise<void> {
  await new Promise<void>((resolve) => {
    const shutdown = (): void => {
      manager.stop();
      resolve();
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });
}

async function run(): Promise<void> {
  const args = parseArgs(process.argv);
  if (args.unknownCommand) {
    throw new LiveSyncError(`Unknown command: ${args.unknownCommand}`, ExitCodes.Usage);
  }
  if (args.help || !args.command) {
    printHelp();
    return;
  }

  const home = resolveHome(process.env);

  switch (args.command) {
    case "init": {
      const result = await initConfig(home, {
        conflictPolicy: args.conflictPolicy,
        force: args.force
      });
      if (result.action === "skipped") {
        console.log(`Kept existing ${result.configPath}`);
        return;
      }
      if (result.backupPath) {
        console.log(`Backed up previous config to ${result.backupPath}`);
      }
      console.log(`${result.action === "created" ? "Created" : "Overwrote"} ${result.configPath}`);
      return;
    }
    case "watch": {
      const context = await loadContext(home);
      const manager = createManager(context);
      await manager.forceSyncNow();
      manager.start();
      if (!manager.isStarted()) {
        console.log("Live sync is disabled in config.");
        return;
      }
      await waitForShutdown(manager);
      return;
    }
    case "sync": {
      const context = await loadContext(home);
      const report = await createManager(context).forceSyncNow();
      if (!report) {
        throw new LiveSyncError(`Work file not found: ${context.layout.workFile}`, ExitCodes.Filesystem);
      }
      if (!printReport(report)) {
        process.exitCode = ExitCodes.Filesystem;
      }
      return;
    }
    case "pause": {
      const { layout, logger } = await loadContext(home);
      if (!(await fileExists(layout.activeDir))) {
        console.log(`Nothing to pause: ${layout.activeDir} does not exist`);
        return;
      }
      await new PauseCoordinator({ layout, logger }).pause();
      return;
    }
    case "resume": {
      const { layout, logger } = await loadContext(home);
      const coordinator = new PauseCoordinator({ layout, logger });
      if (args.delaySeconds !== undefined && args.delaySeconds > 0) {
        console.log(`Resuming in ${args.delaySeconds}s`);
        coordinator.resumeAfter(args.delaySeconds, args.trigger);
        return;
      }
      await coordinator.resume(args.trigger);
      return;
    }
    case "status": {
      const { config, layout, logger } = await loadContext(home);
      const status = await getStatus(layout, config.sync.marker);
      const running = await createGameDetector(
        config.game.processName,
        listWindowsProcesses,
        logger
      ).isGameRunning();
      console.log(`Work file: ${status.sourceExists ? layout.workFile : "missing"}`);
      console.log(`Paused: ${status.paused ? "yes" : "no"}`);
      console.log(`Game running: ${running ? "yes" : "no"}`);
      const state = await readState(home);
      if (state?.lastReport) {
        console.log(`Last sync: ${state.lastReport.startedAt}`);
      }
      status.targets.forEach((entry) => {
        const suffix = entry.reason ? ` (${entry.reason})` : "";
        console.log(`${entry.status}: ${entry.path}${suffix}`);
      });
      if (status.targets.some((entry) => entry.status !== "ok")) {
        process.exitCode = ExitCodes.Validation;
      }
      return;
    }
    case "set": {
      const values = parseAssignments(args.positionals);
      if (Object.keys(values).length === 0) {
        throw new LiveSyncError("Nothing to set; pass Key=Value pairs", ExitCodes.Usage);
      }
      const { config, layout, logger } = await loadContext(home);
      if (!(await fileExists(layout.workFile))) {
        throw new LiveSyncError(`Work file not found: ${layout.workFile}`, ExitCodes.Filesystem);
      }
      const writer = new WorkFileWriter({
        workFile: layout.workFile,
        debounceMs: config.writer.debounceMs,
        logger
      });
      writer.enqueue(values);
      await writer.close();
      if (writer.getStats().failures > 0) {
        process.exitCode = ExitCodes.Filesystem;
      }
      return;
    }
    case "doctor": {
      const { layout } = await loadContext(home);
      console.log("Config OK");
      const checks: Array<[string, string]> = [
        ["Install root", layout.installRoot],
        ["Difficulties", layout.activeDir],
        ["Work file", layout.workFile]
      ];
      for (const [label, target] of checks) {
        const exists = await fileExists(target);
        console.log(`${label}: ${exists ? "found" : "missing"} (${target})`);
      }
      return;
    }
    default:
      throw new LiveSyncError(`Unknown command: ${String(args.command)}`, ExitCodes.Usage);
  }
}

if (require.main === module) {
  run().catch((error: unknown) => {
    if (error instanceof LiveSyncError) {
      console.error(error.message);
      process.exit(error.code);
    }
    if (error instanceof Error) {
      console.error(error.message);
    } else {
      console.error("Unexpected error");
    }
    process.exit(ExitCodes.Failure);
  });
}
