import fs from "fs/promises";
import path from "path";
import { LiveSyncError, ExitCodes } from "./errors";
import { ensureDir, fileExists } from "./filesystem";
import { getConfigPath, writeConfig } from "./config";
import { createDefaultConfig } from "./templates";
import type { ConflictPolicy, LiveSyncConfigFile } from "./types";

async function backupConfig(configPath: string, root: string): Promise<string> {
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
  const destination = path.join(root, "backup", timestamp, path.basename(configPath));
  await ensureDir(path.dirname(destination));
  await fs.copyFile(configPath, destination);
  return destination;
}

export interface InitOptions {
  config?: LiveSyncConfigFile;
  conflictPolicy?: ConflictPolicy;
  force?: boolean;
}

export interface InitResult {
  action: "created" | "overwritten" | "skipped";
  configPath: string;
  backupPath?: string;
}

export async function initConfig(root: string, options: InitOptions = {}): Promise<InitResult> {
  const configPath = getConfigPath(root);
  const exists = await fileExists(configPath);
  const config = options.config ?? createDefaultConfig();
  const policy = options.conflictPolicy ?? (options.force ? "overwrite" : null);

  let backupPath: string | undefined;
  if (exists) {
    if (!policy) {
      throw new LiveSyncError(`Config already exists: ${configPath}`, ExitCodes.Conflict);
    }
    if (policy === "skip") {
      return { action: "skipped", configPath };
    }
    if (policy === "backup") {
      backupPath = await backupConfig(configPath, root);
    }
  }

  await writeConfig(root, config);
  return {
    action: exists ? "overwritten" : "created",
    configPath,
    ...(backupPath ? { backupPath } : {})
  };
}
