import fs from "fs/promises";
import path from "path";
import { isErrnoException } from "./errors";

export async function ensureDir(target: string): Promise<void> {
  await fs.mkdir(target, { recursive: true });
}

export async function fileExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

/** Reads a UTF-8 file, returning null when it does not exist. */
export async function readTextIfExists(target: string): Promise<string | null> {
  try {
    return await fs.readFile(target, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export async function getModifiedTime(target: string): Promise<number | null> {
  try {
    const stat = await fs.stat(target);
    return stat.mtimeMs;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export async function touchFile(target: string, when: Date = new Date()): Promise<void> {
  await fs.utimes(target, when, when);
}

export async function writeText(target: string, contents: string): Promise<void> {
  await fs.writeFile(target, contents, "utf8");
}

const RETRYABLE_RENAME_CODES = new Set(["EBUSY", "EPERM", "EACCES"]);

async function renameWithRetry(from: string, to: string, retries = 5, delayMs = 50): Promise<void> {
  for (let attempt = 0; ; attempt += 1) {
    try {
      await fs.rename(from, to);
      return;
    } catch (error) {
      const retryable = isErrnoException(error) && RETRYABLE_RENAME_CODES.has(error.code ?? "");
      if (!retryable || attempt >= retries) {
        throw error;
      }
      await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
    }
  }
}

/** Writes through `<target>.tmp` and renames over the target. */
export async function writeTextAtomic(target: string, contents: string): Promise<void> {
  const temp = `${target}.tmp`;
  await ensureDir(path.dirname(target));
  await fs.writeFile(temp, contents, "utf8");
  try {
    await renameWithRetry(temp, target);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw error;
  }
}
