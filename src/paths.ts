import os from "os";
import path from "path";
import type { PathsConfig, SyncLayout } from "./types";

export function expandHome(inputPath: string): string {
  if (inputPath === "~") {
    return os.homedir();
  }
  if (inputPath.startsWith("~/") || inputPath.startsWith("~\\")) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  return inputPath;
}

export function expandEnv(inputPath: string, env: NodeJS.ProcessEnv): string {
  return inputPath.replace(
    /\$\{([A-Z0-9_]+)(:-([^}]*))?\}/gi,
    (
      _match: string,
      varName: string,
      _fallbackGroup: string | undefined,
      fallback: string | undefined
    ): string => {
      const value = env[varName];
      if (value && value.length > 0) {
        return value;
      }
      if (fallback !== undefined) {
        return fallback;
      }
      return "";
    }
  );
}

export function resolvePath(inputPath: string, env: NodeJS.ProcessEnv): string {
  const expanded = expandHome(expandEnv(inputPath, env));
  if (path.isAbsolute(expanded)) {
    return expanded;
  }
  return path.resolve(expanded);
}

export function resolveFromRoot(root: string, relativePath: string): string {
  if (path.isAbsolute(relativePath)) {
    return path.resolve(relativePath);
  }
  return path.resolve(path.join(root, relativePath));
}

/**
 * Turns the configured paths into absolute ones.
 *
 * `activeDir` and `workFile` hang off `installRoot`; the pause flag and the
 * target files live inside `activeDir`.
 */
export function resolveLayout(paths: PathsConfig, env: NodeJS.ProcessEnv): SyncLayout {
  const installRoot = resolvePath(paths.installRoot, env);
  const activeDir = resolveFromRoot(installRoot, paths.activeDir);
  return {
    installRoot,
    activeDir,
    workFile: resolveFromRoot(installRoot, paths.workFile),
    pauseFlag: resolveFromRoot(activeDir, paths.pauseFlag),
    targets: paths.targets.map((target) => resolveFromRoot(activeDir, target))
  };
}

export function resolveHome(env: NodeJS.ProcessEnv): string {
  const envRoot = env.LIVESYNC_HOME;
  if (envRoot && envRoot.length > 0) {
    return resolvePath(envRoot, env);
  }
  return resolvePath("~/.difficulty-livesync", env);
}
