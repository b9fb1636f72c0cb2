// src/utils/paths.ts
//
// Path helpers shared by the file/os modules, the config loader and the runner.

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

export type ResolvePathEnv = {
  cwd: string;
  homeDir?: string;
};

/**
 * Resolve a path written in a script into an absolute filesystem path.
 * Empty resolves to `cwd`; `~` expands to the home directory.
 */
export function resolveUserPath(userPath: string, env: ResolvePathEnv): string {
  const p = userPath.trim();
  if (!p) return env.cwd;

  if (p === "~" || p.startsWith("~/") || p.startsWith("~\\")) {
    return path.resolve(env.homeDir ?? os.homedir(), p.slice(2));
  }

  if (path.isAbsolute(p)) return p;
  return path.resolve(env.cwd, p);
}

export const WORKSPACE_MARKERS = ["sable.config.json", ".git"] as const;

/**
 * Walk upward from `startPath` to the first directory holding one of `markers`.
 * Returns null at the filesystem root.
 */
export async function tryResolveWorkspaceRoot(
  startPath: string,
  markers: readonly string[] = WORKSPACE_MARKERS
): Promise<string | null> {
  let current = path.resolve(startPath);

  try {
    const st = await fs.promises.stat(current);
    if (st.isFile()) current = path.dirname(current);
  } catch {
    // a path that does not exist yet still has parents worth searching
    current = path.dirname(current);
  }

  while (true) {
    for (const m of markers) {
      if (await exists(path.join(current, m))) return current;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

/** Case-insensitive extension check: `hasExtension("a.SBL", [".sbl"])`. */
export function hasExtension(file: string, extensions: readonly string[]): boolean {
  const ext = path.extname(file).toLowerCase();
  return extensions.some((e) => e.toLowerCase() === ext);
}

export async function exists(p: string): Promise<boolean> {
  try {
    await fs.promises.access(p, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}
