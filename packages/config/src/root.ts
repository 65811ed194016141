import fs from "node:fs";
import path from "node:path";

export const CONFIG_FILE_NAME = "tracegate.config.toml";
export const LOCAL_CONFIG_FILE_NAME = "tracegate.config.local.toml";

/**
 * Find the project root from any working directory.
 * We treat the directory containing tracegate.config.toml (or a .git folder) as root.
 */
export function findProjectRoot(startDir: string = process.cwd()): string {
  let cur = path.resolve(startDir);

  for (let i = 0; i < 30; i++) {
    const cfg = path.join(cur, CONFIG_FILE_NAME);
    const git = path.join(cur, ".git");

    if (fs.existsSync(cfg) || fs.existsSync(git)) return cur;

    const parent = path.dirname(cur);
    if (parent === cur) break;
    cur = parent;
  }

  return path.resolve(startDir);
}
