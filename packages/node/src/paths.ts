import * as fs from "fs";
import * as path from "path";
import * as os from "os";

/** File name of the default JSON state file */
export const DEFAULT_STATE_FILE = "converge-lock.json";

/**
 * Gets the converge configuration directory
 * @param homePath - Optional home path, defaults to the user's home directory
 * @returns Path to the .converge directory
 */
export function getConvergeDir(homePath?: string): string {
  return path.join(homePath || os.homedir(), ".converge");
}

/**
 * Gets the default state file path, creating the converge directory if needed
 */
export function getDefaultStatePath(homePath?: string): string {
  const convergeDir = getConvergeDir(homePath);
  if (!fs.existsSync(convergeDir)) {
    fs.mkdirSync(convergeDir, { recursive: true, mode: 0o700 });
  }
  return path.join(convergeDir, DEFAULT_STATE_FILE);
}

