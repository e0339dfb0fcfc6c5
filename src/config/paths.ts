import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["CREDENCE_STATE_DIR"] ?? join(homedir(), ".credence");
}

export function getConfigPath(): string {
  return process.env["CREDENCE_CONFIG_PATH"] ?? "credence.config.json";
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
