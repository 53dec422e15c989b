import { appendFile, mkdir, readFile, writeFile } from "fs/promises";
import { dirname, join } from "path";
import { hasErrorCode } from "../errors";

let logsDir = process.env.LOGS_DIR?.trim() || join(process.cwd(), "logs");

export function getLogsDir(): string {
  return logsDir;
}

/**
 * Point every JSONL log at another directory (the CLI passes LOGS_DIR here).
 */
export function configureLogsDir(dir: string): void {
  logsDir = dir;
}

export function logFilePath(fileName: string): string {
  return join(logsDir, fileName);
}

export async function readJsonlLines(filePath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) return [];
    throw error;
  }
  return raw
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean);
}

/**
 * Appends one single-line JSON entry.
 */
export async function appendJsonl(filePath: string, entry: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await appendFile(filePath, JSON.stringify(entry) + "\n", "utf8");
}

/**
 * Rewrites a JSONL file keeping only the newest `maxEntries` lines, the new
 * entry last. One entry per line so the cap is a line count.
 */
export async function writeJsonlCapped(params: {
  filePath: string;
  entry: unknown;
  maxEntries?: number;
}): Promise<void> {
  const { filePath, entry, maxEntries = 3 } = params;
  await mkdir(dirname(filePath), { recursive: true });

  const existing = await readJsonlLines(filePath);
  const keep = Math.max(0, maxEntries - 1);
  const lines = [...(keep > 0 ? existing.slice(-keep) : []), JSON.stringify(entry)];
  await writeFile(filePath, lines.join("\n") + "\n", "utf8");
}
