import { logFilePath, appendJsonl, writeJsonlCapped } from "./jsonl";
import type { AlbumEntry, Difficulty } from "../types";

const GENERATION_LOG_FILE = "generation.jsonl";
const RESPONSES_LOG_FILE = "responses.jsonl";

// Raw responses are large; only the most recent ones are kept for debugging.
const MAX_RAW_RESPONSES = 20;

export interface GenerationAttemptLogEntry {
  album: AlbumEntry;
  attempt: number;
  maxAttempts: number;
  status: "success" | "failed";
  errorName?: string;
  error?: string;
  delayMs?: number;
}

/**
 * Logs one generation attempt (append-only).
 */
export async function logGenerationAttempt(
  entry: GenerationAttemptLogEntry,
): Promise<void> {
  try {
    await appendJsonl(logFilePath(GENERATION_LOG_FILE), {
      timestamp: new Date().toISOString(),
      ...entry,
    });
  } catch (error) {
    // Don't throw - logging failures shouldn't break the run
    console.error("Failed to log generation attempt:", error);
  }
}

export async function logRawResponse(params: {
  album: AlbumEntry;
  attempt: number;
  categories: Record<Difficulty, string[]>;
  rawText: string;
}): Promise<void> {
  try {
    await writeJsonlCapped({
      filePath: logFilePath(RESPONSES_LOG_FILE),
      entry: { timestamp: new Date().toISOString(), ...params },
      maxEntries: MAX_RAW_RESPONSES,
    });
  } catch (error) {
    console.error("Failed to log raw response:", error);
  }
}
