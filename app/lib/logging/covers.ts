import { logFilePath, appendJsonl } from "./jsonl";
import type { CoverProviderName } from "../types";

const COVERS_LOG_FILE = "covers.jsonl";

/**
 * Logs a cover-art provider failure with the provider's identity (append-only).
 */
export async function logCoverProviderError(params: {
  provider: CoverProviderName;
  artist: string;
  album: string;
  error: string;
  status?: number | null;
}): Promise<void> {
  try {
    await appendJsonl(logFilePath(COVERS_LOG_FILE), {
      timestamp: new Date().toISOString(),
      ...params,
    });
  } catch (error) {
    // Don't throw - logging failures shouldn't break the run
    console.error("Failed to log cover provider error:", error);
  }
}
