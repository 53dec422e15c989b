import { promises as fs } from "fs";
import { dirname } from "path";
import { formatYear } from "../types";
import type { AlbumEntry } from "../types";

function formatMissingCoverLine(entry: AlbumEntry): string {
  return `${entry.artist} | ${entry.album} | ${formatYear(entry.year)}\n`;
}

/**
 * Append one "Artist | Album | Year" line to the missing-covers log.
 */
export async function appendMissingCover(logPath: string, entry: AlbumEntry): Promise<void> {
  await fs.mkdir(dirname(logPath), { recursive: true });
  await fs.writeFile(logPath, formatMissingCoverLine(entry), { flag: "a" });
}
