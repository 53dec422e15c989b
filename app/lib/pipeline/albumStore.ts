import { promises as fs } from "fs";
import { dirname } from "path";
import { z } from "zod";
import { hasErrorCode } from "../errors";
import type { AlbumRecord } from "../types";

// Only the identity fields are checked when loading existing output
const StoredRecordSchema = z
  .object({ artist: z.string(), album: z.string() })
  .passthrough();

function albumKey(artist: string, album: string): string {
  return `${artist.trim().toLowerCase()}\u0000${album.trim().toLowerCase()}`;
}

/**
 * One output file: a JSON array of album records.
 *
 * Existing output is loaded on open so a run can be resumed; each `add`
 * rewrites the whole file through a temp file + rename.
 */
export class AlbumStore {
  private records: unknown[];
  private keys: Set<string>;

  private constructor(
    readonly filePath: string,
    records: unknown[],
  ) {
    this.records = records;
    this.keys = new Set();
    for (const record of records) {
      const parsed = StoredRecordSchema.safeParse(record);
      if (parsed.success) this.keys.add(albumKey(parsed.data.artist, parsed.data.album));
    }
  }

  static async open(filePath: string): Promise<AlbumStore> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (err) {
      if (hasErrorCode(err, "ENOENT")) {
        return new AlbumStore(filePath, []);
      }
      throw err;
    }

    let existing: unknown;
    try {
      existing = JSON.parse(raw);
    } catch {
      console.warn(`  ${filePath} is not valid JSON, starting a new list`);
      return new AlbumStore(filePath, []);
    }
    if (!Array.isArray(existing)) {
      console.warn(`  ${filePath} does not hold a JSON array, starting a new list`);
      return new AlbumStore(filePath, []);
    }
    return new AlbumStore(filePath, existing);
  }

  get size(): number {
    return this.records.length;
  }

  has(artist: string, album: string): boolean {
    return this.keys.has(albumKey(artist, album));
  }

  async add(record: AlbumRecord): Promise<void> {
    this.records.push(record);
    this.keys.add(albumKey(record.artist, record.album));
    await this.flush();
  }

  private async flush(): Promise<void> {
    await fs.mkdir(dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(this.records, null, 2) + "\n", "utf8");
    await fs.rename(tmpPath, this.filePath);
  }
}
