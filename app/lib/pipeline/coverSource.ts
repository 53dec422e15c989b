import { appendMissingCover } from "../covers/missingCovers";
import { resolveCoverArt } from "../covers/resolver";
import type { CoverArtProvider } from "../covers/types";
import type { AlbumEntry, CoverArtResult } from "../types";

/**
 * Cover lookups for one run. Each (artist, album) is resolved once and
 * written to the missing-cover log at most once, however many languages
 * the album is processed for.
 */
export class CoverSource {
  private cache = new Map<string, Promise<CoverArtResult>>();
  private reportedMissing = new Set<string>();

  constructor(
    private providers: readonly CoverArtProvider[],
    private missingCoversLog: string,
  ) {}

  private key(entry: AlbumEntry): string {
    return `${entry.artist.toLowerCase()}\u0000${entry.album.toLowerCase()}`;
  }

  resolve(entry: AlbumEntry): Promise<CoverArtResult> {
    const key = this.key(entry);
    const cached = this.cache.get(key);
    if (cached) return cached;

    const pending = resolveCoverArt(entry.artist, entry.album, this.providers);
    this.cache.set(key, pending);
    return pending;
  }

  async recordMissing(entry: AlbumEntry): Promise<void> {
    const key = this.key(entry);
    if (this.reportedMissing.has(key)) return;
    this.reportedMissing.add(key);
    await appendMissingCover(this.missingCoversLog, entry);
  }
}
