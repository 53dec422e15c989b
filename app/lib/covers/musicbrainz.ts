/**
 * musicbrainz.ts
 *
 * Album art from the Cover Art Archive, keyed by a MusicBrainz release group.
 * No credentials; MusicBrainz requests are limited to one per second.
 */

import { MusicBrainzApi } from "musicbrainz-api";
import { z } from "zod";
import { TransportError, errorMessage } from "../errors";
import { withTimeout } from "../withTimeout";
import { expectOk, requestJson } from "./http";
import { IntervalRateLimiter } from "./rateLimiter";
import type { CoverArtProvider } from "./types";

const COVER_ART_ARCHIVE = "https://coverartarchive.org";

// Minimum search score to accept a release group
const MIN_SCORE = 90;

export const SEARCH_TIMEOUT_MS = 10_000;

export interface ReleaseGroupSearch {
  (query: string): Promise<unknown>;
}

const ReleaseGroupSearchSchema = z.object({
  "release-groups": z
    .array(z.object({ id: z.string(), score: z.number().optional() }))
    .optional()
    .default([]),
});

// MusicBrainz asks for a contact (URL or e-mail) in the User-Agent
export function createMBClient(contact?: string): MusicBrainzApi {
  return new MusicBrainzApi({
    appName: "album-trivia",
    appVersion: "0.1.0",
    appContactInfo: contact,
  });
}

function escapeLucene(value: string): string {
  return value.replace(/(["\\])/g, "\\$1");
}

export function releaseGroupQuery(artist: string, album: string): string {
  return `releasegroup:"${escapeLucene(album)}" AND artist:"${escapeLucene(artist)}"`;
}

function coverArtUrl(releaseGroupId: string): string {
  return `${COVER_ART_ARCHIVE}/release-group/${releaseGroupId}/front-500`;
}

export class MusicBrainzCoverProvider implements CoverArtProvider {
  readonly name = "musicbrainz" as const;
  private search: ReleaseGroupSearch;
  private limiter: IntervalRateLimiter;

  constructor(
    options: {
      contact?: string;
      search?: ReleaseGroupSearch;
      limiter?: IntervalRateLimiter;
    } = {},
  ) {
    if (options.search) {
      this.search = options.search;
    } else {
      const mb = createMBClient(options.contact);
      this.search = (query) => mb.search("release-group", { query, limit: 5 });
    }
    this.limiter = options.limiter ?? new IntervalRateLimiter();
  }

  async lookup(artist: string, album: string): Promise<string | null> {
    await this.limiter.waitForToken();

    let result: unknown;
    try {
      result = await withTimeout(
        this.search(releaseGroupQuery(artist, album)),
        SEARCH_TIMEOUT_MS,
        "release-group search",
      );
    } catch (err) {
      throw new TransportError(this.name, errorMessage(err), { cause: err });
    }

    const parsed = ReleaseGroupSearchSchema.safeParse(result);
    if (!parsed.success) {
      throw new TransportError(this.name, "Unexpected release-group search response");
    }

    const candidates = parsed.data["release-groups"].filter(
      (rg) => (rg.score ?? 100) >= MIN_SCORE,
    );

    for (const rg of candidates) {
      const url = coverArtUrl(rg.id);
      const res = await requestJson(this.name, url, { method: "HEAD" });
      if (res.status === 404) continue;
      expectOk(this.name, res);
      return url;
    }
    return null;
  }
}
