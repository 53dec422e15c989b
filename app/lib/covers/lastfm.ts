/**
 * lastfm.ts
 *
 * Album art from Last.fm `album.getinfo`.
 *
 * Requires: LASTFM_API_KEY
 * https://www.last.fm/api/show/album.getInfo
 */

import { z } from "zod";
import { TransportError } from "../errors";
import { expectOk, parseBody, requestJson } from "./http";
import type { CoverArtProvider } from "./types";

const API_URL = "https://ws.audioscrobbler.com/2.0/";

// Last.fm error code for an unknown album/artist
const LASTFM_NOT_FOUND = 6;

// Largest first
const SIZE_PREFERENCE = ["mega", "extralarge", "large", "medium", "small", ""];

const ErrorBodySchema = z.object({ error: z.number(), message: z.string().optional() });

const AlbumInfoSchema = z.object({
  album: z.object({
    image: z
      .array(z.object({ "#text": z.string(), size: z.string() }))
      .optional()
      .default([]),
  }),
});

export function pickLargestImage(
  images: Array<{ "#text": string; size: string }>,
): string | null {
  for (const size of SIZE_PREFERENCE) {
    const hit = images.find((img) => img.size === size && img["#text"].trim());
    if (hit) return hit["#text"].trim();
  }
  return null;
}

export class LastFmCoverProvider implements CoverArtProvider {
  readonly name = "lastfm" as const;
  private apiKey: string;

  constructor(apiKey: string) {
    this.apiKey = apiKey;
  }

  async lookup(artist: string, album: string): Promise<string | null> {
    const url = new URL(API_URL);
    url.searchParams.set("method", "album.getinfo");
    url.searchParams.set("api_key", this.apiKey);
    url.searchParams.set("artist", artist);
    url.searchParams.set("album", album);
    url.searchParams.set("autocorrect", "1");
    url.searchParams.set("format", "json");

    const res = await requestJson(this.name, url);

    // Last.fm reports API errors in the body, sometimes with a 200
    const apiError = ErrorBodySchema.safeParse(res.body);
    if (apiError.success) {
      if (apiError.data.error === LASTFM_NOT_FOUND) return null;
      throw new TransportError(
        this.name,
        `API error ${apiError.data.error}: ${apiError.data.message ?? "unknown"}`,
        { status: res.status },
      );
    }
    expectOk(this.name, res);

    const info = parseBody(this.name, AlbumInfoSchema, res.body);
    return pickLargestImage(info.album.image);
  }
}
