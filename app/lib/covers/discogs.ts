/**
 * discogs.ts
 *
 * Album art from the Discogs database search (master releases).
 *
 * Requires: DISCOGS_TOKEN
 * https://www.discogs.com/developers/
 */

import { z } from "zod";
import { expectOk, parseBody, requestJson } from "./http";
import type { CoverArtProvider } from "./types";

const SEARCH_URL = "https://api.discogs.com/database/search";

const SearchSchema = z.object({
  results: z
    .array(
      z.object({
        id: z.number().optional(),
        title: z.string().optional(),
        cover_image: z.string().optional(),
      }),
    )
    .optional()
    .default([]),
});

// Discogs returns this placeholder when a master has no image
function isPlaceholder(url: string): boolean {
  return url.endsWith("spacer.gif");
}

export class DiscogsCoverProvider implements CoverArtProvider {
  readonly name = "discogs" as const;
  private token: string;

  constructor(token: string) {
    this.token = token;
  }

  async lookup(artist: string, album: string): Promise<string | null> {
    const url = new URL(SEARCH_URL);
    url.searchParams.set("type", "master");
    url.searchParams.set("artist", artist);
    url.searchParams.set("release_title", album);
    url.searchParams.set("per_page", "5");
    url.searchParams.set("token", this.token);

    const res = await requestJson(this.name, url);
    expectOk(this.name, res);

    const data = parseBody(this.name, SearchSchema, res.body);
    for (const result of data.results) {
      const image = result.cover_image?.trim();
      if (image && !isPlaceholder(image)) return image;
    }
    return null;
  }
}
