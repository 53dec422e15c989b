/**
 * audiodb.ts
 *
 * Album art from TheAudioDB `searchalbum.php`.
 *
 * Requires: AUDIODB_API_KEY (the public test key "2" works for light use)
 * https://www.theaudiodb.com/free_music_api
 */

import { z } from "zod";
import { expectOk, parseBody, requestJson } from "./http";
import type { CoverArtProvider } from "./types";

const API_BASE = "https://www.theaudiodb.com/api/v1/json";

const SearchSchema = z.object({
  album: z
    .array(z.object({ strAlbum: z.string().nullable().optional(), strAlbumThumb: z.string().nullable().optional() }))
    .nullable()
    .optional(),
});

export class AudioDbCoverProvider implements CoverArtProvider {
  readonly name = "audiodb" as const;
  private apiKey: string;

  constructor(apiKey: string) {
    this.apiKey = apiKey;
  }

  async lookup(artist: string, album: string): Promise<string | null> {
    const url = new URL(`${API_BASE}/${encodeURIComponent(this.apiKey)}/searchalbum.php`);
    url.searchParams.set("s", artist);
    url.searchParams.set("a", album);

    const res = await requestJson(this.name, url);
    expectOk(this.name, res);

    const data = parseBody(this.name, SearchSchema, res.body);
    // "album": null means no match
    const thumb = data.album?.[0]?.strAlbumThumb?.trim();
    return thumb || null;
  }
}
