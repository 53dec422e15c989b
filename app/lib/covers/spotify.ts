/**
 * spotify.ts
 *
 * Album art from the Spotify Web API search endpoint, authenticated with the
 * client-credentials flow.
 *
 * Requires: SPOTIFY_CLIENT_ID, SPOTIFY_CLIENT_SECRET
 */

import { z } from "zod";
import { expectOk, parseBody, requestJson } from "./http";
import type { CoverArtProvider } from "./types";

const API_BASE = "https://api.spotify.com/v1";
const TOKEN_URL = "https://accounts.spotify.com/api/token";

// Refresh 60s before expiry
const TOKEN_EXPIRY_MARGIN_S = 60;

const TokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
});

const SearchSchema = z.object({
  albums: z.object({
    items: z.array(
      z.object({
        name: z.string().optional(),
        images: z.array(
          z.object({
            url: z.string(),
            width: z.number().nullable().optional(),
            height: z.number().nullable().optional(),
          }),
        ),
      }),
    ),
  }),
});

function quoteTerm(value: string): string {
  return `"${value.replace(/"/g, "")}"`;
}

export class SpotifyCoverProvider implements CoverArtProvider {
  readonly name = "spotify" as const;
  private clientId: string;
  private clientSecret: string;
  private accessToken = "";
  private tokenExpiresAt = 0;
  private now: () => number;

  constructor(options: { clientId: string; clientSecret: string; now?: () => number }) {
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.now = options.now ?? Date.now;
  }

  private async ensureToken(): Promise<string> {
    if (this.accessToken && this.now() < this.tokenExpiresAt) {
      return this.accessToken;
    }

    const credentials = Buffer.from(`${this.clientId}:${this.clientSecret}`).toString("base64");
    const res = await requestJson(this.name, TOKEN_URL, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Authorization: `Basic ${credentials}`,
      },
      body: "grant_type=client_credentials",
    });
    expectOk(this.name, res);

    const token = parseBody(this.name, TokenSchema, res.body);
    this.accessToken = token.access_token;
    this.tokenExpiresAt = this.now() + (token.expires_in - TOKEN_EXPIRY_MARGIN_S) * 1000;
    return this.accessToken;
  }

  async lookup(artist: string, album: string): Promise<string | null> {
    const token = await this.ensureToken();

    const url = new URL(`${API_BASE}/search`);
    url.searchParams.set("q", `album:${quoteTerm(album)} artist:${quoteTerm(artist)}`);
    url.searchParams.set("type", "album");
    url.searchParams.set("limit", "1");

    const res = await requestJson(this.name, url, {
      headers: { Authorization: `Bearer ${token}` },
    });
    expectOk(this.name, res);

    const data = parseBody(this.name, SearchSchema, res.body);
    const first = data.albums.items[0];
    if (!first || first.images.length === 0) return null;

    // Spotify lists images largest first, but don't rely on it
    const largest = [...first.images].sort((a, b) => (b.width ?? 0) - (a.width ?? 0))[0];
    return largest.url;
  }
}
