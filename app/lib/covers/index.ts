import type { AppConfig } from "../config";
import type { CoverProviderName } from "../types";
import { AudioDbCoverProvider } from "./audiodb";
import { DiscogsCoverProvider } from "./discogs";
import { LastFmCoverProvider } from "./lastfm";
import { MusicBrainzCoverProvider } from "./musicbrainz";
import { SpotifyCoverProvider } from "./spotify";
import type { CoverArtProvider } from "./types";

export { resolveCoverArt } from "./resolver";
export { appendMissingCover } from "./missingCovers";
export type { CoverArtProvider } from "./types";

function createProvider(
  name: CoverProviderName,
  covers: AppConfig["covers"],
): CoverArtProvider | string {
  switch (name) {
    case "lastfm":
      return covers.lastfmApiKey
        ? new LastFmCoverProvider(covers.lastfmApiKey)
        : "LASTFM_API_KEY is not set";
    case "spotify":
      return covers.spotifyClientId && covers.spotifyClientSecret
        ? new SpotifyCoverProvider({
            clientId: covers.spotifyClientId,
            clientSecret: covers.spotifyClientSecret,
          })
        : "SPOTIFY_CLIENT_ID/SPOTIFY_CLIENT_SECRET are not set";
    case "discogs":
      return covers.discogsToken
        ? new DiscogsCoverProvider(covers.discogsToken)
        : "DISCOGS_TOKEN is not set";
    case "audiodb":
      return covers.audiodbApiKey
        ? new AudioDbCoverProvider(covers.audiodbApiKey)
        : "AUDIODB_API_KEY is not set";
    case "musicbrainz":
      return new MusicBrainzCoverProvider({ contact: covers.musicbrainzContact });
  }
}

/**
 * Build the provider chain in configured order. Providers whose credentials
 * are missing are left out with a warning.
 */
export function buildCoverProviders(covers: AppConfig["covers"]): CoverArtProvider[] {
  const providers: CoverArtProvider[] = [];
  for (const name of covers.order) {
    const provider = createProvider(name, covers);
    if (typeof provider === "string") {
      console.warn(`Cover provider "${name}" disabled: ${provider}`);
      continue;
    }
    providers.push(provider);
  }
  return providers;
}
