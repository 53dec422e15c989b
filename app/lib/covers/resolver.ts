import { TransportError, errorMessage } from "../errors";
import { logCoverProviderError } from "../logging/covers";
import type { CoverArtResult, CoverProviderName } from "../types";
import type { CoverArtProvider } from "./types";

/**
 * Try each provider once, in order, and stop at the first hit.
 *
 * A provider error is logged with the provider's name and treated as a miss,
 * so the chain continues. Never throws.
 */
export async function resolveCoverArt(
  artist: string,
  album: string,
  providers: readonly CoverArtProvider[],
): Promise<CoverArtResult> {
  const attempted: CoverProviderName[] = [];

  for (const provider of providers) {
    attempted.push(provider.name);
    try {
      const url = await provider.lookup(artist, album);
      if (url) {
        return { url, provider: provider.name, found: true, attempted };
      }
    } catch (err) {
      const message = errorMessage(err);
      console.warn(`  cover: ${provider.name} failed for ${artist} - ${album}: ${message}`);
      await logCoverProviderError({
        provider: provider.name,
        artist,
        album,
        error: message,
        status: err instanceof TransportError ? err.status : null,
      });
    }
  }

  return { url: null, provider: null, found: false, attempted };
}
