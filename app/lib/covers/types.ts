import type { CoverProviderName } from "../types";

/**
 * One cover-art source. `lookup` resolves to an image URL, or null for a clean
 * "not found"; it throws (TransportError) when the provider itself fails.
 */
export interface CoverArtProvider {
  readonly name: CoverProviderName;
  lookup(artist: string, album: string): Promise<string | null>;
}
