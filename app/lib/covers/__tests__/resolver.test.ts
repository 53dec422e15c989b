import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";
import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { TransportError } from "../../errors";
import { logCoverProviderError } from "../../logging/covers";
import type { CoverProviderName } from "../../types";
import { REQUEST_TIMEOUT_MS } from "../http";
import { LastFmCoverProvider } from "../lastfm";
import { appendMissingCover } from "../missingCovers";
import { resolveCoverArt } from "../resolver";
import type { CoverArtProvider } from "../types";

vi.mock("../../logging/covers", () => ({
  logCoverProviderError: vi.fn(async () => undefined),
}));

function provider(
  name: CoverProviderName,
  lookup: (artist: string, album: string) => Promise<string | null>,
) {
  return { name, lookup: vi.fn(lookup) } satisfies CoverArtProvider;
}

describe("resolveCoverArt", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
  });

  it("stops at the first provider that finds a cover", async () => {
    const chain = [
      provider("lastfm", async () => null),
      provider("spotify", async () => "https://img.test/spotify.jpg"),
      provider("discogs", async () => "https://img.test/discogs.jpg"),
    ];

    const result = await resolveCoverArt("The Beatles", "Abbey Road", chain);

    expect(result).toEqual({
      url: "https://img.test/spotify.jpg",
      provider: "spotify",
      found: true,
      attempted: ["lastfm", "spotify"],
    });
    expect(chain[0].lookup).toHaveBeenCalledTimes(1);
    expect(chain[1].lookup).toHaveBeenCalledWith("The Beatles", "Abbey Road");
    expect(chain[2].lookup).not.toHaveBeenCalled();
  });

  it("treats a provider error as a miss and logs it", async () => {
    const chain = [
      provider("lastfm", async () => {
        throw new TransportError("lastfm", "HTTP 500", { status: 500 });
      }),
      provider("audiodb", async () => "https://img.test/audiodb.jpg"),
    ];

    const result = await resolveCoverArt("Can", "Tago Mago", chain);

    expect(result.provider).toBe("audiodb");
    expect(logCoverProviderError).toHaveBeenCalledWith({
      provider: "lastfm",
      artist: "Can",
      album: "Tago Mago",
      error: "lastfm: HTTP 500",
      status: 500,
    });
  });

  it("moves on when a provider never answers", async () => {
    vi.useFakeTimers();
    vi.stubGlobal(
      "fetch",
      vi.fn((_input: string | URL, _init?: RequestInit) => new Promise<Response>(() => undefined)),
    );
    const fallback = provider("audiodb", async () => "https://img.test/audiodb.jpg");

    const pending = resolveCoverArt("Can", "Tago Mago", [
      new LastFmCoverProvider("test-key"),
      fallback,
    ]);
    await vi.advanceTimersByTimeAsync(REQUEST_TIMEOUT_MS);
    const result = await pending;

    expect(result).toEqual({
      url: "https://img.test/audiodb.jpg",
      provider: "audiodb",
      found: true,
      attempted: ["lastfm", "audiodb"],
    });
    expect(logCoverProviderError).toHaveBeenCalledWith({
      provider: "lastfm",
      artist: "Can",
      album: "Tago Mago",
      error: `lastfm: request timed out after ${REQUEST_TIMEOUT_MS}ms`,
      status: null,
    });
  });

  it("reports not found after every provider misses (scenario D)", async () => {
    const chain = [
      provider("lastfm", async () => null),
      provider("spotify", async () => {
        throw new Error("timeout");
      }),
      provider("musicbrainz", async () => null),
    ];

    const result = await resolveCoverArt("Unknown Artist", "Obscure Album", chain);

    expect(result).toEqual({
      url: null,
      provider: null,
      found: false,
      attempted: ["lastfm", "spotify", "musicbrainz"],
    });
    for (const p of chain) expect(p.lookup).toHaveBeenCalledTimes(1);
  });

  it("returns not found for an empty chain", async () => {
    const result = await resolveCoverArt("A", "B", []);
    expect(result).toEqual({ url: null, provider: null, found: false, attempted: [] });
  });
});

describe("appendMissingCover", () => {
  it("appends one line per album", async () => {
    const dir = await fs.mkdtemp(join(tmpdir(), "missing-covers-"));
    const logPath = join(dir, "missing_covers.txt");

    await appendMissingCover(logPath, { artist: "Obscure Band", album: "Lost Tapes", year: 1977 });
    await appendMissingCover(logPath, { artist: "Other", album: "Demo", year: 1980 });

    expect(await fs.readFile(logPath, "utf8")).toBe(
      "Obscure Band | Lost Tapes | 1977\nOther | Demo | 1980\n",
    );
    await fs.rm(dir, { recursive: true, force: true });
  });
});
