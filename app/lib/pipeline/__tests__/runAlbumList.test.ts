import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";
import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { makeQuestionSet, validPayload } from "../../__tests__/triviaFixtures";
import { CoverageTracker } from "../../trivia/coverage";
import { formatSummary, genreFromFileName, runAlbumDirectory } from "../runAlbumList";

vi.mock("../../logging/generation", () => ({
  logGenerationAttempt: vi.fn(async () => undefined),
  logRawResponse: vi.fn(async () => undefined),
}));

const CATALOG = ["A", "B", "C", "D", "E", "F", "G", "H"];

describe("genreFromFileName", () => {
  it("strips the list prefix and suffix", () => {
    expect(genreFromFileName("top100_indie_rock_albums.txt")).toBe("indie_rock");
    expect(genreFromFileName("jazz.txt")).toBe("jazz");
  });
});

describe("runAlbumDirectory", () => {
  let root: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    root = await fs.mkdtemp(join(tmpdir(), "album-run-"));
    await fs.mkdir(join(root, "input"));
    await fs.mkdir(join(root, "output", "en"), { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("writes one file per language, skips known albums and moves the input", async () => {
    await fs.writeFile(
      join(root, "input", "top100_rock_albums.txt"),
      [
        "The Beatles - Abbey Road - 1969",
        "not a valid line",
        "",
        "Pink Floyd - The Dark Side of the Moon - 1973",
      ].join("\n"),
    );
    await fs.writeFile(join(root, "input", "notes.md"), "ignored");
    const existing = {
      artist: "Pink Floyd",
      album: "The Dark Side of the Moon",
      year: "1973",
      coverSrc: "",
      questions: makeQuestionSet(),
    };
    await fs.writeFile(join(root, "output", "en", "rock.json"), JSON.stringify([existing]));

    const generator = { name: "fake", generate: vi.fn(async (_prompt: string) => validPayload()) };
    const summary = await runAlbumDirectory(
      {
        inputDir: join(root, "input"),
        outputDir: join(root, "output"),
        finishedDir: join(root, "finished"),
        languages: ["en", "de"],
      },
      { generator, tracker: new CoverageTracker(CATALOG) },
      { maxAttempts: 1 },
    );

    expect(summary).toEqual({
      files: 1,
      processed: 3,
      skipped: 1,
      invalidLines: 2,
      failedGenerations: 0,
      missingCovers: 0,
    });
    expect(generator.generate).toHaveBeenCalledTimes(3);
    expect(generator.generate.mock.calls[2][0]).toContain("in German");

    const en: Array<{ album: string }> = JSON.parse(
      await fs.readFile(join(root, "output", "en", "rock.json"), "utf8"),
    );
    expect(en.map((r) => r.album)).toEqual(["The Dark Side of the Moon", "Abbey Road"]);

    const de: Array<{ album: string; year: string }> = JSON.parse(
      await fs.readFile(join(root, "output", "de", "rock.json"), "utf8"),
    );
    expect(de.map((r) => [r.album, r.year])).toEqual([
      ["Abbey Road", "1969"],
      ["The Dark Side of the Moon", "1973"],
    ]);

    expect(await fs.readdir(join(root, "input"))).toEqual(["notes.md"]);
    expect(await fs.readdir(join(root, "finished"))).toEqual(["top100_rock_albums.txt"]);
  });

  it("does nothing when there are no lists", async () => {
    const generator = { name: "fake", generate: vi.fn(async (_prompt: string) => validPayload()) };
    const summary = await runAlbumDirectory(
      {
        inputDir: join(root, "input"),
        outputDir: join(root, "output"),
        finishedDir: join(root, "finished"),
        languages: ["en"],
      },
      { generator, tracker: new CoverageTracker(CATALOG) },
    );
    expect(summary.files).toBe(0);
    expect(generator.generate).not.toHaveBeenCalled();
  });
});

describe("formatSummary", () => {
  it("lists every counter", () => {
    expect(
      formatSummary({
        files: 2,
        processed: 10,
        skipped: 1,
        invalidLines: 0,
        failedGenerations: 2,
        missingCovers: 3,
      }),
    ).toBe(
      [
        "Files: 2",
        "Processed: 10",
        "Skipped (already present): 1",
        "Invalid lines: 0",
        "Failed generations: 2",
        "Missing covers: 3",
      ].join("\n"),
    );
  });
});
