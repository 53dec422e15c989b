import { errorMessage } from "../errors";
import { generateQuestionSet } from "../trivia/generate";
import type { GenerationDeps, GenerationOptions } from "../trivia/generate";
import { formatYear } from "../types";
import type { AlbumEntry, AlbumRecord, GenerationFailureMarker } from "../types";
import type { CoverSource } from "./coverSource";

export interface AlbumPipelineDeps extends GenerationDeps {
  /** Omit to skip cover lookups (`coverSrc` stays empty). */
  covers?: CoverSource;
}

export interface ProcessedAlbum {
  record: AlbumRecord;
  generated: boolean;
  coverFound: boolean;
}

async function lookupCover(entry: AlbumEntry, covers: CoverSource | undefined): Promise<string> {
  if (!covers) return "";

  const cover = await covers.resolve(entry);
  if (cover.found && cover.url) {
    console.log(`  cover: ${cover.provider}`);
    return cover.url;
  }

  console.warn(`  cover: not found (tried ${cover.attempted.join(", ") || "no providers"})`);
  try {
    await covers.recordMissing(entry);
  } catch (err) {
    console.error(`  Failed to record missing cover: ${errorMessage(err)}`);
  }
  return "";
}

/**
 * Cover + trivia for one album. Always yields exactly one record: an
 * unresolved cover leaves `coverSrc` empty, exhausted generation puts a
 * failure marker in place of the questions.
 */
export async function processAlbum(
  entry: AlbumEntry,
  deps: AlbumPipelineDeps,
  options: GenerationOptions = {},
): Promise<ProcessedAlbum> {
  const coverSrc = await lookupCover(entry, deps.covers);
  const outcome = await generateQuestionSet(entry, deps, options);

  const base = {
    artist: entry.artist,
    album: entry.album,
    year: formatYear(entry.year),
    coverSrc,
  };

  if (outcome.status === "success") {
    return {
      record: { ...base, questions: outcome.questions },
      generated: true,
      coverFound: coverSrc !== "",
    };
  }

  const marker: GenerationFailureMarker = {
    error: "generation_failed",
    reason: outcome.error.lastError.message,
    attempts: outcome.attempts,
  };
  console.error(`  ${outcome.error.message}`);
  return {
    record: { ...base, questions: marker },
    generated: false,
    coverFound: coverSrc !== "",
  };
}
