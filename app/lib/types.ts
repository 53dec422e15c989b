/**
 * Core data types shared by the trivia pipeline and the cover-art chain.
 */

export const DIFFICULTIES = ["easy", "medium", "hard"] as const;

export type Difficulty = (typeof DIFFICULTIES)[number];

/** Questions requested per difficulty tier. */
export const QUESTIONS_PER_TIER = 3;

/** Answer options per question. */
export const OPTIONS_PER_QUESTION = 4;

/**
 * One parsed input line: "Artist - Album - Year".
 * Identity is the (artist, album, year) tuple.
 */
export interface AlbumEntry {
  artist: string;
  album: string;
  year: number;
}

/** Years are written as the four-digit text they were read from ("0969"). */
export function formatYear(year: number): string {
  return String(year).padStart(4, "0");
}

export interface Question {
  question: string;
  options: string[];
  correctAnswer: string; // must equal one of `options`
  trivia: string;
}

export type QuestionSet = Record<Difficulty, Question[]>;

/**
 * Written in place of `questions` when generation gave up.
 * Carries no tier keys, so it can never be mistaken for a QuestionSet.
 */
export interface GenerationFailureMarker {
  error: "generation_failed";
  reason: string;
  attempts: number;
}

/**
 * Final per-album output record, exactly as persisted.
 */
export interface AlbumRecord {
  artist: string;
  album: string;
  year: string; // YYYY
  coverSrc: string; // "" when no provider had a cover
  questions: QuestionSet | GenerationFailureMarker;
}

export type CategoriesByDifficulty = Record<Difficulty, string[]>;

export type CoverProviderName =
  | "lastfm"
  | "spotify"
  | "discogs"
  | "audiodb"
  | "musicbrainz";

export interface CoverArtResult {
  url: string | null;
  provider: CoverProviderName | null; // provider that produced the hit
  found: boolean;
  attempted: CoverProviderName[];
}

export function isGenerationFailure(
  questions: AlbumRecord["questions"],
): questions is GenerationFailureMarker {
  return "error" in questions && questions.error === "generation_failed";
}
