import type { AlbumEntry } from "./types";

const SEPARATOR = " - ";

export type ParsedAlbumLine =
  | { ok: true; lineNumber: number; entry: AlbumEntry }
  | { ok: false; lineNumber: number; line: string; reason: string };

/**
 * Parse "Artist - Album - Year".
 *
 * The year is split off at the LAST separator and the artist at the FIRST one,
 * so album titles may themselves contain " - " ("Kraftwerk - The Man - Machine - 1978").
 */
export function parseAlbumLine(
  rawLine: string,
  lineNumber = 1,
): ParsedAlbumLine {
  const line = rawLine.trim();
  const fail = (reason: string): ParsedAlbumLine => ({
    ok: false,
    lineNumber,
    line,
    reason,
  });

  const yearIdx = line.lastIndexOf(SEPARATOR);
  if (yearIdx === -1) return fail("expected 'Artist - Album - Year'");

  const artistAlbum = line.slice(0, yearIdx);
  const yearText = line.slice(yearIdx + SEPARATOR.length).trim();

  const artistIdx = artistAlbum.indexOf(SEPARATOR);
  if (artistIdx === -1) return fail("expected 'Artist - Album - Year'");

  const artist = artistAlbum.slice(0, artistIdx).trim();
  const album = artistAlbum.slice(artistIdx + SEPARATOR.length).trim();

  if (!artist) return fail("artist is empty");
  if (!album) return fail("album is empty");
  if (!/^\d{4}$/.test(yearText)) {
    return fail(`year "${yearText}" is not a 4-digit number`);
  }

  return {
    ok: true,
    lineNumber,
    entry: { artist, album, year: Number(yearText) },
  };
}

/**
 * Parse a whole album list. Blank lines are ignored; every other line yields
 * either an entry or a skip with its reason.
 */
export function parseAlbumList(text: string): ParsedAlbumLine[] {
  const results: ParsedAlbumLine[] = [];
  const lines = text.split(/\r?\n/);
  lines.forEach((line, i) => {
    if (!line.trim()) return;
    results.push(parseAlbumLine(line, i + 1));
  });
  return results;
}
