import { promises as fs } from "fs";
import { basename, extname, join } from "path";
import { hasErrorCode } from "../errors";
import { languageName } from "../languages";
import { parseAlbumList } from "../parseAlbumList";
import type { GenerationOptions } from "../trivia/generate";
import { processAlbum } from "./albumPipeline";
import type { AlbumPipelineDeps } from "./albumPipeline";
import { AlbumStore } from "./albumStore";

export interface RunOptions {
  inputDir: string;
  outputDir: string;
  finishedDir: string;
  languages: string[];
}

export interface RunSummary {
  files: number;
  processed: number;
  skipped: number;
  invalidLines: number;
  failedGenerations: number;
  missingCovers: number;
}

function emptySummary(): RunSummary {
  return {
    files: 0,
    processed: 0,
    skipped: 0,
    invalidLines: 0,
    failedGenerations: 0,
    missingCovers: 0,
  };
}

/** "top100_indie_rock_albums.txt" -> "indie_rock" */
export function genreFromFileName(fileName: string): string {
  return basename(fileName, extname(fileName))
    .replace(/^top100_/, "")
    .replace(/_albums$/, "");
}

async function listAlbumFiles(inputDir: string): Promise<string[]> {
  const names = await fs.readdir(inputDir);
  return names.filter((name) => name.toLowerCase().endsWith(".txt")).sort();
}

/**
 * Process every album line of one list into `store`, skipping albums the
 * store already holds. Updates `summary` in place.
 */
export async function processAlbumList(params: {
  text: string;
  store: AlbumStore;
  deps: AlbumPipelineDeps;
  options: GenerationOptions;
  summary: RunSummary;
}): Promise<void> {
  const { text, store, deps, options, summary } = params;
  const lines = parseAlbumList(text);
  const total = lines.length;

  for (const [i, line] of lines.entries()) {
    if (!line.ok) {
      summary.invalidLines++;
      console.warn(`  Skipping line ${line.lineNumber} (${line.reason}): ${line.line}`);
      continue;
    }

    const { entry } = line;
    const label = `${entry.artist} - ${entry.album} (${entry.year})`;
    if (store.has(entry.artist, entry.album)) {
      summary.skipped++;
      console.log(`  [${i + 1}/${total}] Skipping ${label}: already in ${basename(store.filePath)}`);
      continue;
    }

    console.log(`  [${i + 1}/${total}] ${label}`);
    const result = await processAlbum(entry, deps, options);
    await store.add(result.record);

    summary.processed++;
    if (!result.generated) summary.failedGenerations++;
    if (deps.covers && !result.coverFound) summary.missingCovers++;
  }
}

async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (err) {
    if (!hasErrorCode(err, "EXDEV")) throw err;
    await fs.copyFile(from, to);
    await fs.unlink(from);
  }
}

/**
 * Every `.txt` list in `inputDir`, for every language, into
 * `<outputDir>/<language>/<genre>.json`. Input files move to `finishedDir`
 * once all languages are done.
 */
export async function runAlbumDirectory(
  run: RunOptions,
  deps: AlbumPipelineDeps,
  options: Omit<GenerationOptions, "language"> = {},
): Promise<RunSummary> {
  const summary = emptySummary();
  const files = await listAlbumFiles(run.inputDir);
  summary.files = files.length;

  if (files.length === 0) {
    console.log(`No .txt files in ${run.inputDir}`);
    return summary;
  }

  const texts = new Map<string, string>();
  for (const file of files) {
    texts.set(file, await fs.readFile(join(run.inputDir, file), "utf8"));
  }

  for (const language of run.languages) {
    console.log(`\n=== ${languageName(language)} (${language}) ===`);
    for (const [file, text] of texts) {
      const genre = genreFromFileName(file);
      const store = await AlbumStore.open(join(run.outputDir, language, `${genre}.json`));
      console.log(`\n${file} -> ${language}/${genre}.json (${store.size} existing)`);
      await processAlbumList({ text, store, deps, options: { ...options, language }, summary });
    }
  }

  await fs.mkdir(run.finishedDir, { recursive: true });
  for (const file of files) {
    await moveFile(join(run.inputDir, file), join(run.finishedDir, file));
  }

  return summary;
}

export function formatSummary(summary: RunSummary): string {
  return [
    `Files: ${summary.files}`,
    `Processed: ${summary.processed}`,
    `Skipped (already present): ${summary.skipped}`,
    `Invalid lines: ${summary.invalidLines}`,
    `Failed generations: ${summary.failedGenerations}`,
    `Missing covers: ${summary.missingCovers}`,
  ].join("\n");
}
