import "dotenv/config";
import { resolve } from "path";
import { CliUsageError, USAGE, parseCliArgs } from "./lib/cliArgs";
import { ConfigError, loadConfig } from "./lib/config";
import { buildCoverProviders } from "./lib/covers";
import { errorMessage } from "./lib/errors";
import { languageName } from "./lib/languages";
import { configureLogsDir } from "./lib/logging/jsonl";
import { CoverSource } from "./lib/pipeline/coverSource";
import { formatSummary, runAlbumDirectory } from "./lib/pipeline/runAlbumList";
import { getCategoryCatalog } from "./lib/trivia/categories";
import { CoverageTracker } from "./lib/trivia/coverage";
import { createRandomSource } from "./lib/trivia/selectCategories";
import { getTextGenerator } from "./lib/trivia/textGenerator";

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const config = loadConfig();
  configureLogsDir(config.logsDir);

  const generator = getTextGenerator(config.ai);
  const catalog = getCategoryCatalog(config.trivia.categoryCatalog);
  const covers = args.covers
    ? new CoverSource(buildCoverProviders(config.covers), resolve(config.missingCoversLog))
    : undefined;

  console.log(`Model: ${config.ai.provider}/${config.ai.model}`);
  console.log(`Languages: ${args.languages.map(languageName).join(", ")}`);
  console.log(`Categories: ${config.trivia.categoryCatalog} (${catalog.length})`);
  console.log(`Covers: ${args.covers ? config.covers.order.join(" > ") : "off"}`);

  const summary = await runAlbumDirectory(
    {
      inputDir: resolve(args.inputDir),
      outputDir: resolve(args.outputDir),
      finishedDir: resolve(args.finishedDir),
      languages: args.languages,
    },
    {
      generator,
      tracker: new CoverageTracker(catalog),
      random: createRandomSource(args.seed),
      covers,
    },
    {
      maxAttempts: args.maxAttempts ?? config.trivia.maxAttempts,
      backoff: config.trivia.backoff,
      allowDuplicateQuestions: config.trivia.allowDuplicateQuestions,
    },
  );

  console.log(`\nDone.\n${formatSummary(summary)}`);
}

main().catch((err: unknown) => {
  if (err instanceof CliUsageError) {
    console.error(`${err.message}\n\n${USAGE}`);
  } else if (err instanceof ConfigError) {
    console.error(`Configuration error: ${err.message}`);
  } else {
    console.error(`Fatal: ${errorMessage(err)}`);
  }
  process.exit(1);
});
