import { parseLanguageList } from "./languages";

export const USAGE = `Usage: npm run generate -- <inputDir> <outputDir> <finishedDir> [options]

Options:
  --languages <list>   Comma-separated languages (default: de)
  --max-attempts <n>   Generation attempts per album (default: TRIVIA_MAX_ATTEMPTS)
  --seed <seed>        Seed for category selection
  --no-covers          Skip cover-art lookups`;

export interface CliArgs {
  inputDir: string;
  outputDir: string;
  finishedDir: string;
  languages: string[];
  maxAttempts?: number;
  seed?: string;
  covers: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/**
 * Parse `process.argv.slice(2)`. Flags may appear anywhere; `--flag=value`
 * and `--flag value` are both accepted.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let languages = ["de"];
  let maxAttempts: number | undefined;
  let seed: string | undefined;
  let covers = true;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const [flag, inline] = arg.split(/=(.*)/s, 2);
    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new CliUsageError(`${flag} needs a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case "--languages":
        languages = parseLanguageList(value());
        if (languages.length === 0) throw new CliUsageError("--languages is empty");
        break;
      case "--max-attempts": {
        const raw = value();
        const n = Number(raw);
        if (!Number.isInteger(n) || n < 1) {
          throw new CliUsageError(`--max-attempts must be a positive integer, got "${raw}"`);
        }
        maxAttempts = n;
        break;
      }
      case "--seed":
        seed = value();
        break;
      case "--no-covers":
        covers = false;
        break;
      default:
        throw new CliUsageError(`Unknown option ${flag}`);
    }
  }

  if (positional.length !== 3) {
    throw new CliUsageError(
      `Expected <inputDir> <outputDir> <finishedDir>, got ${positional.length} argument(s)`,
    );
  }
  const [inputDir, outputDir, finishedDir] = positional;
  return { inputDir, outputDir, finishedDir, languages, maxAttempts, seed, covers };
}
