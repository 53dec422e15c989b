import {
  ExhaustedRetriesError,
  MalformedResponseError,
  SchemaViolationError,
  TransportError,
  errorMessage,
} from "../errors";
import type { AttemptError } from "../errors";
import { logGenerationAttempt, logRawResponse } from "../logging/generation";
import type { AlbumEntry, CategoriesByDifficulty, QuestionSet } from "../types";
import { backoffDelay, DEFAULT_BACKOFF, sleep as realSleep } from "./backoff";
import type { BackoffPolicy, Sleep } from "./backoff";
import type { CoverageTracker } from "./coverage";
import { buildTriviaPrompt } from "./prompts";
import { selectCategoriesForAlbum } from "./selectCategories";
import type { RandomSource } from "./selectCategories";
import type { TextGenerator } from "./textGenerator";
import { validateTriviaResponse } from "./validate";

export const DEFAULT_MAX_ATTEMPTS = 3;

export interface AttemptRecord {
  attempt: number; // 1-based
  error?: AttemptError;
  delayMs?: number; // wait before the next attempt
}

export type GenerationOutcome =
  | {
      status: "success";
      questions: QuestionSet;
      categories: CategoriesByDifficulty;
      attempts: number;
      retries: number;
      history: AttemptRecord[];
    }
  | {
      status: "exhausted";
      error: ExhaustedRetriesError;
      categories: CategoriesByDifficulty;
      attempts: number;
      retries: number;
      history: AttemptRecord[];
    };

export interface GenerationDeps {
  generator: TextGenerator;
  tracker: CoverageTracker;
  random?: RandomSource;
  sleep?: Sleep;
}

export interface GenerationOptions {
  maxAttempts?: number;
  backoff?: BackoffPolicy;
  language?: string;
  allowDuplicateQuestions?: boolean;
}

function toAttemptError(err: unknown, provider: string): AttemptError {
  if (
    err instanceof TransportError ||
    err instanceof MalformedResponseError ||
    err instanceof SchemaViolationError
  ) {
    return err;
  }
  return new TransportError(provider, errorMessage(err), { cause: err });
}

/**
 * Generate and validate the nine questions for one album.
 *
 * Requesting -> Validating -> Success, or -> Retrying -> Requesting until
 * `maxAttempts` requests have failed. Categories are picked once per album, so
 * retries do not consume coverage. Provider and validation failures never
 * throw: exhaustion is an outcome.
 */
export async function generateQuestionSet(
  entry: AlbumEntry,
  deps: GenerationDeps,
  options: GenerationOptions = {},
): Promise<GenerationOutcome> {
  const {
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    backoff = DEFAULT_BACKOFF,
    language,
    allowDuplicateQuestions,
  } = options;
  const { generator, tracker, random, sleep = realSleep } = deps;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }

  const categories = selectCategoriesForAlbum(tracker, { random });
  const prompt = buildTriviaPrompt(entry, categories, { language });
  const history: AttemptRecord[] = [];
  let lastError: AttemptError | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let error: AttemptError;
    try {
      const rawText = await generator.generate(prompt);
      await logRawResponse({ album: entry, attempt, categories, rawText });

      const result = validateTriviaResponse(rawText, { allowDuplicateQuestions });
      if (result.ok) {
        history.push({ attempt });
        await logGenerationAttempt({
          album: entry,
          attempt,
          maxAttempts,
          status: "success",
        });
        return {
          status: "success",
          questions: result.questions,
          categories,
          attempts: attempt,
          retries: attempt - 1,
          history,
        };
      }
      error = result.error;
    } catch (err) {
      error = toAttemptError(err, generator.name);
    }

    lastError = error;
    const delayMs = attempt < maxAttempts ? backoffDelay(attempt, backoff) : undefined;
    history.push({ attempt, error, delayMs });

    console.warn(
      `  ${entry.artist} - ${entry.album}: attempt ${attempt}/${maxAttempts} failed (${error.name}: ${error.message})`,
    );
    await logGenerationAttempt({
      album: entry,
      attempt,
      maxAttempts,
      status: "failed",
      errorName: error.name,
      error: error.message,
      delayMs,
    });

    if (delayMs !== undefined) {
      await sleep(delayMs);
    }
  }

  // maxAttempts >= 1, so the loop ran and set lastError
  const exhausted = new ExhaustedRetriesError(
    maxAttempts,
    lastError ?? new TransportError(generator.name, "no attempts made"),
  );
  return {
    status: "exhausted",
    error: exhausted,
    categories,
    attempts: maxAttempts,
    retries: maxAttempts - 1,
    history,
  };
}
