import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Mock } from "vitest";
import {
  ExhaustedRetriesError,
  MalformedResponseError,
  SchemaViolationError,
  TransportError,
} from "../../errors";
import type { AlbumEntry } from "../../types";
import {
  makeQuestionSet,
  payloadWithoutCorrectAnswer,
  validPayload,
} from "../../__tests__/triviaFixtures";
import { backoffDelay } from "../backoff";
import { CoverageTracker } from "../coverage";
import { generateQuestionSet } from "../generate";

vi.mock("../../logging/generation", () => ({
  logGenerationAttempt: vi.fn(async () => undefined),
  logRawResponse: vi.fn(async () => undefined),
}));

const ABBEY_ROAD: AlbumEntry = { artist: "The Beatles", album: "Abbey Road", year: 1969 };
const CATALOG = ["A", "B", "C", "D", "E", "F", "G", "H"];
const BACKOFF = { baseMs: 100, capMs: 500 };

function fakeGenerator(
  respond: (callNumber: number) => Promise<string>,
): { name: string; generate: Mock<(prompt: string) => Promise<string>> } {
  let calls = 0;
  return {
    name: "fake",
    generate: vi.fn(async (_prompt: string) => respond(++calls)),
  };
}

describe("generateQuestionSet", () => {
  let tracker: CoverageTracker;
  const sleep = vi.fn(async (_ms: number) => undefined);

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    tracker = new CoverageTracker(CATALOG);
  });

  it("succeeds on the first attempt without retries", async () => {
    const generator = fakeGenerator(async () => validPayload());

    const outcome = await generateQuestionSet(
      ABBEY_ROAD,
      { generator, tracker, sleep },
      { maxAttempts: 3, backoff: BACKOFF },
    );

    expect(outcome.status).toBe("success");
    if (outcome.status !== "success") return;
    expect(outcome.questions).toEqual(makeQuestionSet());
    expect(outcome.attempts).toBe(1);
    expect(outcome.retries).toBe(0);
    expect(generator.generate).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("recovers after two malformed responses (scenario B)", async () => {
    const generator = fakeGenerator(async (call) =>
      call < 3 ? "Sorry, here are some questions: [oops" : validPayload(),
    );

    const outcome = await generateQuestionSet(
      ABBEY_ROAD,
      { generator, tracker, sleep },
      { maxAttempts: 3, backoff: BACKOFF },
    );

    expect(outcome.status).toBe("success");
    expect(outcome.retries).toBe(2);
    expect(outcome.attempts).toBe(3);
    expect(outcome.history.map((h) => h.error?.name ?? "ok")).toEqual([
      "MalformedResponseError",
      "MalformedResponseError",
      "ok",
    ]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it("gives up after maxAttempts when correctAnswer is always missing (scenario C)", async () => {
    const generator = fakeGenerator(async () => payloadWithoutCorrectAnswer());

    const outcome = await generateQuestionSet(
      ABBEY_ROAD,
      { generator, tracker, sleep },
      { maxAttempts: 2, backoff: BACKOFF },
    );

    expect(outcome.status).toBe("exhausted");
    if (outcome.status !== "exhausted") return;
    expect(generator.generate).toHaveBeenCalledTimes(2);
    expect(outcome.error).toBeInstanceOf(ExhaustedRetriesError);
    expect(outcome.error.attempts).toBe(2);

    const last = outcome.error.lastError;
    expect(last).toBeInstanceOf(SchemaViolationError);
    expect(last instanceof SchemaViolationError && last.reason).toBe("missing_field");
    expect(last instanceof SchemaViolationError && last.field).toBe("correctAnswer");

    // no wait after the final attempt
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("calls the generator exactly maxAttempts times with non-decreasing delays", async () => {
    const generator = fakeGenerator(async () => {
      throw new TransportError("fake", "503 Service Unavailable", { status: 503 });
    });

    const outcome = await generateQuestionSet(
      ABBEY_ROAD,
      { generator, tracker, sleep },
      { maxAttempts: 5, backoff: BACKOFF },
    );

    expect(outcome.status).toBe("exhausted");
    expect(generator.generate).toHaveBeenCalledTimes(5);

    const delays = sleep.mock.calls.map(([ms]) => ms);
    expect(delays).toEqual([100, 200, 400, 500]);
    for (let i = 1; i < delays.length; i++) {
      expect(delays[i]).toBeGreaterThanOrEqual(delays[i - 1]);
    }
  });

  it("wraps unexpected errors from the generator as transport errors", async () => {
    const generator = fakeGenerator(async () => {
      throw new Error("socket hang up");
    });

    const outcome = await generateQuestionSet(
      ABBEY_ROAD,
      { generator, tracker, sleep },
      { maxAttempts: 1, backoff: BACKOFF },
    );

    expect(outcome.status).toBe("exhausted");
    if (outcome.status !== "exhausted") return;
    expect(outcome.error.lastError).toBeInstanceOf(TransportError);
    expect(outcome.error.lastError.message).toBe("fake: socket hang up");
  });

  it("sends the same prompt on every attempt and selects categories once", async () => {
    const generator = fakeGenerator(async (call) =>
      call === 1 ? "" : validPayload(),
    );

    const outcome = await generateQuestionSet(
      ABBEY_ROAD,
      { generator, tracker, sleep, random: () => 0 },
      { maxAttempts: 3, backoff: BACKOFF, language: "de" },
    );

    expect(outcome.status).toBe("success");
    expect(outcome.history[0].error).toBeInstanceOf(MalformedResponseError);
    const prompts = generator.generate.mock.calls.map(([p]) => p);
    expect(prompts).toHaveLength(2);
    expect(prompts[0]).toBe(prompts[1]);
    expect(prompts[0]).toContain("in German");

    expect(outcome.categories).toEqual({
      easy: ["A", "B", "C"],
      medium: ["A", "B", "C"],
      hard: ["A", "B", "C"],
    });
    expect(tracker.minUseCount("easy")).toBe(0);
    expect(tracker.useCount("easy", "A")).toBe(1);
  });

  it("rejects a non-positive maxAttempts", async () => {
    const generator = fakeGenerator(async () => validPayload());
    await expect(
      generateQuestionSet(ABBEY_ROAD, { generator, tracker, sleep }, { maxAttempts: 0 }),
    ).rejects.toThrow(RangeError);
  });
});

describe("backoffDelay", () => {
  it("doubles from the base and caps", () => {
    const policy = { baseMs: 1000, capMs: 5000 };
    expect([1, 2, 3, 4, 5].map((r) => backoffDelay(r, policy))).toEqual([
      1000, 2000, 4000, 5000, 5000,
    ]);
  });

  it("is zero before the first retry", () => {
    expect(backoffDelay(0)).toBe(0);
  });
});
