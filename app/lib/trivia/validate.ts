import { z } from "zod";
import { MalformedResponseError, SchemaViolationError } from "../errors";
import type { ValidationError } from "../errors";
import { DIFFICULTIES, OPTIONS_PER_QUESTION, QUESTIONS_PER_TIER } from "../types";
import type { Difficulty, Question, QuestionSet } from "../types";

export type ValidationResult =
  | { ok: true; questions: QuestionSet }
  | { ok: false; error: ValidationError };

export interface ValidationOptions {
  /**
   * Duplicate question text across (or within) tiers is tolerated by default.
   * Set to false to reject it as `duplicate_question`.
   */
  allowDuplicateQuestions?: boolean;
}

const TierSchema = z.array(z.unknown()).length(QUESTIONS_PER_TIER);

const QuestionSetShapeSchema = z
  .object({ easy: TierSchema, medium: TierSchema, hard: TierSchema })
  .strict();

const QuestionFieldsSchema = z.object({
  question: z.string(),
  options: z.array(z.string()),
  correctAnswer: z.string(),
  trivia: z.string(),
});

type DecodeResult = { ok: true; value: unknown } | { ok: false };

/**
 * Pull a JSON value out of model output: the whole text, else a fenced code
 * block, else the outermost {...} span.
 */
export function decodeJsonPayload(rawText: string): DecodeResult {
  const text = rawText.trim();
  const candidates = [text];

  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenced) candidates.push(fenced[1].trim());

  const braces = text.match(/\{[\s\S]*\}/);
  if (braces) candidates.push(braces[0]);

  for (const candidate of candidates) {
    if (!candidate) continue;
    try {
      return { ok: true, value: JSON.parse(candidate) };
    } catch {
      continue;
    }
  }
  return { ok: false };
}

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

function checkQuestion(
  value: unknown,
  tier: Difficulty,
  index: number,
): Question | SchemaViolationError {
  const at = (field?: string) => ({ tier, index, field });

  const parsed = QuestionFieldsSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? String(issue.path[0]) : undefined;
    if (issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined") {
      return new SchemaViolationError("missing_field", `"${field}" is required`, at(field));
    }
    return new SchemaViolationError("wrong_shape", issue.message, at(field));
  }

  const q = parsed.data;

  for (const field of ["question", "correctAnswer", "trivia"] as const) {
    if (isBlank(q[field])) {
      return new SchemaViolationError("empty_field", `"${field}" is empty`, at(field));
    }
  }

  if (q.options.length !== OPTIONS_PER_QUESTION) {
    return new SchemaViolationError(
      "wrong_option_count",
      `expected ${OPTIONS_PER_QUESTION} options, got ${q.options.length}`,
      at("options"),
    );
  }

  if (q.options.some(isBlank)) {
    return new SchemaViolationError("empty_field", "options must not be empty", at("options"));
  }

  if (new Set(q.options).size !== q.options.length) {
    return new SchemaViolationError("duplicate_options", "options must be distinct", at("options"));
  }

  if (!q.options.includes(q.correctAnswer)) {
    return new SchemaViolationError(
      "answer_not_in_options",
      `"${q.correctAnswer}" is not one of the options`,
      at("correctAnswer"),
    );
  }

  return q;
}

/**
 * Decode and check a generated question set.
 *
 * Pure: the same text always gives the same result. The four question fields
 * are returned exactly as generated; keys outside the schema are dropped.
 */
export function validateTriviaResponse(
  rawText: string,
  options: ValidationOptions = {},
): ValidationResult {
  const { allowDuplicateQuestions = true } = options;

  const decoded = decodeJsonPayload(rawText);
  if (!decoded.ok) {
    return { ok: false, error: new MalformedResponseError() };
  }

  const shape = QuestionSetShapeSchema.safeParse(decoded.value);
  if (!shape.success) {
    const issue = shape.error.issues[0];
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return {
      ok: false,
      error: new SchemaViolationError("wrong_shape", `${path}${issue.message}`),
    };
  }

  const questions: QuestionSet = { easy: [], medium: [], hard: [] };
  const seen = new Map<string, { tier: Difficulty; index: number }>();

  for (const tier of DIFFICULTIES) {
    const items = shape.data[tier];
    for (let index = 0; index < items.length; index++) {
      const checked = checkQuestion(items[index], tier, index);
      if (checked instanceof SchemaViolationError) {
        return { ok: false, error: checked };
      }

      if (!allowDuplicateQuestions) {
        const key = checked.question.trim().toLowerCase();
        const first = seen.get(key);
        if (first) {
          return {
            ok: false,
            error: new SchemaViolationError(
              "duplicate_question",
              `same question as ${first.tier}[${first.index}]`,
              { tier, index, field: "question" },
            ),
          };
        }
        seen.set(key, { tier, index });
      }

      questions[tier].push(checked);
    }
  }

  return { ok: true, questions };
}
