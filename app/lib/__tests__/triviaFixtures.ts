import type { Difficulty, Question, QuestionSet } from "../types";

export function makeQuestion(tier: Difficulty, index: number): Question {
  const label = `${tier} ${index + 1}`;
  return {
    question: `Question ${label} about Abbey Road by The Beatles?`,
    options: [`${label} A`, `${label} B`, `${label} C`, `${label} D`],
    correctAnswer: `${label} B`,
    trivia: `Trivia for ${label}.`,
  };
}

export function makeQuestionSet(): QuestionSet {
  const tier = (t: Difficulty) => [0, 1, 2].map((i) => makeQuestion(t, i));
  return { easy: tier("easy"), medium: tier("medium"), hard: tier("hard") };
}

/** A well-formed 9-question payload as the model would return it. */
export function validPayload(): string {
  return JSON.stringify(makeQuestionSet());
}

/** Same payload with `correctAnswer` removed from every question. */
export function payloadWithoutCorrectAnswer(): string {
  const set = makeQuestionSet();
  const strip = (qs: Question[]) =>
    qs.map(({ question, options, trivia }) => ({ question, options, trivia }));
  return JSON.stringify({
    easy: strip(set.easy),
    medium: strip(set.medium),
    hard: strip(set.hard),
  });
}
