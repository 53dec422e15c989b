import { languageName } from "../languages";
import { OPTIONS_PER_QUESTION, QUESTIONS_PER_TIER } from "../types";
import type { AlbumEntry, CategoriesByDifficulty } from "../types";

export const TRIVIA_SYSTEM_PROMPT =
  "You are a helpful trivia question generator. Always respond with valid JSON.";

function categoryLines(categories: string[]): string {
  return categories.map((c, i) => `  ${i + 1}. ${c}`).join("\n");
}

/**
 * One request for the whole album: 3 easy, 3 medium and 3 hard questions,
 * question N of a tier covering category N of that tier.
 */
export function buildTriviaPrompt(
  entry: AlbumEntry,
  categories: CategoriesByDifficulty,
  options: { language?: string } = {},
): string {
  const { artist, album, year } = entry;
  const language = languageName(options.language ?? "en");
  const total = QUESTIONS_PER_TIER * 3;

  return `
Create exactly ${total} realistic, well-researched trivia questions in ${language} about the album "${album}" by ${artist}, released in ${year}.
Write exactly ${QUESTIONS_PER_TIER} questions per difficulty: ${QUESTIONS_PER_TIER} easy, ${QUESTIONS_PER_TIER} medium, ${QUESTIONS_PER_TIER} hard.

CATEGORIES (question N of a difficulty must focus on category N of that difficulty):
easy:
${categoryLines(categories.easy)}
medium:
${categoryLines(categories.medium)}
hard:
${categoryLines(categories.hard)}

DIFFICULTY:
- easy: basic, easily researched facts (singles, chart positions, well-known songs)
- medium: more detailed information (recording process, musicians involved, musical details)
- hard: expert knowledge (technical details, historical context, cultural significance)

EVERY QUESTION MUST:
1. Name the artist "${artist}" and the album "${album}" explicitly
2. Be based on REAL, VERIFIABLE FACTS
3. Vary its wording and sentence structure from the other questions

OPTIONS:
- EXACTLY ${OPTIONS_PER_QUESTION} options, all different from each other
- Every option realistic and plausible; no obviously wrong or absurd options
- NO letters (A, B, C...) or numbering in front of options

"correctAnswer" MUST be copied character for character from one of the options.

"trivia" MUST be non-empty: 3-5 sentences that confirm the correct answer and add verifiable context about the album.

Return ONLY a JSON object with exactly this structure and these field names:
{
  "easy": [
    { "question": string, "options": [string, string, string, string], "correctAnswer": string, "trivia": string }
  ],
  "medium": [ ...${QUESTIONS_PER_TIER} questions... ],
  "hard": [ ...${QUESTIONS_PER_TIER} questions... ]
}
Each of "easy", "medium" and "hard" must contain exactly ${QUESTIONS_PER_TIER} questions. Do not add any other keys.
  `.trim();
}
