import seedrandom from "seedrandom";
import { QUESTIONS_PER_TIER } from "../types";
import type { CategoriesByDifficulty, Difficulty } from "../types";
import type { CoverageTracker } from "./coverage";

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

/**
 * Random source for category selection. Seeded runs are reproducible.
 */
export function createRandomSource(seed?: string): RandomSource {
  if (seed === undefined) return Math.random;
  const prng = seedrandom(seed);
  return () => prng();
}

/**
 * Pick `count` categories for one tier.
 *
 * Every pick comes from the categories with the lowest use count for the tier,
 * so a category is never repeated before all others have been used. Within the
 * batch, categories not picked yet are preferred. A `count` larger than the
 * catalog is allowed and repeats.
 *
 * Records every pick on the tracker.
 */
export function selectCategories(
  difficulty: Difficulty,
  tracker: CoverageTracker,
  options: { count?: number; random?: RandomSource } = {},
): string[] {
  const { count = QUESTIONS_PER_TIER, random = Math.random } = options;
  const picked: string[] = [];

  for (let i = 0; i < count; i++) {
    const leastUsed = tracker.leastUsed(difficulty);
    const fresh = leastUsed.filter((c) => !picked.includes(c));
    const pool = fresh.length > 0 ? fresh : leastUsed;
    const idx = Math.min(pool.length - 1, Math.floor(random() * pool.length));
    const choice = pool[idx];

    picked.push(choice);
    tracker.record(difficulty, choice);
  }

  return picked;
}

export function selectCategoriesForAlbum(
  tracker: CoverageTracker,
  options: { count?: number; random?: RandomSource } = {},
): CategoriesByDifficulty {
  return {
    easy: selectCategories("easy", tracker, options),
    medium: selectCategories("medium", tracker, options),
    hard: selectCategories("hard", tracker, options),
  };
}
