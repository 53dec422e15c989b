import type { Difficulty } from "../types";

/**
 * Run-scoped record of how often each category has been used per tier.
 *
 * One tracker is created at run start and passed to every selection; nothing
 * about category history lives in module state.
 */
export class CoverageTracker {
  readonly catalog: readonly string[];
  private counts: Record<Difficulty, Map<string, number>>;

  constructor(catalog: readonly string[]) {
    if (catalog.length === 0) {
      throw new Error("Category catalog must not be empty");
    }
    this.catalog = Array.from(new Set(catalog));
    this.counts = CoverageTracker.emptyCounts(this.catalog);
  }

  private static emptyCounts(
    catalog: readonly string[],
  ): Record<Difficulty, Map<string, number>> {
    const zeroed = () => new Map(catalog.map((c): [string, number] => [c, 0]));
    return { easy: zeroed(), medium: zeroed(), hard: zeroed() };
  }

  useCount(difficulty: Difficulty, category: string): number {
    return this.counts[difficulty].get(category) ?? 0;
  }

  /** Lowest use count among all catalog categories for the tier. */
  minUseCount(difficulty: Difficulty): number {
    return Math.min(...this.counts[difficulty].values());
  }

  /** Categories currently at the tier's lowest use count, in catalog order. */
  leastUsed(difficulty: Difficulty): string[] {
    const min = this.minUseCount(difficulty);
    return this.catalog.filter((c) => this.useCount(difficulty, c) === min);
  }

  record(difficulty: Difficulty, category: string): void {
    const tierCounts = this.counts[difficulty];
    if (!tierCounts.has(category)) {
      throw new Error(`Unknown category "${category}"`);
    }
    tierCounts.set(category, (tierCounts.get(category) ?? 0) + 1);
  }

  snapshot(): Record<Difficulty, Record<string, number>> {
    const tier = (difficulty: Difficulty) =>
      Object.fromEntries(this.counts[difficulty]);
    return { easy: tier("easy"), medium: tier("medium"), hard: tier("hard") };
  }

  reset(): void {
    this.counts = CoverageTracker.emptyCounts(this.catalog);
  }
}
