import {
  DIFFICULTY_TIERS,
  type AllocationError,
  type AllocationResult,
  type Cell,
  type DifficultyTier,
  type PaperConfig,
  type SectionSpec
} from "../../domain/models.js";

const FRACTION_EPSILON = 1e-6;

/** Binary floating error (0.29 * 100 = 28.999...) must not cost a unit when flooring. */
const PRODUCT_PRECISION = 1e9;

export type TierCounts = Record<DifficultyTier, number>;

export type TierResolution =
  | { ok: true; counts: TierCounts }
  | { ok: false; errors: AllocationError[] };

/**
 * Splits `total` into integers proportional to `weights` that sum exactly to
 * `total`. Floors first, then hands out the remainder by largest fractional
 * part; equal fractional parts go to the lower index.
 */
export function largestRemainder(total: number, weights: readonly number[]): number[] {
  if (weights.length === 0) {
    return [];
  }

  const weightSum = weights.reduce((sum, weight) => sum + weight, 0);
  if (weightSum <= 0) {
    return weights.map(() => 0);
  }

  const exact = weights.map(
    (weight) => Math.round(((total * weight) / weightSum) * PRODUCT_PRECISION) / PRODUCT_PRECISION
  );
  const shares = exact.map((value) => Math.floor(value));
  let remainder = total - shares.reduce((sum, share) => sum + share, 0);

  const order = exact
    .map((value, index) => ({ index, fraction: value - Math.floor(value) }))
    .sort((left, right) => right.fraction - left.fraction || left.index - right.index);

  for (const entry of order) {
    if (remainder <= 0) {
      break;
    }
    shares[entry.index] += 1;
    remainder -= 1;
  }

  return shares;
}

export function resolveTierCounts(section: SectionSpec): TierResolution {
  const errors: AllocationError[] = [];
  const fail = (code: AllocationError["code"], message: string) =>
    errors.push({ sectionName: section.name, code, message });

  if (!Number.isInteger(section.questionCount) || section.questionCount <= 0) {
    fail(
      "invalid_question_count",
      `Section "${section.name}" must request a positive whole number of questions (got ${section.questionCount}).`
    );
  }

  const distribution = section.difficulty;
  let counts: TierCounts = { Easy: 0, Medium: 0, Hard: 0 };

  if (distribution.kind === "fractions") {
    const fractions = DIFFICULTY_TIERS.map((tier) => distribution.fractions[tier] ?? 0);

    fractions.forEach((fraction, index) => {
      if (!Number.isFinite(fraction) || fraction < 0 || fraction > 1) {
        fail(
          "invalid_fraction",
          `Section "${section.name}" has ${DIFFICULTY_TIERS[index]} fraction ${fraction}; fractions must lie in [0, 1].`
        );
      }
    });

    const fractionSum = fractions.reduce((sum, fraction) => sum + fraction, 0);
    if (Math.abs(fractionSum - 1) > FRACTION_EPSILON) {
      fail(
        "fractions_not_normalized",
        `Section "${section.name}" difficulty fractions sum to ${fractionSum}, expected 1.`
      );
    }

    if (errors.length === 0) {
      const shares = largestRemainder(section.questionCount, fractions);
      counts = { Easy: shares[0], Medium: shares[1], Hard: shares[2] };
    }
  } else {
    const values = DIFFICULTY_TIERS.map((tier) => distribution.counts[tier] ?? 0);

    values.forEach((value, index) => {
      if (!Number.isInteger(value) || value < 0) {
        fail(
          "invalid_count",
          `Section "${section.name}" has ${DIFFICULTY_TIERS[index]} count ${value}; counts must be non-negative integers.`
        );
      }
    });

    const countSum = values.reduce((sum, value) => sum + value, 0);
    if (countSum !== section.questionCount) {
      fail(
        "counts_mismatch",
        `Section "${section.name}" difficulty counts sum to ${countSum}, expected ${section.questionCount}.`
      );
    }

    counts = { Easy: values[0], Medium: values[1], Hard: values[2] };
  }

  if (section.topics.length === 0 && section.questionCount > 0) {
    fail("no_topics", `Section "${section.name}" requests ${section.questionCount} question(s) but lists no topics.`);
  }

  return errors.length > 0 ? { ok: false, errors } : { ok: true, counts };
}

export function allocate(config: PaperConfig): AllocationResult {
  const cells: Cell[] = [];
  const errors: AllocationError[] = [];

  config.sections.forEach((section, sectionIndex) => {
    const resolution = resolveTierCounts(section);
    if (!resolution.ok) {
      errors.push(...resolution.errors);
      return;
    }

    const topicWeights = section.topics.map(() => 1);
    const perTier = DIFFICULTY_TIERS.map((tier) => largestRemainder(resolution.counts[tier], topicWeights));

    section.topics.forEach((topic, topicIndex) => {
      DIFFICULTY_TIERS.forEach((tier, tierIndex) => {
        const targetCount = perTier[tierIndex][topicIndex];
        if (targetCount === 0) {
          return;
        }

        cells.push({
          id: `${sectionIndex}:${topicIndex}:${tier}`,
          sectionIndex,
          sectionName: section.name,
          topicIndex,
          topic,
          difficulty: tier,
          targetCount
        });
      });
    });
  });

  const sectionTotal = config.sections.reduce((sum, section) => sum + section.questionCount, 0);
  if (config.declaredTotal !== undefined && config.declaredTotal !== sectionTotal) {
    errors.push({
      sectionName: null,
      code: "declared_total_mismatch",
      message: `Paper declares ${config.declaredTotal} question(s) but its sections request ${sectionTotal}.`
    });
  }

  return { cells, errors };
}
