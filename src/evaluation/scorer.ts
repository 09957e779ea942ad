import { errorMessage, EvaluationError } from "../errors.js";
import type { Case, CriterionScore, EvaluationResult, Trajectory } from "../types.js";

import type { FaultAttributor } from "./faultAttribution.js";

export type CriterionContext = {
  readonly trajectory: Trajectory;
  readonly caseData: Case;
  readonly signal?: AbortSignal;
};

export type RubricCriterion = {
  readonly id: string;
  readonly description: string;
  /** Non-negative; weights are normalized by their sum. */
  readonly weight: number;
  /** Returns a value in [0, 1]; out-of-range values are clamped. */
  readonly score: (context: CriterionContext) => number | Promise<number>;
};

export type Rubric = readonly RubricCriterion[];

export function defineRubric(criteria: readonly RubricCriterion[]): Rubric {
  const ids = new Set<string>();
  for (const criterion of criteria) {
    if (ids.has(criterion.id)) {
      throw new Error(`Duplicate rubric criterion id: ${criterion.id}`);
    }
    if (!Number.isFinite(criterion.weight) || criterion.weight < 0) {
      throw new Error(`Rubric criterion ${criterion.id} has invalid weight ${criterion.weight}`);
    }
    ids.add(criterion.id);
  }
  return Object.freeze([...criteria]);
}

function compareIds(a: { readonly id: string }, b: { readonly id: string }): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

async function scoreCriterion(
  criterion: RubricCriterion,
  context: CriterionContext,
): Promise<CriterionScore> {
  const base = { id: criterion.id, description: criterion.description, weight: criterion.weight };
  try {
    const raw = await criterion.score(context);
    if (!Number.isFinite(raw)) {
      throw new EvaluationError(criterion.id, `Criterion ${criterion.id} returned ${raw}`);
    }
    return { ...base, score: Math.min(1, Math.max(0, raw)) };
  } catch (error) {
    if (context.signal?.aborted) {
      throw error;
    }
    const failure =
      error instanceof EvaluationError
        ? error
        : new EvaluationError(criterion.id, errorMessage(error), { cause: error });
    return { ...base, score: 0, error: failure.message };
  }
}

/**
 * Scores every criterion independently and combines them as Σ(wᵢ·sᵢ) / Σwᵢ. Scores are
 * reported and summed in criterion-id order, so the result does not depend on rubric order.
 * A criterion that throws scores 0 and records its error.
 */
export async function scoreTrajectory(
  trajectory: Trajectory,
  caseData: Case,
  rubric: Rubric,
  options: { readonly signal?: AbortSignal } = {},
): Promise<EvaluationResult> {
  const criteria = defineRubric(rubric);
  const context: CriterionContext = { trajectory, caseData, signal: options.signal };
  const scored = await Promise.all(criteria.map((criterion) => scoreCriterion(criterion, context)));
  const scores = scored.sort(compareIds);
  let weightSum = 0;
  let weighted = 0;
  for (const entry of scores) {
    weightSum += entry.weight;
    weighted += entry.weight * entry.score;
  }
  return {
    caseId: trajectory.caseId,
    scores,
    weightedTotal: weightSum > 0 ? weighted / weightSum : 0,
  };
}

export type EvaluateOptions = {
  readonly rubric: Rubric;
  readonly attribution?: FaultAttributor;
  /** `null` disables attribution. */
  readonly attributionThreshold: number | null;
  readonly signal?: AbortSignal;
};

export function needsAttribution(
  trajectory: Trajectory,
  weightedTotal: number,
  threshold: number | null,
): boolean {
  if (threshold === null) {
    return false;
  }
  return trajectory.status !== "completed" || weightedTotal < threshold;
}

/** Scores, then runs the advisory fault attribution when the trajectory fell short. */
export async function evaluateTrajectory(
  trajectory: Trajectory,
  caseData: Case,
  options: EvaluateOptions,
): Promise<EvaluationResult> {
  const result = await scoreTrajectory(trajectory, caseData, options.rubric, {
    signal: options.signal,
  });
  if (
    !options.attribution ||
    !needsAttribution(trajectory, result.weightedTotal, options.attributionThreshold)
  ) {
    return result;
  }
  try {
    const faultAttribution = await options.attribution.attribute({
      trajectory,
      caseData,
      weightedTotal: result.weightedTotal,
      signal: options.signal,
    });
    return { ...result, faultAttribution };
  } catch (error) {
    if (options.signal?.aborted) {
      throw error;
    }
    return { ...result, attributionError: errorMessage(error) };
  }
}
