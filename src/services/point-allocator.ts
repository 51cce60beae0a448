import { AllocationError, OverallocatedError } from "../errors";
import { ResolvedTestCase, TestCase } from "../types";
import { POINT_TOLERANCE } from "../constants";

export function sumPoints(points: readonly (number | null)[]): number {
  return points.reduce<number>((total, p) => total + (p ?? 0), 0);
}

/**
 * Resolves the weight of every test case of a test file from its total value.
 *
 * Explicit case points are kept. Whatever is left of `totalValue` is split
 * evenly over the cases that have no points of their own. The input array is
 * not modified; a new array is built by replacing entries by index.
 *
 * @param totalValue Total point value of the test file
 * @param cases Cases in declared order
 * @param context Test file name, used in error messages
 * @returns Cases with `points` filled in, in the same order
 */
export function resolvePointValues(
  totalValue: number,
  cases: readonly TestCase[],
  context?: string
): ResolvedTestCase[] {
  if (!Number.isFinite(totalValue) || totalValue <= 0) {
    throw new AllocationError(
      `Total value must be a positive number, got ${totalValue}`,
      context
    );
  }
  if (cases.length === 0) {
    throw new AllocationError("Test file has no test cases to allocate points to", context);
  }

  for (const c of cases) {
    if (c.points !== null && (!Number.isFinite(c.points) || c.points < 0)) {
      throw new AllocationError(
        `Test case ${c.name} has invalid points ${c.points}`,
        context
      );
    }
  }

  const specified = sumPoints(cases.map((c) => c.points));
  if (specified > totalValue + POINT_TOLERANCE) {
    throw new OverallocatedError(context, specified, totalValue);
  }

  const remaining = totalValue - specified;
  const unspecified = cases.filter((c) => c.points === null).length;

  if (unspecified === 0) {
    if (Math.abs(remaining) > POINT_TOLERANCE) {
      throw new AllocationError(
        `Test case points sum to ${specified} but the total value is ${totalValue} and no case is left to take the remaining ${remaining}`,
        context
      );
    }
    return cases.map((c) => ({ ...c, points: c.points ?? 0 }));
  }

  const perCase = remaining / unspecified;
  return cases.map((c) => ({ ...c, points: c.points ?? perCase }));
}
