import { TestCaseResult, TestFileSnapshot } from "../types";

function formatPoints(points: number): string {
  return Number.isInteger(points) ? String(points) : points.toFixed(2);
}

function formatCase(result: TestCaseResult, showHidden: boolean): string {
  const { testCase } = result;
  if (testCase.hidden && !showHidden) {
    return `  ${testCase.name}: hidden`;
  }
  const mark = result.passed ? "passed" : "failed";
  const line = `  ${testCase.name}: ${mark} (${formatPoints(result.points)}/${formatPoints(testCase.points)})`;
  if (result.passed || !result.message) return line;
  const detail = result.message
    .split("\n")
    .map((l) => `    ${l}`)
    .join("\n");
  return `${line}\n${detail}`;
}

/**
 * Plain-text result of a graded test file.
 * Hidden cases are only named unless `showHidden` is set.
 */
export function formatTestFileSummary(
  snapshot: TestFileSnapshot,
  showHidden = false
): string {
  if (snapshot.grade === null) {
    return `${snapshot.name} has not been run`;
  }
  if (snapshot.passedAll) {
    return `${snapshot.name} passed!`;
  }
  const header = `${snapshot.name} results: ${formatPoints(
    snapshot.grade * snapshot.value
  )}/${formatPoints(snapshot.value)} points`;
  return [header, ...snapshot.results.map((r) => formatCase(r, showHidden))].join("\n");
}
