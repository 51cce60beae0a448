import * as path from "path";
import { ExecutionContext, ScoreMode, ScoreTable } from "./types";
import { BUNDLE_TESTS_DIR } from "./constants";
import { describeError } from "./errors";
import { loadTestFiles } from "./services/test-files";
import { formatTestFileSummary } from "./reporters/test-file-summary";
import * as fsUtils from "./utils/fs-utils";
import { logger } from "./utils/logger";

export interface GradeSubmissionOptions {
  bundleDir: string;
  submissionPath: string;
  resultsPath: string;
  scoreMode: ScoreMode;
}

/**
 * Builds the context test cases run in. The submission module is only
 * required the first time a case asks for it; a load failure fails every
 * case that needs it.
 */
export async function createExecutionContext(
  submissionPath: string
): Promise<ExecutionContext> {
  const resolved = path.resolve(submissionPath);
  const workDir = (await fsUtils.isDirectory(resolved)) ? resolved : path.dirname(resolved);
  let environment: Record<string, unknown> | undefined;
  let loadError: unknown;

  return {
    workDir,
    submissionPath: resolved,
    loadEnvironment: () => {
      if (environment) return environment;
      if (loadError !== undefined) throw loadError;
      try {
        const loaded: unknown = require(resolved);
        environment =
          typeof loaded === "object" && loaded !== null
            ? { ...loaded }
            : { default: loaded };
        return environment;
      } catch (error) {
        loadError = new Error(`Could not load submission: ${describeError(error)}`);
        throw loadError;
      }
    },
  };
}

/**
 * Grades one submission against every test file in the bundle and writes the
 * score table to `resultsPath`
 */
export async function gradeSubmission(options: GradeSubmissionOptions): Promise<ScoreTable> {
  const testFiles = await loadTestFiles(path.join(options.bundleDir, BUNDLE_TESTS_DIR));
  const context = await createExecutionContext(options.submissionPath);
  const scores: ScoreTable = {};

  for (const testFile of testFiles) {
    await testFile.run(context);
    scores[testFile.name] = testFile.score(options.scoreMode);
    logger.log(formatTestFileSummary(testFile.snapshot()));
  }

  await fsUtils.writeFile(options.resultsPath, JSON.stringify(scores, null, 2));
  return scores;
}

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`${name} is not set`);
  }
  return value;
}

// Entry point inside a sandbox
if (require.main === module) {
  Promise.resolve()
    .then(() =>
      gradeSubmission({
        bundleDir: requireEnv("BUNDLE_DIR"),
        submissionPath: requireEnv("SUBMISSION_PATH"),
        resultsPath: requireEnv("RESULTS_PATH"),
        scoreMode: process.env.SCORE_MODE === "points" ? "points" : "fraction",
      })
    )
    .catch((error) => {
      logger.error("Error grading submission:", error);
      process.exit(1);
    });
}
