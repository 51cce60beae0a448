export const FINAL_GRADES_FILENAME = "final_grades.csv";

/** Column holding the submission filename */
export const FILE_COLUMN = "file";
/** Column holding the resolved student identifier */
export const IDENTIFIER_COLUMN = "identifier";

/** Subdirectory of an autograder bundle holding its test files */
export const BUNDLE_TESTS_DIR = "tests";
/** File the in-sandbox grader writes its score table to */
export const RESULTS_FILENAME = "results.json";
/** Sandbox subdirectory whose contents are copied out as artifacts */
export const ARTIFACTS_DIRNAME = "artifacts";

export const DEFAULT_JOB_TIMEOUT_MS = 120000;
export const DEFAULT_CASE_TIMEOUT_MS = 10000;
/** stdout/stderr buffer of a sandbox command */
export const SANDBOX_MAX_BUFFER = 1024 * 1024 * 4;

/** Tolerance used when comparing allocated point sums */
export const POINT_TOLERANCE = 1e-9;
