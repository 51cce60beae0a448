/**
 * Values a test case body can see while it runs
 */
export interface ExecutionContext {
  /** Directory the submission was unpacked into */
  workDir: string;
  /** Path of the submission file or directory */
  submissionPath: string;
  /** Loads (once) and returns the submission module's exports */
  loadEnvironment: () => Record<string, unknown>;
}

export type CaseFunction = (env: Record<string, unknown>) => unknown;

/**
 * Executable part of a test case. Opaque to point allocation and grading.
 */
export type TestCaseBody =
  | { kind: "function"; run: CaseFunction }
  | { kind: "command"; command: string };

export interface TestCase {
  readonly name: string;
  readonly body: TestCaseBody;
  readonly hidden: boolean;
  readonly successMessage?: string;
  readonly failureMessage?: string;
  readonly points: number | null;
  /** Per-case time limit in milliseconds */
  readonly timeoutMs?: number;
}

export interface ResolvedTestCase extends TestCase {
  readonly points: number;
}

export interface TestCaseResult {
  readonly testCase: ResolvedTestCase;
  readonly passed: boolean;
  readonly message: string;
  /** Points earned for this case */
  readonly points: number;
}

export type TestFileFormat = "json" | "module";

export type TestFileStatus =
  | "not_run"
  | "running"
  | "passed_all"
  | "partial"
  | "failed_all";

export type ScoreMode = "fraction" | "points";

/**
 * Frozen view of a test file after grading, handed to reporters
 */
export interface TestFileSnapshot {
  readonly name: string;
  readonly path: string;
  readonly status: TestFileStatus;
  readonly grade: number | null;
  readonly passedAll: boolean | null;
  readonly value: number;
  readonly results: readonly TestCaseResult[];
}

/**
 * Scores of one submission keyed by test file name
 */
export type ScoreTable = Record<string, number>;

export type JobState = "queued" | "running" | "completed" | "failed";

export interface SubmissionJob {
  /** Submission filename, used as the row key */
  id: string;
  path: string;
  /** Position in discovery order */
  index: number;
  state: JobState;
  slot?: number;
  startedAt?: number;
  finishedAt?: number;
}

/**
 * What a sandbox hands back after a submission has been graded
 */
export interface SandboxOutput {
  scores: ScoreTable;
  logs?: string;
  artifacts?: string[];
}

export interface CompletedJob {
  job: SubmissionJob;
  scores: ScoreTable;
  /** Failure detail when the job ended in the failed state */
  diagnostic?: string;
  logs?: string;
  artifacts?: string[];
  durationMs: number;
}

export type GradeCell = string | number;

export interface FinalGradeTable {
  columns: string[];
  rows: Record<string, GradeCell>[];
}

export interface SubmissionScores {
  submission: string;
  scores: ScoreTable;
}
