import {
  ExecutionContext,
  ResolvedTestCase,
  ScoreMode,
  TestCaseResult,
  TestFileFormat,
  TestFileSnapshot,
  TestFileStatus,
} from "../types";
import { GraderError, describeError } from "../errors";
import { resolvePointValues } from "./point-allocator";
import { ParsedTestFile, TEST_FILE_HANDLERS } from "./test-formats";

/**
 * A single test file: an ordered set of test cases graded together into one
 * score column.
 *
 * Weights are resolved from `value` when the file is constructed, so an
 * over-allocated file fails before anything runs. `run` grades the file once;
 * afterwards the file is read-only.
 */
export class TestFile {
  readonly name: string;
  readonly path: string;
  readonly format: TestFileFormat;
  readonly value: number;
  readonly allOrNothing: boolean;
  readonly testCases: readonly ResolvedTestCase[];

  private _status: TestFileStatus = "not_run";
  private _results: readonly TestCaseResult[] = [];
  private _grade: number | null = null;
  private _passedAll: boolean | null = null;

  constructor(parsed: ParsedTestFile) {
    this.name = parsed.name;
    this.path = parsed.path;
    this.format = parsed.format;
    this.value = parsed.value;
    this.allOrNothing = parsed.allOrNothing;
    this.testCases = Object.freeze(
      resolvePointValues(parsed.value, parsed.cases, parsed.name)
    );
  }

  /** Resolved point value of each case, in declared order */
  get values(): number[] {
    return this.testCases.map((c) => c.points);
  }

  get status(): TestFileStatus {
    return this._status;
  }

  get results(): readonly TestCaseResult[] {
    return this._results;
  }

  /** Fraction of `value` earned, or null before the file has run */
  get grade(): number | null {
    return this._grade;
  }

  get passedAll(): boolean | null {
    return this._passedAll;
  }

  /**
   * Runs every case in declared order. A case that throws, rejects or times
   * out is recorded as failed and the remaining cases still run.
   */
  async run(context: ExecutionContext): Promise<void> {
    if (this._status !== "not_run") {
      throw new GraderError(`Test file ${this.name} has already been run`);
    }
    this._status = "running";

    const handler = TEST_FILE_HANDLERS[this.format];
    const outcomes: { testCase: ResolvedTestCase; passed: boolean; message: string }[] = [];

    for (const testCase of this.testCases) {
      try {
        await handler.execute(testCase, context);
        outcomes.push({
          testCase,
          passed: true,
          message: testCase.successMessage ?? `${testCase.name} passed`,
        });
      } catch (error) {
        outcomes.push({
          testCase,
          passed: false,
          message: [testCase.failureMessage, describeError(error)]
            .filter((part): part is string => Boolean(part))
            .join("\n"),
        });
      }
    }

    const passedAll = outcomes.every((o) => o.passed);
    // Under all-or-nothing no case earns anything unless every case passed
    const creditable = !this.allOrNothing || passedAll;

    this._results = Object.freeze(
      outcomes.map((o) =>
        Object.freeze({
          testCase: o.testCase,
          passed: o.passed,
          message: o.message,
          points: creditable && o.passed ? o.testCase.points : 0,
        })
      )
    );

    if (this.allOrNothing) {
      this._grade = passedAll ? 1 : 0;
    } else {
      const earned = this._results.reduce((total, r) => total + r.points, 0);
      this._grade = earned / this.value;
    }
    this._passedAll = passedAll;
    this._status = passedAll ? "passed_all" : this._grade === 0 ? "failed_all" : "partial";
  }

  /**
   * Score reported for this file: the grade itself, or the points it is worth
   */
  score(mode: ScoreMode): number {
    if (this._grade === null) {
      throw new GraderError(`Test file ${this.name} has not been run`);
    }
    return mode === "points" ? this._grade * this.value : this._grade;
  }

  snapshot(): TestFileSnapshot {
    return Object.freeze({
      name: this.name,
      path: this.path,
      status: this._status,
      grade: this._grade,
      passedAll: this._passedAll,
      value: this.value,
      results: this._results,
    });
  }
}
