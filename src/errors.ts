/**
 * Error taxonomy for the grading pipeline.
 *
 * Allocation, launch, aggregation and configuration errors are fatal for the
 * whole batch. SandboxExecutionFailure stays local to one submission and is
 * turned into a zero-score row by the pool.
 */
export class GraderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends GraderError {}

/**
 * Point budget of a test file is violated or cannot be split
 */
export class AllocationError extends GraderError {
  constructor(message: string, public readonly testFile?: string) {
    super(testFile ? `${message}: ${testFile}` : message);
  }
}

/**
 * Explicit case points add up to more than the test file's total value
 */
export class OverallocatedError extends AllocationError {
  constructor(
    testFile: string | undefined,
    public readonly specified: number,
    public readonly totalValue: number
  ) {
    super(
      `Individual test case point values (${specified}) exceed total question value (${totalValue})`,
      testFile
    );
  }
}

/**
 * The sandbox infrastructure could not provision an environment
 */
export class SandboxLaunchError extends GraderError {
  constructor(message: string, public readonly submission?: string) {
    super(message);
  }
}

/**
 * A single submission's sandbox crashed, timed out or exited abnormally
 */
export class SandboxExecutionFailure extends GraderError {
  constructor(
    message: string,
    public readonly submission: string,
    public readonly output?: string
  ) {
    super(message);
  }
}

export class BatchCancelledError extends GraderError {
  constructor(reason?: string) {
    super(reason ? `Grading batch cancelled: ${reason}` : "Grading batch cancelled");
  }
}

export class AggregationError extends GraderError {}

export class AggregationSchemaError extends AggregationError {}

export class IdentifierResolutionError extends AggregationError {
  constructor(public readonly filename: string, cause?: string) {
    super(
      cause
        ? `No identifier found for submission ${filename}: ${cause}`
        : `No identifier found for submission ${filename}`
    );
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
