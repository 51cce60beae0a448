import {
  CompletedJob,
  JobState,
  SandboxOutput,
  SubmissionJob,
} from "../types";
import {
  BatchCancelledError,
  ConfigurationError,
  SandboxExecutionFailure,
  SandboxLaunchError,
  describeError,
} from "../errors";
import { logger } from "../utils/logger";

/**
 * Options handed to a sandbox for one job
 */
export interface SandboxRunOptions {
  /** Aborted on timeout or when the batch is cancelled */
  signal: AbortSignal;
  debug: boolean;
  captureArtifacts: boolean;
}

/**
 * Lifecycle of one sandbox, independent of how it is isolated.
 *
 * `acquire` throws SandboxLaunchError when the infrastructure cannot provide
 * a sandbox at all; that aborts the batch. Any other error fails only the job
 * it belongs to. Every step must give up once `options.signal` aborts, and
 * `run` must not settle while the sandbox is still executing: the handle is
 * released as soon as it does.
 */
export interface SandboxBackend<H> {
  acquire(job: SubmissionJob, options: SandboxRunOptions): Promise<H>;
  run(handle: H, options: SandboxRunOptions): Promise<void>;
  collect(handle: H, options: SandboxRunOptions): Promise<SandboxOutput>;
  release(handle: H): Promise<void>;
  /** Human-readable location of a sandbox, logged when it is kept alive */
  describe?(handle: H): string;
}

export interface PoolOptions {
  concurrency: number;
  /** Skip teardown so sandboxes can be inspected afterwards */
  keepAlive?: boolean;
  debug?: boolean;
  captureArtifacts?: boolean;
  /** Wall-clock limit per job */
  timeoutMs?: number;
  /** Aborting it cancels the whole batch */
  signal?: AbortSignal;
  onJobStateChange?: (job: SubmissionJob) => void;
}

type JobOutcome =
  | { kind: "done"; completed: CompletedJob }
  | { kind: "fatal"; error: Error };

function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(resolve, reject).finally(() => {
      signal.removeEventListener("abort", onAbort);
    });
  });
}

/**
 * Runs submission jobs in sandboxes with at most `concurrency` of them
 * running at once.
 *
 * Jobs start in the order given and the next one starts as soon as any slot
 * frees up, so completions come back in whatever order jobs finish. A failing
 * submission is reported as a failed CompletedJob; only a launch error or
 * cancellation ends the batch early.
 */
export class SandboxPool<H> {
  constructor(private readonly backend: SandboxBackend<H>) {}

  async *submit(
    jobs: readonly SubmissionJob[],
    options: PoolOptions
  ): AsyncGenerator<CompletedJob, void, undefined> {
    const { concurrency } = options;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(
        `Concurrency limit must be a positive integer, got ${concurrency}`
      );
    }
    if (options.signal?.aborted) {
      throw new BatchCancelledError(describeError(options.signal.reason));
    }

    const batch = new AbortController();
    let fatal: Error | undefined;
    const abortBatch = (error: Error) => {
      if (fatal) return;
      fatal = error;
      batch.abort(error);
    };
    const onExternalAbort = () =>
      abortBatch(new BatchCancelledError(describeError(options.signal?.reason)));
    options.signal?.addEventListener("abort", onExternalAbort, { once: true });

    const queue = [...jobs];
    const freeSlots = Array.from({ length: concurrency }, (_, i) => i);
    const running = new Map<number, Promise<{ slot: number; outcome: JobOutcome }>>();

    try {
      while (queue.length > 0 || running.size > 0) {
        while (!fatal && queue.length > 0 && freeSlots.length > 0) {
          const job = queue.shift();
          const slot = freeSlots.shift();
          if (job === undefined || slot === undefined) break;
          running.set(
            slot,
            this.runJob(job, slot, batch.signal, options).then((outcome) => ({
              slot,
              outcome,
            }))
          );
        }
        if (running.size === 0) break;

        // Wake up on whichever job finishes first
        const { slot, outcome } = await Promise.race(running.values());
        running.delete(slot);
        freeSlots.push(slot);
        freeSlots.sort((a, b) => a - b);

        if (outcome.kind === "fatal") {
          abortBatch(outcome.error);
        } else if (!fatal) {
          yield outcome.completed;
        }
      }

      if (fatal) throw fatal;
    } finally {
      options.signal?.removeEventListener("abort", onExternalAbort);
      if (running.size > 0) {
        // The consumer stopped early; tear down whatever is still running
        abortBatch(new BatchCancelledError("grading stopped before all jobs finished"));
        await Promise.allSettled(running.values());
      }
    }
  }

  private setState(
    job: SubmissionJob,
    state: JobState,
    options: PoolOptions
  ): void {
    job.state = state;
    if (state === "running") job.startedAt = Date.now();
    if (state === "completed" || state === "failed") job.finishedAt = Date.now();
    options.onJobStateChange?.(job);
  }

  /**
   * Runs one job from acquire to release. Never rejects: launch errors come
   * back as "fatal" outcomes, everything else as a CompletedJob.
   */
  private async runJob(
    job: SubmissionJob,
    slot: number,
    batchSignal: AbortSignal,
    options: PoolOptions
  ): Promise<JobOutcome> {
    const controller = new AbortController();
    const onBatchAbort = () => controller.abort(batchSignal.reason);
    batchSignal.addEventListener("abort", onBatchAbort, { once: true });

    const timeoutMs = options.timeoutMs;
    const timer =
      timeoutMs !== undefined
        ? setTimeout(
            () =>
              controller.abort(
                new SandboxExecutionFailure(`Sandbox timed out after ${timeoutMs}ms`, job.id)
              ),
            timeoutMs
          )
        : undefined;

    const runOptions: SandboxRunOptions = {
      signal: controller.signal,
      debug: options.debug ?? false,
      captureArtifacts: options.captureArtifacts ?? false,
    };

    job.slot = slot;
    this.setState(job, "running", options);
    logger.info(`Grading ${job.id} in slot ${slot}`);
    const startTime = Date.now();
    let sandbox: { handle: H } | undefined;
    // Steps still executing when the job gave up waiting on them
    const inFlight: Promise<unknown>[] = [];

    try {
      // Not raced against the signal: a handle that arrives late must still be released
      sandbox = { handle: await this.backend.acquire(job, runOptions) };
      const running = this.backend.run(sandbox.handle, runOptions);
      inFlight.push(running);
      await untilAborted(running, controller.signal);
      const collecting = this.backend.collect(sandbox.handle, runOptions);
      inFlight.push(collecting);
      const output = await untilAborted(collecting, controller.signal);

      this.setState(job, "completed", options);
      const durationMs = Date.now() - startTime;
      logger.info(`Completed ${job.id} in ${(durationMs / 1000).toFixed(1)}s`);
      if (runOptions.debug && output.logs) {
        logger.log(`--- Sandbox output for ${job.id} ---\n${output.logs}`);
      }

      return {
        kind: "done",
        completed: {
          job,
          scores: output.scores,
          logs: runOptions.debug ? output.logs : undefined,
          artifacts: output.artifacts,
          durationMs,
        },
      };
    } catch (error) {
      this.setState(job, "failed", options);
      if (error instanceof SandboxLaunchError && !batchSignal.aborted) {
        logger.error(`Could not launch a sandbox for ${job.id}: ${error.message}`);
        return { kind: "fatal", error };
      }

      const diagnostic = describeError(error);
      const output = error instanceof SandboxExecutionFailure ? error.output : undefined;
      if (!batchSignal.aborted) {
        logger.warn(`Grading failed for ${job.id}: ${diagnostic}`);
      }
      if (runOptions.debug && output) {
        logger.log(`--- Sandbox output for ${job.id} ---\n${output}`);
      }

      return {
        kind: "done",
        completed: {
          job,
          scores: {},
          diagnostic,
          logs: runOptions.debug ? output : undefined,
          durationMs: Date.now() - startTime,
        },
      };
    } finally {
      clearTimeout(timer);
      batchSignal.removeEventListener("abort", onBatchAbort);
      await Promise.allSettled(inFlight);
      if (sandbox) {
        await this.releaseSandbox(job, sandbox.handle, options);
      }
    }
  }

  private async releaseSandbox(
    job: SubmissionJob,
    handle: H,
    options: PoolOptions
  ): Promise<void> {
    if (options.keepAlive) {
      const location = this.backend.describe?.(handle);
      logger.log(
        location
          ? `Keeping sandbox for ${job.id} at ${location}`
          : `Keeping sandbox for ${job.id}`
      );
      return;
    }
    try {
      await this.backend.release(handle);
    } catch (error) {
      logger.error(`Failed to release sandbox for ${job.id}:`, error);
    }
  }
}
