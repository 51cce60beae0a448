import { setTimeout as sleep } from "timers/promises";
import { SandboxBackend, SandboxRunOptions } from "../../src/services/sandbox-pool";
import { SandboxOutput, ScoreTable, SubmissionJob } from "../../src/types";
import { SandboxExecutionFailure, SandboxLaunchError } from "../../src/errors";

export interface FakeBehaviour {
  delayMs?: number;
  scores?: ScoreTable;
  /** Fail the run the way a crashed sandbox would */
  crash?: boolean;
  /** Fail acquisition the way missing infrastructure would */
  launchError?: boolean;
  logs?: string;
}

export interface FakeHandle {
  job: SubmissionJob;
  behaviour: FakeBehaviour;
}

/**
 * In-process sandbox backend that records what the pool asks of it
 */
export class FakeSandbox implements SandboxBackend<FakeHandle> {
  readonly acquired: string[] = [];
  readonly released: string[] = [];
  running = 0;
  maxRunning = 0;

  constructor(private readonly behaviours: Record<string, FakeBehaviour> = {}) {}

  async acquire(job: SubmissionJob): Promise<FakeHandle> {
    const behaviour = this.behaviours[job.id] ?? {};
    if (behaviour.launchError) {
      await sleep(5);
      throw new SandboxLaunchError(`Image for ${job.id} is missing`, job.id);
    }
    this.acquired.push(job.id);
    this.running++;
    this.maxRunning = Math.max(this.maxRunning, this.running);
    return { job, behaviour };
  }

  async run(handle: FakeHandle, options: SandboxRunOptions): Promise<void> {
    await sleep(handle.behaviour.delayMs ?? 5, undefined, { signal: options.signal });
    if (handle.behaviour.crash) {
      throw new SandboxExecutionFailure("Sandbox exited with code 1", handle.job.id, "Traceback");
    }
  }

  async collect(handle: FakeHandle): Promise<SandboxOutput> {
    return {
      scores: handle.behaviour.scores ?? { q1: 1 },
      logs: handle.behaviour.logs ?? `graded ${handle.job.id}`,
    };
  }

  async release(handle: FakeHandle): Promise<void> {
    this.running--;
    this.released.push(handle.job.id);
  }

  describe(handle: FakeHandle): string {
    return `fake://${handle.job.id}`;
  }
}

export function makeJobs(ids: string[]): SubmissionJob[] {
  return ids.map((id, index) => ({
    id,
    path: `/submissions/${id}`,
    index,
    state: "queued",
  }));
}
