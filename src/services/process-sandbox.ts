import * as os from "os";
import * as path from "path";
import { spawn } from "child_process";
import { pathToFileURL } from "url";
import { SandboxBackend, SandboxRunOptions } from "./sandbox-pool";
import { SandboxOutput, ScoreMode, ScoreTable, SubmissionJob } from "../types";
import {
  ARTIFACTS_DIRNAME,
  RESULTS_FILENAME,
  SANDBOX_MAX_BUFFER,
} from "../constants";
import {
  SandboxExecutionFailure,
  SandboxLaunchError,
  describeError,
} from "../errors";
import * as fsUtils from "../utils/fs-utils";
import { logger } from "../utils/logger";

export interface ProcessSandboxOptions {
  /** Autograder bundle copied into every sandbox */
  bundleDir: string;
  /** Shell command line run inside the sandbox */
  command: string;
  /** Parent directory for sandbox directories */
  workDir?: string;
  scoreMode: ScoreMode;
  /** Where captured artifacts are copied to, one subdirectory per submission */
  artifactsDir?: string;
}

export interface ProcessSandboxHandle {
  job: SubmissionJob;
  dir: string;
  submissionPath: string;
  bundleDir: string;
  resultsPath: string;
  artifactsDir: string;
  stdout: string;
  stderr: string;
}

/**
 * Command that runs the bundled in-sandbox grader with the current Node binary
 */
export function defaultSandboxCommand(): string {
  const script = require.resolve("../grader");
  // Sandboxes run outside the project, so the loader is passed by location
  const loader = script.endsWith(".ts")
    ? ` --import "${pathToFileURL(require.resolve("tsx")).href}"`
    : "";
  return `"${process.execPath}"${loader} "${script}"`;
}

interface CommandResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

/**
 * Appends chunks until `limit` characters are held; the rest is dropped
 */
class OutputBuffer {
  private text = "";

  constructor(private readonly limit: number) {}

  append(chunk: string): void {
    if (this.text.length < this.limit) {
      this.text += chunk.slice(0, this.limit - this.text.length);
    }
  }

  toString(): string {
    return this.text;
  }
}

/**
 * SIGKILLs every process in the group led by `pid`
 */
function killProcessGroup(pid: number): void {
  try {
    process.kill(-pid, "SIGKILL");
  } catch (error) {
    // ESRCH: the group is already gone
    if (!(error instanceof Error && "code" in error && error.code === "ESRCH")) {
      logger.error(`Could not kill sandbox process group ${pid}:`, error);
    }
  }
}

/**
 * Runs a shell command line in its own process group. Aborting `signal`
 * kills the whole group, and the promise only settles once the shell has
 * exited and its output streams are closed.
 */
function runCommand(
  command: string,
  options: { cwd: string; env: NodeJS.ProcessEnv; signal: AbortSignal }
): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, {
      cwd: options.cwd,
      env: options.env,
      shell: true,
      detached: true,
      stdio: ["ignore", "pipe", "pipe"],
    });
    const stdout = new OutputBuffer(SANDBOX_MAX_BUFFER);
    const stderr = new OutputBuffer(SANDBOX_MAX_BUFFER);
    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => stdout.append(chunk));
    child.stderr.on("data", (chunk: string) => stderr.append(chunk));

    const onAbort = () => {
      if (child.pid !== undefined) killProcessGroup(child.pid);
    };
    if (options.signal.aborted) {
      onAbort();
    } else {
      options.signal.addEventListener("abort", onAbort, { once: true });
    }

    child.once("error", (error) => {
      options.signal.removeEventListener("abort", onAbort);
      reject(error);
    });
    child.once("close", (code, signal) => {
      options.signal.removeEventListener("abort", onAbort);
      // Background processes the command left behind die with the group
      if (child.pid !== undefined) killProcessGroup(child.pid);
      resolve({ code, signal, stdout: stdout.toString(), stderr: stderr.toString() });
    });
  });
}

function joinOutput(stdout: string, stderr: string): string {
  return [stdout.trim(), stderr.trim()].filter((part) => part !== "").join("\n");
}

function parseScoreTable(raw: unknown, submission: string): ScoreTable {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new SandboxExecutionFailure("Score table must be a JSON object", submission);
  }
  const scores: ScoreTable = {};
  for (const [column, value] of Object.entries(raw)) {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new SandboxExecutionFailure(
        `Score for ${column} is not a number: ${JSON.stringify(value)}`,
        submission
      );
    }
    scores[column] = value;
  }
  return scores;
}

/**
 * Sandboxes submissions in private temporary directories and grades them
 * with a child process.
 *
 * Each sandbox gets its own copy of the submission and of the autograder
 * bundle, so no job can see another job's files.
 */
export class ProcessSandbox implements SandboxBackend<ProcessSandboxHandle> {
  constructor(private readonly options: ProcessSandboxOptions) {}

  async acquire(
    job: SubmissionJob,
    options: SandboxRunOptions
  ): Promise<ProcessSandboxHandle> {
    if (!(await fsUtils.isDirectory(this.options.bundleDir))) {
      throw new SandboxLaunchError(
        `Autograder bundle not found: ${this.options.bundleDir}`,
        job.id
      );
    }
    if (!(await fsUtils.fileExists(job.path))) {
      throw new SandboxExecutionFailure(`Submission not found: ${job.path}`, job.id);
    }

    let dir: string;
    try {
      dir = await fsUtils.createTempDirectory(
        this.options.workDir ?? os.tmpdir(),
        "grader-sandbox-"
      );
    } catch (error) {
      throw new SandboxLaunchError(
        `Could not create a sandbox directory: ${describeError(error)}`,
        job.id
      );
    }

    const handle: ProcessSandboxHandle = {
      job,
      dir,
      submissionPath: path.join(dir, "submission", path.basename(job.path)),
      bundleDir: path.join(dir, "bundle"),
      resultsPath: path.join(dir, RESULTS_FILENAME),
      artifactsDir: path.join(dir, ARTIFACTS_DIRNAME),
      stdout: "",
      stderr: "",
    };

    try {
      options.signal.throwIfAborted();
      await fsUtils.copyPath(job.path, handle.submissionPath);
      options.signal.throwIfAborted();
      await fsUtils.copyPath(this.options.bundleDir, handle.bundleDir);
      options.signal.throwIfAborted();
    } catch (error) {
      await fsUtils.removeDirectory(dir);
      // Timed out or cancelled while copying
      if (options.signal.aborted) throw options.signal.reason;
      throw new SandboxLaunchError(
        `Could not prepare sandbox for ${job.id}: ${describeError(error)}`,
        job.id
      );
    }

    logger.debug(`Prepared sandbox for ${job.id} in ${dir}`);
    return handle;
  }

  async run(handle: ProcessSandboxHandle, options: SandboxRunOptions): Promise<void> {
    let result: CommandResult;
    try {
      result = await runCommand(this.options.command, {
        cwd: handle.dir,
        signal: options.signal,
        env: {
          ...process.env,
          SUBMISSION_PATH: handle.submissionPath,
          BUNDLE_DIR: handle.bundleDir,
          RESULTS_PATH: handle.resultsPath,
          ARTIFACTS_DIR: handle.artifactsDir,
          SCORE_MODE: this.options.scoreMode,
        },
      });
    } catch (error) {
      throw new SandboxLaunchError(
        `Could not start sandbox command: ${describeError(error)}`,
        handle.job.id
      );
    }

    handle.stdout = result.stdout;
    handle.stderr = result.stderr;
    if (options.signal.aborted) {
      throw new SandboxExecutionFailure(
        `Sandbox stopped: ${describeError(options.signal.reason)}`,
        handle.job.id,
        joinOutput(result.stdout, result.stderr)
      );
    }
    if (result.code !== 0) {
      throw new SandboxExecutionFailure(
        result.code !== null
          ? `Sandbox exited with code ${result.code}`
          : `Sandbox was killed by ${result.signal ?? "a signal"}`,
        handle.job.id,
        joinOutput(result.stdout, result.stderr)
      );
    }
  }

  async collect(
    handle: ProcessSandboxHandle,
    options: SandboxRunOptions
  ): Promise<SandboxOutput> {
    const logs = joinOutput(handle.stdout, handle.stderr);
    let raw: unknown;
    try {
      raw = JSON.parse(await fsUtils.readFile(handle.resultsPath));
    } catch (error) {
      throw new SandboxExecutionFailure(
        `Could not read ${RESULTS_FILENAME}: ${describeError(error)}`,
        handle.job.id,
        logs
      );
    }

    const output: SandboxOutput = {
      scores: parseScoreTable(raw, handle.job.id),
      logs,
    };
    if (options.captureArtifacts) {
      output.artifacts = await this.copyArtifacts(handle);
    }
    return output;
  }

  async release(handle: ProcessSandboxHandle): Promise<void> {
    await fsUtils.removeDirectory(handle.dir);
    logger.debug(`Removed sandbox ${handle.dir}`);
  }

  describe(handle: ProcessSandboxHandle): string {
    return handle.dir;
  }

  private async copyArtifacts(handle: ProcessSandboxHandle): Promise<string[]> {
    if (!this.options.artifactsDir || !(await fsUtils.isDirectory(handle.artifactsDir))) {
      return [];
    }
    const stem = path.basename(handle.job.id, path.extname(handle.job.id));
    const target = path.join(this.options.artifactsDir, stem);
    const copied: string[] = [];
    for (const filename of await fsUtils.listFiles(handle.artifactsDir)) {
      const destination = path.join(target, filename);
      await fsUtils.copyPath(path.join(handle.artifactsDir, filename), destination);
      copied.push(destination);
    }
    return copied;
  }
}
