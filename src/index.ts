#!/usr/bin/env node
import path from "path";
import {
  CompletedJob,
  FinalGradeTable,
  ScoreTable,
  SubmissionJob,
  SubmissionScores,
} from "./types";
import { GraderConfig, loadConfig } from "./config";
import { BUNDLE_TESTS_DIR } from "./constants";
import { loadTestFiles } from "./services/test-files";
import { PoolOptions, SandboxBackend, SandboxPool } from "./services/sandbox-pool";
import { ProcessSandbox, defaultSandboxCommand } from "./services/process-sandbox";
import { mergeScoreTables } from "./services/result-aggregator";
import { IdentifierResolver, loadMetadata } from "./services/metadata";
import {
  GradingSummary,
  generateGradingSummary,
  printGradingSummary,
  saveFinalGrades,
} from "./reporters/report-generator";
import * as fsUtils from "./utils/fs-utils";
import { logger, setVerbose } from "./utils/logger";

export interface GradeOptions<H> {
  /** Directory holding one file or directory per submission */
  submissionsDir: string;
  /** Autograder bundle; its test files live in `tests/` */
  autograderDir: string;
  /** When set, final_grades.csv (and captured artifacts) are written here */
  outputDir?: string;
  resolver?: IdentifierResolver;
  config?: Partial<GraderConfig>;
  /** Sandbox backend; defaults to a process sandbox per submission */
  backend?: SandboxBackend<H>;
  signal?: AbortSignal;
}

export interface GradeRun {
  table: FinalGradeTable;
  /** Completed jobs in discovery order */
  completions: CompletedJob[];
  summary: GradingSummary;
  outputPath?: string;
}

async function collectCompletions<H>(
  pool: SandboxPool<H>,
  jobs: SubmissionJob[],
  options: PoolOptions
): Promise<CompletedJob[]> {
  const completions: CompletedJob[] = [];
  for await (const completed of pool.submit(jobs, options)) {
    completions.push(completed);
    logger.info(`Progress: ${completions.length}/${jobs.length} submissions graded`);
  }
  return completions;
}

/**
 * Grades every submission in `submissionsDir` and merges the scores into
 * one table. Test files are loaded and their points resolved before any
 * sandbox is launched, so a misconfigured autograder grades nothing.
 */
export async function runGrade<H>(options: GradeOptions<H>): Promise<GradeRun> {
  const startTime = Date.now();
  const config = loadConfig(options.config);
  setVerbose(config.verbose);
  logger.info("Starting batch grading...");

  const testFiles = await loadTestFiles(path.join(options.autograderDir, BUNDLE_TESTS_DIR));
  if (testFiles.length === 0) {
    logger.warn(`No test files found in ${options.autograderDir}`);
  }

  const submissions = await fsUtils.discoverSubmissions(options.submissionsDir);
  logger.info(`Found ${submissions.length} submissions: ${submissions.join(", ")}`);
  const jobs = submissions.map((name, index): SubmissionJob => ({
    id: name,
    path: path.join(options.submissionsDir, name),
    index,
    state: "queued",
  }));

  logger.info(`Using ${config.concurrency} parallel sandboxes`);
  const poolOptions: PoolOptions = {
    concurrency: config.concurrency,
    keepAlive: config.keepAlive,
    debug: config.debug,
    captureArtifacts: config.captureArtifacts,
    timeoutMs: config.timeoutMs,
    signal: options.signal,
  };

  const completions = options.backend
    ? await collectCompletions(new SandboxPool(options.backend), jobs, poolOptions)
    : await collectCompletions(
        new SandboxPool(
          new ProcessSandbox({
            bundleDir: options.autograderDir,
            command: config.sandboxCommand ?? defaultSandboxCommand(),
            workDir: config.workDir,
            scoreMode: config.scoreMode,
            artifactsDir: options.outputDir
              ? path.join(options.outputDir, "artifacts")
              : undefined,
          })
        ),
        jobs,
        poolOptions
      );

  // Rows follow discovery order, not completion order
  completions.sort((a, b) => a.job.index - b.job.index);

  // A failed submission scores 0 on every test file the bundle defines
  const failedScores: ScoreTable = Object.fromEntries(
    testFiles.map((tf): [string, number] => [tf.name, 0])
  );
  const results: SubmissionScores[] = completions.map((c) => ({
    submission: c.job.id,
    scores: c.job.state === "failed" ? failedScores : c.scores,
  }));

  const table = mergeScoreTables(results, options.resolver);
  const outputPath = options.outputDir
    ? await saveFinalGrades(table, options.outputDir)
    : undefined;

  const summary = generateGradingSummary(
    table,
    completions,
    (Date.now() - startTime) / 1000
  );
  printGradingSummary(summary);

  return { table, completions, summary, outputPath };
}

function flagValue(args: string[], flag: string): string | undefined {
  const arg = args.find((a) => a.startsWith(`--${flag}=`));
  return arg ? arg.slice(flag.length + 3) : undefined;
}

// Run the grader if this file is executed directly
if (require.main === module) {
  const args = process.argv.slice(2);
  const submissionsDir = flagValue(args, "submissions") ?? process.cwd();
  const autograderDir = flagValue(args, "autograder") ?? path.join(process.cwd(), "autograder");
  const outputDir = flagValue(args, "output") ?? process.cwd();
  const metadataPath = flagValue(args, "metadata");
  const containers = flagValue(args, "containers");

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted, stopping sandboxes...");
    controller.abort(new Error("interrupted"));
  });

  const loadResolver = async (): Promise<IdentifierResolver | undefined> =>
    metadataPath ? loadMetadata(metadataPath) : undefined;

  loadResolver()
    .then((resolver) =>
      runGrade({
        submissionsDir,
        autograderDir,
        outputDir,
        resolver,
        signal: controller.signal,
        config: {
          concurrency: containers !== undefined ? Number(containers) : undefined,
          keepAlive: args.includes("--no-kill") ? true : undefined,
          debug: args.includes("--debug") ? true : undefined,
          verbose: args.includes("--verbose") ? true : undefined,
          scoreMode: args.includes("--points") ? "points" : undefined,
          captureArtifacts: args.includes("--artifacts") ? true : undefined,
        },
      })
    )
    .then((run) => {
      if (run.outputPath) logger.log(`\nFinal grades written to ${run.outputPath}`);
    })
    .catch((error) => {
      logger.error("Error running grader:", error);
      process.exit(1);
    });
}
