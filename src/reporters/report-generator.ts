import * as path from "path";
import { stringify } from "csv-stringify/sync";
import { CompletedJob, FinalGradeTable } from "../types";
import { FINAL_GRADES_FILENAME } from "../constants";
import * as fsUtils from "../utils/fs-utils";
import { logger } from "../utils/logger";

export interface GradingSummary {
  totalSubmissions: number;
  completed: number;
  failed: number;
  executionTimeSeconds: number;
  /** Mean of each score column across all rows */
  columnAverages: Record<string, number>;
  failures: { submission: string; diagnostic: string }[];
}

export function renderGradesCsv(table: FinalGradeTable): string {
  return stringify(table.rows, { header: true, columns: table.columns });
}

/**
 * Writes the final grade table as CSV
 * @returns Path of the written file
 */
export async function saveFinalGrades(
  table: FinalGradeTable,
  outputDir: string
): Promise<string> {
  const outputPath = path.join(outputDir, FINAL_GRADES_FILENAME);
  await fsUtils.writeFile(outputPath, renderGradesCsv(table));
  logger.info(`Final grades saved to ${outputPath}`);
  return outputPath;
}

export function generateGradingSummary(
  table: FinalGradeTable,
  completions: readonly CompletedJob[],
  executionTimeSeconds: number
): GradingSummary {
  const failures = completions
    .filter((c) => c.job.state === "failed")
    .map((c) => ({ submission: c.job.id, diagnostic: c.diagnostic ?? "unknown error" }));

  const columnAverages: Record<string, number> = {};
  for (const column of table.columns.slice(1)) {
    const total = table.rows.reduce((sum, row) => {
      const value = row[column];
      return sum + (typeof value === "number" ? value : 0);
    }, 0);
    columnAverages[column] = table.rows.length > 0 ? total / table.rows.length : 0;
  }

  return {
    totalSubmissions: completions.length,
    completed: completions.length - failures.length,
    failed: failures.length,
    executionTimeSeconds,
    columnAverages,
    failures,
  };
}

export function printGradingSummary(summary: GradingSummary): void {
  logger.log("\n=== Grading Summary ===");
  logger.log(
    `Total Submissions: ${summary.totalSubmissions} (${summary.completed} graded, ${summary.failed} failed)`
  );
  logger.log(`Execution Time: ${summary.executionTimeSeconds.toFixed(1)}s`);

  const columns = Object.entries(summary.columnAverages);
  if (columns.length > 0) {
    logger.log("\nAverage score per test file:");
    columns.forEach(([column, average]) => {
      logger.log(`- ${column}: ${average.toFixed(3)}`);
    });
  }

  if (summary.failures.length > 0) {
    logger.log("\nFailed submissions (scored 0):");
    summary.failures.forEach(({ submission, diagnostic }) => {
      logger.log(`- ${submission}: ${diagnostic}`);
    });
  }
}
