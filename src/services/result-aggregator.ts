import { FinalGradeTable, GradeCell, SubmissionScores } from "../types";
import {
  AggregationSchemaError,
  IdentifierResolutionError,
  describeError,
} from "../errors";
import { FILE_COLUMN, IDENTIFIER_COLUMN } from "../constants";
import { IdentifierResolver } from "./metadata";

const RESERVED_COLUMNS = new Set([FILE_COLUMN, IDENTIFIER_COLUMN]);

/**
 * Merges per-submission score tables into one table.
 *
 * Score columns are the union of every test file seen, in order of first
 * appearance, and any cell a submission has no score for is 0. Rows follow
 * the order of `results`; a repeated submission is merged into its first row.
 *
 * With a resolver, each filename is swapped for the student's identifier,
 * which becomes the first column, and the filename column is dropped.
 */
export function mergeScoreTables(
  results: readonly SubmissionScores[],
  resolver?: IdentifierResolver
): FinalGradeTable {
  const scoreColumns: string[] = [];
  const seenColumns = new Set<string>();
  const rowsBySubmission = new Map<string, Record<string, number>>();

  for (const { submission, scores } of results) {
    let row = rowsBySubmission.get(submission);
    if (!row) {
      row = {};
      rowsBySubmission.set(submission, row);
    }

    for (const [column, value] of Object.entries(scores)) {
      if (RESERVED_COLUMNS.has(column)) {
        throw new AggregationSchemaError(
          `Test file name "${column}" clashes with a reserved column (submission ${submission})`
        );
      }
      if (!Number.isFinite(value)) {
        throw new AggregationSchemaError(
          `Score for ${column} in ${submission} is not a finite number`
        );
      }
      if (!seenColumns.has(column)) {
        seenColumns.add(column);
        scoreColumns.push(column);
      }
      row[column] = value;
    }
  }

  const rows = Array.from(rowsBySubmission.entries()).map(([submission, scores]) => {
    const row: Record<string, GradeCell> = {};
    if (resolver) {
      row[IDENTIFIER_COLUMN] = resolveIdentifier(resolver, submission);
    } else {
      row[FILE_COLUMN] = submission;
    }
    for (const column of scoreColumns) {
      row[column] = scores[column] ?? 0;
    }
    return row;
  });

  const columns = [resolver ? IDENTIFIER_COLUMN : FILE_COLUMN, ...scoreColumns];
  assertRectangular(columns, rows);
  return { columns, rows };
}

function resolveIdentifier(resolver: IdentifierResolver, filename: string): string {
  try {
    return resolver.fileToId(filename);
  } catch (error) {
    if (error instanceof IdentifierResolutionError) throw error;
    throw new IdentifierResolutionError(filename, describeError(error));
  }
}

function assertRectangular(columns: string[], rows: Record<string, GradeCell>[]): void {
  rows.forEach((row, index) => {
    const keys = Object.keys(row);
    if (keys.length !== columns.length || columns.some((column) => !(column in row))) {
      throw new AggregationSchemaError(
        `Row ${index} has columns [${keys.join(", ")}], expected [${columns.join(", ")}]`
      );
    }
  });
}
