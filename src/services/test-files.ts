import * as path from "path";
import { TestFile } from "./grade-computer";
import { handlerForPath } from "./test-formats";
import * as fsUtils from "../utils/fs-utils";
import { logger } from "../utils/logger";
import { GraderError } from "../errors";

/**
 * Loads every test file in a directory, in name order, and resolves its
 * point values. Files no format handles are skipped.
 *
 * Allocation errors surface here, before any submission is graded.
 */
export async function loadTestFiles(testsDir: string): Promise<TestFile[]> {
  if (!(await fsUtils.isDirectory(testsDir))) {
    throw new GraderError(`Test directory not found: ${testsDir}`);
  }

  const testFiles: TestFile[] = [];
  const names = new Set<string>();

  for (const filename of await fsUtils.listFiles(testsDir)) {
    const filePath = path.join(testsDir, filename);
    const handler = handlerForPath(filePath);
    if (!handler) {
      logger.debug(`Skipping ${filename}: not a test file`);
      continue;
    }

    const parsed = await handler.fromFile(filePath);
    if (names.has(parsed.name)) {
      throw new GraderError(`Duplicate test file name "${parsed.name}" in ${testsDir}`);
    }
    names.add(parsed.name);
    testFiles.push(new TestFile(parsed));
  }

  logger.info(`Loaded ${testFiles.length} test files from ${testsDir}`);
  return testFiles;
}
