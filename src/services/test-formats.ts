import * as path from "path";
import { exec } from "child_process";
import { promisify } from "util";
import {
  ExecutionContext,
  ResolvedTestCase,
  TestCase,
  TestCaseBody,
  TestFileFormat,
} from "../types";
import { DEFAULT_CASE_TIMEOUT_MS, SANDBOX_MAX_BUFFER } from "../constants";
import { GraderError } from "../errors";
import * as fsUtils from "../utils/fs-utils";
import { withTimeout } from "../utils/timeout";

const execAsync = promisify(exec);

export class TestFileFormatError extends GraderError {
  constructor(filePath: string, problem: string) {
    super(`Invalid test file ${filePath}: ${problem}`);
  }
}

/**
 * A test file as read from disk, before point values are resolved
 */
export interface ParsedTestFile {
  name: string;
  path: string;
  format: TestFileFormat;
  value: number;
  allOrNothing: boolean;
  cases: TestCase[];
}

/**
 * Everything a test file format has to provide
 */
export interface TestFileHandler {
  format: TestFileFormat;
  extensions: readonly string[];
  fromFile(filePath: string): Promise<ParsedTestFile>;
  /** Resolves when the case passes, rejects with the reason otherwise */
  execute(testCase: ResolvedTestCase, context: ExecutionContext): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(
  raw: Record<string, unknown>,
  key: string,
  filePath: string
): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new TestFileFormatError(filePath, `"${key}" must be a string`);
  }
  return value;
}

function optionalNumber(
  raw: Record<string, unknown>,
  key: string,
  filePath: string
): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new TestFileFormatError(filePath, `"${key}" must be a number`);
  }
  return value;
}

function optionalBoolean(
  raw: Record<string, unknown>,
  key: string,
  filePath: string
): boolean | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new TestFileFormatError(filePath, `"${key}" must be a boolean`);
  }
  return value;
}

/**
 * Turns the shared `{ name?, points?, allOrNothing?, cases }` layout into a
 * ParsedTestFile. `bodyOf` extracts the format-specific executable part.
 */
function parseDefinition(
  raw: unknown,
  filePath: string,
  format: TestFileFormat,
  bodyOf: (rawCase: Record<string, unknown>, caseName: string) => TestCaseBody
): ParsedTestFile {
  if (!isRecord(raw)) {
    throw new TestFileFormatError(filePath, "expected an object");
  }
  if (!Array.isArray(raw.cases)) {
    throw new TestFileFormatError(filePath, `"cases" must be an array`);
  }

  const name =
    optionalString(raw, "name", filePath) ??
    path.basename(filePath, path.extname(filePath));

  const cases = raw.cases.map((rawCase: unknown, index: number): TestCase => {
    if (!isRecord(rawCase)) {
      throw new TestFileFormatError(filePath, `case ${index} must be an object`);
    }
    const caseName =
      optionalString(rawCase, "name", filePath) ?? `${name} - ${index + 1}`;
    return {
      name: caseName,
      body: bodyOf(rawCase, caseName),
      hidden: optionalBoolean(rawCase, "hidden", filePath) ?? false,
      successMessage: optionalString(rawCase, "successMessage", filePath),
      failureMessage: optionalString(rawCase, "failureMessage", filePath),
      points: optionalNumber(rawCase, "points", filePath) ?? null,
      timeoutMs: optionalNumber(rawCase, "timeoutMs", filePath),
    };
  });

  return {
    name,
    path: filePath,
    format,
    value: optionalNumber(raw, "points", filePath) ?? 1,
    allOrNothing: optionalBoolean(raw, "allOrNothing", filePath) ?? true,
    cases,
  };
}

const jsonHandler: TestFileHandler = {
  format: "json",
  extensions: [".json"],

  async fromFile(filePath) {
    let raw: unknown;
    try {
      raw = JSON.parse(await fsUtils.readFile(filePath));
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new TestFileFormatError(filePath, error.message);
      }
      throw error;
    }
    return parseDefinition(raw, filePath, "json", (rawCase, caseName) => {
      const command = optionalString(rawCase, "command", filePath);
      if (!command) {
        throw new TestFileFormatError(filePath, `case ${caseName} has no "command"`);
      }
      return { kind: "command", command };
    });
  },

  async execute(testCase, context) {
    if (testCase.body.kind !== "command") {
      throw new GraderError(`Test case ${testCase.name} is not a command case`);
    }
    // exec rejects on a non-zero exit code or when the timeout kills the child
    await execAsync(testCase.body.command, {
      cwd: context.workDir,
      timeout: testCase.timeoutMs ?? DEFAULT_CASE_TIMEOUT_MS,
      maxBuffer: SANDBOX_MAX_BUFFER,
      env: { ...process.env, SUBMISSION_PATH: context.submissionPath },
    });
  },
};

const moduleHandler: TestFileHandler = {
  format: "module",
  extensions: [".js", ".cjs", ".ts"],

  async fromFile(filePath) {
    const loaded: unknown = require(path.resolve(filePath));
    const definition =
      isRecord(loaded) && isRecord(loaded.default) ? loaded.default : loaded;
    return parseDefinition(definition, filePath, "module", (rawCase, caseName) => {
      const test = rawCase.test;
      if (typeof test !== "function") {
        throw new TestFileFormatError(filePath, `case ${caseName} has no "test" function`);
      }
      return {
        kind: "function",
        run: (env) => test(env),
      };
    });
  },

  async execute(testCase, context) {
    const body = testCase.body;
    if (body.kind !== "function") {
      throw new GraderError(`Test case ${testCase.name} is not a function case`);
    }
    await withTimeout(
      Promise.resolve().then(() => body.run(context.loadEnvironment())),
      testCase.timeoutMs ?? DEFAULT_CASE_TIMEOUT_MS,
      `Test case ${testCase.name}`
    );
  },
};

export const TEST_FILE_HANDLERS: Record<TestFileFormat, TestFileHandler> = {
  json: jsonHandler,
  module: moduleHandler,
};

/**
 * Picks the handler for a test file by its extension
 */
export function handlerForPath(filePath: string): TestFileHandler | undefined {
  const extension = path.extname(filePath).toLowerCase();
  if (filePath.endsWith(".d.ts")) return undefined;
  return Object.values(TEST_FILE_HANDLERS).find((handler) =>
    handler.extensions.includes(extension)
  );
}
