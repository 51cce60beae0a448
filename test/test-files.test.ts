import { expect } from "chai";
import * as os from "os";
import * as path from "path";
import * as fsPromises from "fs/promises";
import { loadTestFiles } from "../src/services/test-files";
import { TestFileFormatError, handlerForPath } from "../src/services/test-formats";
import { createExecutionContext, gradeSubmission } from "../src/grader";
import { OverallocatedError } from "../src/errors";
import { expectRejects } from "./helpers/errors";

const ADDITION_TESTS = `module.exports = {
  name: "addition",
  points: 2,
  allOrNothing: false,
  cases: [
    {
      name: "adds small numbers",
      test: (env) => {
        if (env.add(1, 2) !== 3) throw new Error("add(1, 2) should be 3");
      },
    },
    {
      name: "adds negative numbers",
      test: (env) => {
        if (env.add(-1, -2) !== -3) throw new Error("add(-1, -2) should be -3");
      },
    },
  ],
};
`;

describe("test file loading", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "grader-test-files-"));
  });

  afterEach(async () => {
    await fsPromises.rm(tmpDir, { recursive: true, force: true });
  });

  async function writeJson(name: string, content: unknown): Promise<void> {
    await fsPromises.writeFile(path.join(tmpDir, name), JSON.stringify(content));
  }

  it("picks a handler by extension", () => {
    expect(handlerForPath("/tests/q1.json")?.format).to.equal("json");
    expect(handlerForPath("/tests/q1.js")?.format).to.equal("module");
    expect(handlerForPath("/tests/q1.ts")?.format).to.equal("module");
    expect(handlerForPath("/tests/types.d.ts")).to.equal(undefined);
    expect(handlerForPath("/tests/README.md")).to.equal(undefined);
  });

  it("loads JSON test files in name order with defaults applied", async () => {
    await writeJson("q2.json", {
      cases: [{ command: "exit 0" }, { command: "exit 1", points: 0.25 }],
    });
    await writeJson("q1.json", {
      name: "Question 1",
      points: 4,
      allOrNothing: false,
      cases: [
        { name: "compiles", command: "make", hidden: true },
        { name: "output", command: "./check.sh", failureMessage: "Wrong output" },
      ],
    });
    await fsPromises.writeFile(path.join(tmpDir, "notes.txt"), "not a test");

    const testFiles = await loadTestFiles(tmpDir);

    expect(testFiles.map((tf) => tf.name)).to.deep.equal(["Question 1", "q2"]);
    const [q1, q2] = testFiles;
    expect(q1.format).to.equal("json");
    expect(q1.allOrNothing).to.equal(false);
    expect(q1.values).to.deep.equal([2, 2]);
    expect(q1.testCases[0].hidden).to.equal(true);
    expect(q1.testCases[1].failureMessage).to.equal("Wrong output");
    expect(q1.testCases[1].body).to.deep.equal({ kind: "command", command: "./check.sh" });

    expect(q2.value).to.equal(1);
    expect(q2.allOrNothing).to.equal(true);
    expect(q2.values).to.deep.equal([0.75, 0.25]);
    expect(q2.testCases.map((c) => c.name)).to.deep.equal(["q2 - 1", "q2 - 2"]);
  });

  it("rejects a JSON case without a command", async () => {
    await writeJson("q1.json", { cases: [{ name: "empty" }] });

    const error = await expectRejects(() => loadTestFiles(tmpDir), TestFileFormatError);
    expect(error.message).to.contain("case empty has no \"command\"");
  });

  it("rejects malformed JSON", async () => {
    await fsPromises.writeFile(path.join(tmpDir, "q1.json"), "{ cases: ");
    await expectRejects(() => loadTestFiles(tmpDir), TestFileFormatError);
  });

  it("fails on over-allocated points before grading", async () => {
    await writeJson("q1.json", {
      points: 1,
      cases: [
        { command: "true", points: 1 },
        { command: "true", points: 1 },
      ],
    });

    const error = await expectRejects(() => loadTestFiles(tmpDir), OverallocatedError);
    expect(error.testFile).to.equal("q1");
  });

  it("loads and runs module test files", async () => {
    await fsPromises.writeFile(path.join(tmpDir, "addition.js"), ADDITION_TESTS);

    const [testFile] = await loadTestFiles(tmpDir);
    expect(testFile.format).to.equal("module");
    expect(testFile.values).to.deep.equal([1, 1]);

    await testFile.run({
      workDir: tmpDir,
      submissionPath: path.join(tmpDir, "student.js"),
      loadEnvironment: () => ({ add: (a: number, b: number) => Math.abs(a + b) }),
    });

    expect(testFile.grade).to.equal(0.5);
    expect(testFile.results[1].message).to.equal("add(-1, -2) should be -3");
  });

  it("rejects a directory that does not exist", async () => {
    await expectRejects(() => loadTestFiles(path.join(tmpDir, "missing")), Error);
  });
});

describe("gradeSubmission", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "grader-submission-"));
    await fsPromises.mkdir(path.join(tmpDir, "bundle", "tests"), { recursive: true });
    await fsPromises.writeFile(path.join(tmpDir, "bundle", "tests", "addition.js"), ADDITION_TESTS);
  });

  afterEach(async () => {
    await fsPromises.rm(tmpDir, { recursive: true, force: true });
  });

  it("writes the score table of a submission", async () => {
    const submissionPath = path.join(tmpDir, "student.js");
    await fsPromises.writeFile(submissionPath, "exports.add = (a, b) => a + b;\n");
    const resultsPath = path.join(tmpDir, "results.json");

    const scores = await gradeSubmission({
      bundleDir: path.join(tmpDir, "bundle"),
      submissionPath,
      resultsPath,
      scoreMode: "points",
    });

    expect(scores).to.deep.equal({ addition: 2 });
    const written: unknown = JSON.parse(await fsPromises.readFile(resultsPath, "utf-8"));
    expect(written).to.deep.equal({ addition: 2 });
  });

  it("fails every case when the submission cannot be loaded", async () => {
    const submissionPath = path.join(tmpDir, "broken.js");
    await fsPromises.writeFile(submissionPath, "exports.add = (a, b) => {\n");

    const scores = await gradeSubmission({
      bundleDir: path.join(tmpDir, "bundle"),
      submissionPath,
      resultsPath: path.join(tmpDir, "results.json"),
      scoreMode: "fraction",
    });

    expect(scores).to.deep.equal({ addition: 0 });
  });

  it("uses the submission's directory as working directory", async () => {
    const submissionDir = path.join(tmpDir, "project");
    await fsPromises.mkdir(submissionDir);

    const context = await createExecutionContext(submissionDir);
    expect(context.workDir).to.equal(submissionDir);

    const fileContext = await createExecutionContext(path.join(submissionDir, "main.js"));
    expect(fileContext.workDir).to.equal(submissionDir);
  });
});
