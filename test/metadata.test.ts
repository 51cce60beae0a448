import { expect } from "chai";
import * as os from "os";
import * as path from "path";
import * as fsPromises from "fs/promises";
import { loadMetadata } from "../src/services/metadata";
import { GraderError, IdentifierResolutionError } from "../src/errors";
import { expectRejects } from "./helpers/errors";

describe("metadata", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "grader-metadata-"));
  });

  afterEach(async () => {
    await fsPromises.rm(tmpDir, { recursive: true, force: true });
  });

  async function write(name: string, content: string): Promise<string> {
    const filePath = path.join(tmpDir, name);
    await fsPromises.writeFile(filePath, content);
    return filePath;
  }

  it("reads a JSON list of filename/identifier pairs", async () => {
    const filePath = await write(
      "meta.json",
      JSON.stringify([
        { filename: "alice.zip", identifier: 1001 },
        { filename: "bob.zip", identifier: "s-1002" },
      ])
    );

    const resolver = await loadMetadata(filePath);

    expect(resolver.size).to.equal(2);
    expect(resolver.fileToId("alice.zip")).to.equal("1001");
    expect(resolver.fileToId("bob.zip")).to.equal("s-1002");
  });

  it("reads a JSON object keyed by filename", async () => {
    const filePath = await write("meta.json", JSON.stringify({ "alice.zip": "1001" }));

    const resolver = await loadMetadata(filePath);

    expect(resolver.fileToId("alice.zip")).to.equal("1001");
  });

  it("reads a CSV file with case-insensitive headers", async () => {
    const filePath = await write(
      "meta.csv",
      "Filename, Identifier\nalice.zip, 1001\n\nbob.zip,1002\n"
    );

    const resolver = await loadMetadata(filePath);

    expect(resolver.size).to.equal(2);
    expect(resolver.fileToId("alice.zip")).to.equal("1001");
    expect(resolver.fileToId("bob.zip")).to.equal("1002");
  });

  it("throws for a filename it does not know", async () => {
    const filePath = await write("meta.json", JSON.stringify({ "alice.zip": "1001" }));
    const resolver = await loadMetadata(filePath);

    expect(() => resolver.fileToId("bob.zip")).to.throw(
      IdentifierResolutionError,
      "No identifier found for submission bob.zip"
    );
  });

  it("rejects entries without an identifier", async () => {
    const filePath = await write("meta.json", JSON.stringify([{ filename: "alice.zip" }]));

    const error = await expectRejects(() => loadMetadata(filePath), GraderError);
    expect(error.message).to.equal(
      `Metadata entry 0 in ${filePath} needs a "filename" and an "identifier"`
    );
  });

  it("rejects CSV rows with a blank identifier", async () => {
    const filePath = await write("meta.csv", "filename,identifier\nalice.zip,\n");

    const error = await expectRejects(() => loadMetadata(filePath), GraderError);
    expect(error.message).to.equal(`Row 1 of ${filePath} needs a filename and an identifier`);
  });

  it("rejects other file types", async () => {
    const filePath = await write("meta.yml", "alice.zip: 1001\n");
    await expectRejects(() => loadMetadata(filePath), GraderError);
  });
});
