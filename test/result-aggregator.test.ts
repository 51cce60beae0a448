import { expect } from "chai";
import { mergeScoreTables } from "../src/services/result-aggregator";
import { IdentifierResolver, MapIdentifierResolver } from "../src/services/metadata";
import { AggregationSchemaError, IdentifierResolutionError } from "../src/errors";
import { expectThrows } from "./helpers/errors";

describe("mergeScoreTables", () => {
  it("takes the union of test files and fills missing cells with 0", () => {
    const table = mergeScoreTables([
      { submission: "alice.zip", scores: { A: 1, B: 0.5 } },
      { submission: "bob.zip", scores: { A: 0, C: 1 } },
    ]);

    expect(table.columns).to.deep.equal(["file", "A", "B", "C"]);
    expect(table.rows).to.deep.equal([
      { file: "alice.zip", A: 1, B: 0.5, C: 0 },
      { file: "bob.zip", A: 0, B: 0, C: 1 },
    ]);
  });

  it("gives a submission with no scores a row of zeros", () => {
    const table = mergeScoreTables([
      { submission: "alice.zip", scores: { q1: 1, q2: 1 } },
      { submission: "crashed.zip", scores: {} },
    ]);

    expect(table.rows[1]).to.deep.equal({ file: "crashed.zip", q1: 0, q2: 0 });
  });

  it("puts identifiers first and drops the filename when a resolver is given", () => {
    const resolver = new MapIdentifierResolver([
      ["alice.zip", "1001"],
      ["bob.zip", "1002"],
    ]);

    const table = mergeScoreTables(
      [
        { submission: "alice.zip", scores: { q1: 1 } },
        { submission: "bob.zip", scores: { q1: 0.25 } },
      ],
      resolver
    );

    expect(table.columns).to.deep.equal(["identifier", "q1"]);
    expect(table.rows).to.deep.equal([
      { identifier: "1001", q1: 1 },
      { identifier: "1002", q1: 0.25 },
    ]);
  });

  it("fails when a submission has no identifier", () => {
    const resolver = new MapIdentifierResolver([["alice.zip", "1001"]]);

    const error = expectThrows(
      () =>
        mergeScoreTables(
          [
            { submission: "alice.zip", scores: { q1: 1 } },
            { submission: "mallory.zip", scores: { q1: 1 } },
          ],
          resolver
        ),
      IdentifierResolutionError
    );
    expect(error.filename).to.equal("mallory.zip");
    expect(error.message).to.equal("No identifier found for submission mallory.zip");
  });

  it("wraps errors thrown by a custom resolver", () => {
    const resolver: IdentifierResolver = {
      fileToId: () => {
        throw new Error("boom");
      },
    };

    const error = expectThrows(
      () => mergeScoreTables([{ submission: "x", scores: { q1: 1 } }], resolver),
      IdentifierResolutionError
    );
    expect(error.message).to.equal("No identifier found for submission x: boom");
  });

  it("rejects a test file named like a reserved column", () => {
    expect(() =>
      mergeScoreTables([{ submission: "alice.zip", scores: { file: 1 } }])
    ).to.throw(AggregationSchemaError, 'Test file name "file" clashes with a reserved column');
  });

  it("rejects scores that are not finite numbers", () => {
    expect(() =>
      mergeScoreTables([{ submission: "alice.zip", scores: { q1: Number.NaN } }])
    ).to.throw(AggregationSchemaError, "Score for q1 in alice.zip is not a finite number");
  });

  it("merges repeated submissions into their first row", () => {
    const table = mergeScoreTables([
      { submission: "alice.zip", scores: { q1: 1 } },
      { submission: "bob.zip", scores: { q1: 0 } },
      { submission: "alice.zip", scores: { q2: 0.5 } },
    ]);

    expect(table.rows).to.deep.equal([
      { file: "alice.zip", q1: 1, q2: 0.5 },
      { file: "bob.zip", q1: 0, q2: 0 },
    ]);
  });

  it("returns only the key column for an empty batch", () => {
    expect(mergeScoreTables([])).to.deep.equal({ columns: ["file"], rows: [] });
  });
});
