import * as path from "path";
import { parse } from "csv-parse/sync";
import { IdentifierResolutionError, GraderError } from "../errors";
import * as fsUtils from "../utils/fs-utils";

/**
 * Maps a submission filename to the identifier of the student who made it
 */
export interface IdentifierResolver {
  fileToId(filename: string): string;
}

/**
 * Resolver over an in-memory filename → identifier map
 */
export class MapIdentifierResolver implements IdentifierResolver {
  private readonly ids: Map<string, string>;

  constructor(entries: Iterable<[string, string]>) {
    this.ids = new Map(entries);
  }

  fileToId(filename: string): string {
    const id = this.ids.get(filename);
    if (id === undefined) {
      throw new IdentifierResolutionError(filename);
    }
    return id;
  }

  get size(): number {
    return this.ids.size;
  }
}

function toEntries(raw: unknown, source: string): [string, string][] {
  if (Array.isArray(raw)) {
    return raw.map((item: unknown, index: number): [string, string] => {
      if (
        typeof item !== "object" ||
        item === null ||
        !("filename" in item) ||
        !("identifier" in item) ||
        typeof item.filename !== "string" ||
        (typeof item.identifier !== "string" && typeof item.identifier !== "number")
      ) {
        throw new GraderError(
          `Metadata entry ${index} in ${source} needs a "filename" and an "identifier"`
        );
      }
      return [item.filename, String(item.identifier)];
    });
  }
  if (typeof raw === "object" && raw !== null) {
    return Object.entries(raw).map(([filename, identifier]): [string, string] => {
      if (typeof identifier !== "string" && typeof identifier !== "number") {
        throw new GraderError(`Identifier for ${filename} in ${source} must be a string`);
      }
      return [filename, String(identifier)];
    });
  }
  throw new GraderError(`Metadata in ${source} must be an array or an object`);
}

/**
 * Reads `[{ "filename": ..., "identifier": ... }]` or `{ "<filename>": "<identifier>" }`
 */
export async function loadJsonMetadata(filePath: string): Promise<MapIdentifierResolver> {
  const raw: unknown = JSON.parse(await fsUtils.readFile(filePath));
  return new MapIdentifierResolver(toEntries(raw, filePath));
}

/**
 * Reads a CSV file with `filename` and `identifier` columns
 */
export async function loadCsvMetadata(filePath: string): Promise<MapIdentifierResolver> {
  const content = await fsUtils.readFile(filePath);
  const records: Record<string, string>[] = parse(content, {
    columns: (header: string[]) => header.map((col) => col.trim().toLowerCase()),
    skip_empty_lines: true,
    trim: true,
  });

  const entries = records.map((record, index): [string, string] => {
    const filename = record.filename;
    const identifier = record.identifier;
    if (!filename || !identifier) {
      throw new GraderError(
        `Row ${index + 1} of ${filePath} needs a filename and an identifier`
      );
    }
    return [filename, identifier];
  });
  return new MapIdentifierResolver(entries);
}

/**
 * Picks the metadata reader by file extension
 */
export async function loadMetadata(filePath: string): Promise<MapIdentifierResolver> {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === ".json") return loadJsonMetadata(filePath);
  if (extension === ".csv") return loadCsvMetadata(filePath);
  throw new GraderError(`Unsupported metadata file ${filePath}: expected .json or .csv`);
}
