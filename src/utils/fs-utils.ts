import * as path from "path";
import * as fsPromises from "fs/promises";

/**
 * Discovers submissions in a directory: every file or directory that is not
 * hidden, sorted by name so discovery order is stable between runs
 * @param submissionsDir The base directory containing submissions
 * @returns Entry names in discovery order
 */
export async function discoverSubmissions(submissionsDir: string): Promise<string[]> {
  const entries = await fsPromises.readdir(submissionsDir, {
    withFileTypes: true,
  });
  return entries
    .filter((dirent) => !dirent.name.startsWith("."))
    .filter((dirent) => dirent.isDirectory() || dirent.isFile())
    .map((dirent) => dirent.name)
    .sort((a, b) => a.localeCompare(b));
}

/**
 * Creates a fresh, uniquely named temporary directory
 * @param baseDir Directory to create it in
 * @param prefix Name prefix
 */
export async function createTempDirectory(baseDir: string, prefix: string): Promise<string> {
  await fsPromises.mkdir(baseDir, { recursive: true });
  return fsPromises.mkdtemp(path.join(baseDir, prefix));
}

/**
 * Copies a file or a whole directory tree
 */
export async function copyPath(sourcePath: string, destPath: string): Promise<void> {
  await fsPromises.cp(sourcePath, destPath, { recursive: true });
}

export async function readFile(filePath: string): Promise<string> {
  return fsPromises.readFile(filePath, "utf-8");
}

export async function writeFile(filePath: string, content: string): Promise<void> {
  await fsPromises.writeFile(filePath, content);
}

export async function fileExists(filePath: string): Promise<boolean> {
  return fsPromises
    .access(filePath)
    .then(() => true)
    .catch(() => false);
}

export async function isDirectory(filePath: string): Promise<boolean> {
  return fsPromises
    .stat(filePath)
    .then((stats) => stats.isDirectory())
    .catch(() => false);
}

/**
 * Lists the files directly inside a directory, sorted by name
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  const entries = await fsPromises.readdir(dirPath, { withFileTypes: true });
  return entries
    .filter((dirent) => dirent.isFile())
    .map((dirent) => dirent.name)
    .sort((a, b) => a.localeCompare(b));
}

/**
 * Removes a directory and its contents. Missing directories are ignored.
 */
export async function removeDirectory(dirPath: string): Promise<void> {
  await fsPromises.rm(dirPath, { recursive: true, force: true });
}
