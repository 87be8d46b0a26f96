// File operation helpers. Errors from the filesystem propagate to the caller.
import { promises as fs } from "fs";
import path from "path";
import { existsSync, statSync } from "fs";

/**
 * Reads a UTF-8 text file. Throws the underlying ENOENT/EACCES error on failure.
 */
export async function readTextFile(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf-8");
}

/**
 * Creates or truncates a UTF-8 text file, making parent directories as needed.
 */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, "utf-8");
}

/**
 * Checks that a path exists and is a regular file.
 */
export function fileExists(filePath: string): boolean {
  return existsSync(filePath) && statSync(filePath).isFile();
}
