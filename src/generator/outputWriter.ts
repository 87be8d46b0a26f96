// Writes rendered results beside their templates, minus the .erb suffix.
import { writeTextFile } from "../utils/fileOps";
import { outputPathFor, paths } from "./paths";
import type { Reporter } from "./types";

export class OutputWriter {
  constructor(
    readonly rootDir: string,
    private readonly reporter: Reporter
  ) {}

  /**
   * Creates or truncates the output file. Returns the output path relative to the root.
   */
  async write(templatePath: string, result: string): Promise<string> {
    const outputPath = outputPathFor(templatePath);
    this.reporter.progress(`saving '${outputPath}'`);
    await writeTextFile(paths.resolve(this.rootDir, outputPath), result);
    return outputPath;
  }
}
