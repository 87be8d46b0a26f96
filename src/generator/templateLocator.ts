// Discovers templates by convention: .env.erb plus config/*.erb.
import fg from "fast-glob";
import { fileExists } from "../utils/fileOps";
import { CONFIG_TEMPLATE_GLOB, ENV_TEMPLATE, paths } from "./paths";

export class TemplateLocator {
  private templatePaths?: readonly string[];

  constructor(readonly rootDir: string = process.cwd()) {}

  /**
   * Template paths relative to the root: `.env.erb` first when present, then
   * `config/*.erb` sorted. Scans once per instance.
   */
  async locate(): Promise<readonly string[]> {
    if (this.templatePaths) {
      return this.templatePaths;
    }

    const found: string[] = [];
    if (fileExists(paths.resolve(this.rootDir, ENV_TEMPLATE))) {
      found.push(ENV_TEMPLATE);
    }

    const configTemplates = await fg(CONFIG_TEMPLATE_GLOB, {
      cwd: this.rootDir,
      onlyFiles: true,
      dot: false,
    });
    found.push(...configTemplates.sort());

    this.templatePaths = Object.freeze(found);
    return this.templatePaths;
  }
}
