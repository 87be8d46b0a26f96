// Generates environment specific config files from templates and app_config values.
//
//   config/database.yml.erb  --(app_config.yml)-->  config/database.yml
//
// Generated files are overwritten on every run; edit the template, not the output.
import { readTextFile } from "../utils/fileOps";
import { createConsoleReporter } from "../utils/reporter";
import { paths } from "./paths";
import { preprocessTemplate } from "./preprocessor";
import { erbEngine } from "./template";
import { TemplateLocator } from "./templateLocator";
import { OutputWriter } from "./outputWriter";
import { ValueStore } from "./valueStore";
import type { ValueDocument } from "./valueDocument";
import type { GenerationState, Reporter, TemplateEngine } from "./types";

export interface ConfigOptions {
  /** Directory holding app_config.* and the templates. Defaults to process.cwd(). */
  rootDir?: string;
  reporter?: Reporter;
  engine?: TemplateEngine;
}

interface RenderedTemplate {
  templatePath: string;
  result: string;
}

/**
 * One generation run. Values and template paths are loaded once per instance, and the
 * first environment passed to {@link generate} sticks for the instance's lifetime.
 */
export class Config {
  readonly rootDir: string;
  private readonly reporter: Reporter;
  private readonly engine: TemplateEngine;
  private readonly valueStore: ValueStore;
  private readonly locator: TemplateLocator;
  private readonly writer: OutputWriter;
  private _environment?: string;
  private _state: GenerationState = "idle";

  constructor(options: ConfigOptions = {}) {
    this.rootDir = options.rootDir ?? process.cwd();
    this.reporter = options.reporter ?? createConsoleReporter();
    this.engine = options.engine ?? erbEngine;
    this.valueStore = new ValueStore(this.rootDir);
    this.locator = new TemplateLocator(this.rootDir);
    this.writer = new OutputWriter(this.rootDir, this.reporter);
  }

  static generate(environment?: string, options: ConfigOptions = {}): Promise<string[]> {
    return new Config(options).generate(environment);
  }

  get environment(): string | undefined {
    return this._environment;
  }

  get state(): GenerationState {
    return this._state;
  }

  /**
   * Loads values, renders every template, then writes every result. A render failure
   * leaves the filesystem untouched; a write failure keeps whatever was already written.
   * Resolves to the output paths written, in discovery order.
   */
  async generate(environment?: string): Promise<string[]> {
    this._environment ??= environment;

    try {
      const values = await this.valueStore.load(this._environment);
      this._state = "values-loaded";

      this.reporter.headline("Rendering config files from provided templates.");
      const templatePaths = await this.locator.locate();
      const rendered: RenderedTemplate[] = [];
      for (const templatePath of templatePaths) {
        rendered.push({ templatePath, result: await this.renderTemplate(templatePath, values) });
      }
      this._state = "rendered";

      this.reporter.headline("Saving new config files.");
      const written: string[] = [];
      for (const { templatePath, result } of rendered) {
        written.push(await this.writer.write(templatePath, result));
      }
      this._state = "done";
      return written;
    } catch (err) {
      this._state = "failed";
      throw err;
    }
  }

  private async renderTemplate(templatePath: string, values: ValueDocument): Promise<string> {
    this.reporter.progress(`rendering '${templatePath}'`);
    const source = await readTextFile(paths.resolve(this.rootDir, templatePath));
    return this.engine.render(preprocessTemplate(source), values, templatePath);
  }
}
