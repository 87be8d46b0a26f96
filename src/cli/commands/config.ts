// config command - renders every template against app_config values.
import { Config } from "../../generator/config";
import type { Reporter } from "../../generator/types";
import { createConsoleReporter } from "../../utils/reporter";
import { loadSettings } from "../../utils/settings";

export interface RunConfigOptions {
  /** Working root; the current directory when omitted. */
  cwd?: string;
  reporter?: Reporter;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs one generation. The environment argument wins over CFGFORGE_ENV.
 * Returns the generated file paths.
 */
export async function runConfig(environment: string | undefined, options: RunConfigOptions = {}): Promise<string[]> {
  const settings = loadSettings(options.env);
  const reporter = options.reporter ?? createConsoleReporter();
  const resolvedEnvironment = environment ?? settings.environment;

  const written = await Config.generate(resolvedEnvironment, {
    rootDir: options.cwd ?? process.cwd(),
    reporter,
  });

  if (written.length === 0) {
    reporter.headline("No templates found (looked for .env.erb and config/*.erb).");
  } else {
    reporter.headline(`Generated ${written.length} config file${written.length === 1 ? "" : "s"}.`);
  }
  return written;
}
