#!/usr/bin/env node
// CLI entrypoint for cfgforge.
import { Command } from "commander";
import { runConfig } from "./commands/config";
import { printBanner, shouldShowBanner } from "./theme/banner";
import { loadSettings } from "../utils/settings";

// ANSI color codes
const RESET = "\x1b[0m";
const RED = "\x1b[31m"; // Error

function error(message: string): string {
  return `${RED}${message}${RESET}`;
}

const program = new Command();

program
  .name("cfgforge")
  .description("Render environment specific config files from templates")
  .version("1.0.0")
  .option("--no-banner", "Suppress ASCII banner on startup")
  .addHelpText(
    "after",
    "\nTemplates: .env.erb and config/*.erb (output drops the .erb suffix)\nValues:    app_config[.<environment>].yml or .json\n"
  );

program
  .command("config")
  .alias("generate")
  .description("Generate config files from the templates in the current directory")
  .argument("[environment]", "Use app_config.<environment>.yml instead of app_config.yml (default: $CFGFORGE_ENV)")
  .action(async (environment: string | undefined) => {
    try {
      await runConfig(environment);
    } catch (err) {
      console.error(error(`Error: ${err instanceof Error ? err.message : String(err)}`));
      process.exit(1);
    }
  });

function printBannerIfAllowed(): void {
  const allowed = shouldShowBanner(process.argv, {
    enabled: loadSettings().banner,
    isTTY: Boolean(process.stdout.isTTY),
    ci: Boolean(process.env.CI),
  });
  if (allowed) {
    printBanner();
  }
}

// Main entry: banner, then parse and run the command
async function main(): Promise<void> {
  printBannerIfAllowed();

  const args = process.argv.slice(2).filter((arg) => arg !== "--no-banner");
  if (args.length === 0) {
    program.help();
  }

  await program.parseAsync();
}

main().catch((err) => {
  console.error(error(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
});
