// ASCII banner utility for CLI startup
import figlet from "figlet";

// Below this width the banner uses the Small font
const FULL_BANNER_MIN_WIDTH = 60;

// Tagline displayed below the banner
const TAGLINE = "Templates in, config files out";

/**
 * Generates the ASCII art banner sized for the terminal width
 */
export function getBanner(terminalWidth: number = process.stdout.columns || 80): string {
  return figlet.textSync("cfgforge", {
    font: terminalWidth >= FULL_BANNER_MIN_WIDTH ? "Slant" : "Small",
    horizontalLayout: "default",
    verticalLayout: "default",
  });
}

/**
 * Checks if banner should be displayed.
 * Returns false in CI, non-TTY, with --no-banner, or when settings disable it.
 */
export function shouldShowBanner(
  args: string[],
  options: { enabled: boolean; isTTY: boolean; ci: boolean }
): boolean {
  if (options.ci) return false;
  if (!options.isTTY) return false;
  if (args.includes("--no-banner")) return false;
  return options.enabled;
}

/**
 * Banner lines followed by the tagline centred beneath them
 */
export function renderBanner(terminalWidth?: number): string {
  const lines = getBanner(terminalWidth).split("\n");
  const totalWidth = Math.max(...lines.map((l) => l.length));
  const padding = Math.max(0, Math.floor((totalWidth - TAGLINE.length) / 2));
  return [...lines, " ".repeat(padding) + TAGLINE, ""].join("\n");
}

export function printBanner(): void {
  process.stdout.write(renderBanner() + "\n");
}
