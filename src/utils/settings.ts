// Tool settings read from environment variables.

export interface Settings {
  /** Value file variant used when none is given on the command line. */
  environment?: string;
  /** Whether the CLI prints its ASCII banner. */
  banner: boolean;
}

const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

/**
 * Reads a boolean flag; unset or empty means `fallback`.
 */
function readFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  return !FALSE_VALUES.has(value.trim().toLowerCase());
}

/**
 * CFGFORGE_ENV selects app_config.<env>; CFGFORGE_NO_BANNER=true hides the banner.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const environment = env.CFGFORGE_ENV?.trim();
  return {
    environment: environment ? environment : undefined,
    banner: !readFlag(env.CFGFORGE_NO_BANNER, false),
  };
}
