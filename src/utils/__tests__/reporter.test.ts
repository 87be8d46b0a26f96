/**
 * Tests for console reporters.
 */

import { describe, it, expect, afterEach, jest } from "@jest/globals";
import { createConsoleReporter, silentReporter } from "../reporter";

describe("createConsoleReporter", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("prints a blank line before each headline", () => {
    const lines: string[] = [];
    const reporter = createConsoleReporter({ color: false, write: (line) => lines.push(line) });

    reporter.headline("Rendering config files from provided templates.\n");
    reporter.progress("rendering 'config/database.yml.erb'");

    expect(lines).toEqual(["", "Rendering config files from provided templates.", "  rendering 'config/database.yml.erb'"]);
  });

  it("styles output when colour is forced on", () => {
    const lines: string[] = [];
    const reporter = createConsoleReporter({ color: true, write: (line) => lines.push(line) });

    reporter.headline("Saving new config files.");

    expect(lines[1]).not.toBe("Saving new config files.");
    expect(lines[1]).toContain("Saving new config files.");
    expect(lines[1]).toContain("\x1b[");
  });

  it("writes to console.log by default", () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => {});
    const reporter = createConsoleReporter({ color: false });

    reporter.progress("saving '.env'");

    expect(log).toHaveBeenCalledWith("  saving '.env'");
  });
});

describe("silentReporter", () => {
  it("prints nothing", () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => {});

    silentReporter.headline("hidden");
    silentReporter.progress("hidden");

    expect(log).not.toHaveBeenCalled();
    log.mockRestore();
  });
});
