/**
 * Tests for banner display rules.
 */

import { describe, it, expect } from "@jest/globals";
import { renderBanner, shouldShowBanner } from "../theme/banner";

describe("banner", () => {
  const interactive = { enabled: true, isTTY: true, ci: false };

  it("shows on an interactive terminal", () => {
    expect(shouldShowBanner(["node", "cfgforge", "config"], interactive)).toBe(true);
  });

  it("hides with --no-banner, in CI, when piped or when disabled", () => {
    expect(shouldShowBanner(["node", "cfgforge", "--no-banner", "config"], interactive)).toBe(false);
    expect(shouldShowBanner([], { ...interactive, ci: true })).toBe(false);
    expect(shouldShowBanner([], { ...interactive, isTTY: false })).toBe(false);
    expect(shouldShowBanner([], { ...interactive, enabled: false })).toBe(false);
  });

  it("ends with the tagline", () => {
    const lines = renderBanner(100).split("\n");

    expect(lines[lines.length - 2].trim()).toBe("Templates in, config files out");
    expect(lines[lines.length - 1]).toBe("");
  });
});
