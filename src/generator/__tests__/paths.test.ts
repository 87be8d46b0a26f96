/**
 * Tests for output path derivation and value file naming.
 */

import { describe, it, expect } from "@jest/globals";
import { outputPathFor, valueFileBaseName } from "../paths";
import { InvalidTemplatePathError } from "../errors";

describe("outputPathFor", () => {
  it("strips the .erb suffix", () => {
    expect(outputPathFor("config/database.yml.erb")).toBe("config/database.yml");
    expect(outputPathFor(".env.erb")).toBe(".env");
    expect(outputPathFor("a.yml.erb")).toBe("a.yml");
  });

  it("strips only the final suffix", () => {
    expect(outputPathFor("a.erb.erb")).toBe("a.erb");
  });

  it("leaves .erb elsewhere in the path alone", () => {
    expect(outputPathFor("config.erb/settings.erb")).toBe("config.erb/settings");
  });

  it("rejects paths without the suffix", () => {
    expect(() => outputPathFor("config/database.yml")).toThrow(InvalidTemplatePathError);
    expect(() => outputPathFor("config/database.yml")).toThrow(
      "template path 'config/database.yml' does not end in '.erb'"
    );
    expect(() => outputPathFor(".erb")).toThrow(InvalidTemplatePathError);
  });
});

describe("valueFileBaseName", () => {
  it("uses app_config without an environment", () => {
    expect(valueFileBaseName()).toBe("app_config");
    expect(valueFileBaseName("")).toBe("app_config");
  });

  it("appends the environment", () => {
    expect(valueFileBaseName("staging")).toBe("app_config.staging");
  });
});
