/**
 * Tests for writing rendered results.
 */

import { describe, it, expect, afterEach } from "@jest/globals";
import { OutputWriter } from "../outputWriter";
import { InvalidTemplatePathError } from "../errors";
import { createWorkspace, listFiles, readText, recordingReporter, removeWorkspace } from "./testUtils";

describe("OutputWriter", () => {
  let dir: string;

  afterEach(async () => {
    await removeWorkspace(dir);
  });

  it("reports, then writes beside the template", async () => {
    dir = await createWorkspace({ "config/database.yml.erb": "template" });
    const reporter = recordingReporter();

    const written = await new OutputWriter(dir, reporter).write("config/database.yml.erb", "rendered\n");

    expect(written).toBe("config/database.yml");
    expect(reporter.lines).toEqual([{ kind: "progress", message: "saving 'config/database.yml'" }]);
    expect(await readText(dir, "config/database.yml")).toBe("rendered\n");
  });

  it("refuses a path without the template suffix", async () => {
    dir = await createWorkspace({ "config/database.yml": "keep" });
    const writer = new OutputWriter(dir, recordingReporter());

    await expect(writer.write("config/database.yml", "x")).rejects.toBeInstanceOf(InvalidTemplatePathError);
    expect(await readText(dir, "config/database.yml")).toBe("keep");
    expect(await listFiles(dir)).toEqual(["config/database.yml"]);
  });
});
