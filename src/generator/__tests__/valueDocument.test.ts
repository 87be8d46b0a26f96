/**
 * Tests for dotted-path access over decoded values.
 */

import { describe, it, expect } from "@jest/globals";
import { ValueDocument, formatPath, parsePath } from "../valueDocument";
import { UndefinedValueError } from "../errors";

describe("ValueDocument", () => {
  const values = new ValueDocument({
    rails_env: "staging",
    db: { host: "localhost", password: null },
    servers: [{ name: "web-1" }, { name: "web-2" }],
  });

  it("reads top-level and nested keys", () => {
    expect(values.get("rails_env")).toBe("staging");
    expect(values.get("db.host")).toBe("localhost");
    expect(values.get(["db", "host"])).toBe("localhost");
  });

  it("indexes sequences with numeric segments", () => {
    expect(values.get("servers.1.name")).toBe("web-2");
    expect(values.get(["servers", 0, "name"])).toBe("web-1");
    expect(values.get("servers.2")).toBeUndefined();
  });

  it("distinguishes a null value from a missing key", () => {
    expect(values.get("db.password")).toBeNull();
    expect(values.has("db.password")).toBe(true);
    expect(values.get("db.username")).toBeUndefined();
    expect(values.has("db.username")).toBe(false);
  });

  it("does not step into scalars", () => {
    expect(values.get("rails_env.length")).toBeUndefined();
  });

  it("fetch throws UndefinedValueError naming the path", () => {
    expect(() => values.fetch("db.username")).toThrow(UndefinedValueError);
    expect(() => values.fetch("db.username")).toThrow("undefined config value 'db.username'");
    expect(() => values.fetch(["servers", 3], { template: "config/x.erb", line: 2 })).toThrow(
      "undefined config value 'servers[3]' in config/x.erb:2"
    );
  });

  it("is frozen after construction", () => {
    const root = values.toJSON();

    expect(Object.isFrozen(root)).toBe(true);
    expect(Object.isFrozen(root.db)).toBe(true);
    expect(Object.isFrozen(root.servers)).toBe(true);
  });

  it("does not expose inherited properties as values", () => {
    expect(values.get("toString")).toBeUndefined();
    expect(values.get("db.constructor")).toBeUndefined();
  });

  it("lists top-level keys", () => {
    expect(values.keys()).toEqual(["rails_env", "db", "servers"]);
  });
});

describe("path helpers", () => {
  it("parses dotted paths", () => {
    expect(parsePath("a.b.0.c")).toEqual(["a", "b", 0, "c"]);
    expect(parsePath("")).toEqual([]);
  });

  it("formats segment lists", () => {
    expect(formatPath(["db", "host"])).toBe("db.host");
    expect(formatPath(["servers", 0, "name"])).toBe("servers[0].name");
  });
});
