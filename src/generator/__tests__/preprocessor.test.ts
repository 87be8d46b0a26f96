/**
 * Tests for the {{ expr }} shorthand rewrite.
 */

import { describe, it, expect } from "@jest/globals";
import { preprocessTemplate } from "../preprocessor";

describe("preprocessTemplate", () => {
  it("rewrites markers into output tags", () => {
    expect(preprocessTemplate("host: {{ db.host }}\n")).toBe("host: <%= db.host %>\n");
  });

  it("tolerates any spacing inside the braces", () => {
    expect(preprocessTemplate("{{db.host}}")).toBe("<%= db.host %>");
    expect(preprocessTemplate("{{    db.host   }}")).toBe("<%= db.host %>");
    expect(preprocessTemplate("{{\tdb.host\t}}")).toBe("<%= db.host %>");
  });

  it("keeps the expression text verbatim", () => {
    expect(preprocessTemplate('{{ db["host name"] || "x" }}')).toBe('<%= db["host name"] || "x" %>');
  });

  it("rewrites several markers on one line", () => {
    expect(preprocessTemplate("{{ a }}:{{ b }}")).toBe("<%= a %>:<%= b %>");
  });

  it("leaves native tags and plain text untouched", () => {
    const text = "<% if db.ssl %>\nssl: <%= db.ssl %>\n<% end %>\nplain { braces }\n";

    expect(preprocessTemplate(text)).toBe(text);
  });

  it("allows native and shorthand syntax together", () => {
    expect(preprocessTemplate("<%= a %> {{ b }}")).toBe("<%= a %> <%= b %>");
  });

  it("rewrites a marker that spans lines, keeping its newlines", () => {
    expect(preprocessTemplate("v={{\n  a\n}}")).toBe("v=<%= \n  a\n %>");
    expect(preprocessTemplate("{{ a\n}} {{ b }}")).toBe("<%= a\n %> <%= b %>");
  });

  it("is idempotent", () => {
    const once = preprocessTemplate("user: {{ db.username }}\npass: <%= db.password %>\n");

    expect(preprocessTemplate(once)).toBe(once);
  });
});
