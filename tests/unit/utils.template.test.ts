/**
 * Unit tests for path and file name templates
 */

import { describe, it, expect } from "vitest";
import { compileTemplate } from "@/utils";
import { TemplateError } from "@/errors";
import { makeDocument, makeSheet } from "../helpers/uploadFixtures";

const sheet = makeSheet(3, "Summary", []);

describe("compileTemplate", () => {
  it("renders the default file name template against a sheet", () => {
    const template = compileTemplate(
      "filename",
      "{{properties.index}} {{properties.title}}.csv",
    );
    expect(template.render(sheet)).toBe("3 Summary.csv");
  });

  it("renders the document title for the path template", () => {
    const document = makeDocument("Quarterly Report", [sheet]);
    expect(compileTemplate("path", "{{properties.title}}").render(document)).toBe(
      "Quarterly Report",
    );
  });

  it("accepts a leading dot and spaces inside the braces", () => {
    expect(compileTemplate("path", "data/{{ .properties.title }}").render(sheet)).toBe(
      "data/Summary",
    );
  });

  it("returns text without placeholders unchanged", () => {
    expect(compileTemplate("path", "static/dir").render(sheet)).toBe("static/dir");
    expect(compileTemplate("path", "").render(sheet)).toBe("");
  });

  it("rejects an unterminated placeholder when compiling", () => {
    expect(() => compileTemplate("filename", "abc {{x")).toThrow(
      new TemplateError("filename template: unterminated placeholder at offset 4"),
    );
  });

  it("rejects a malformed placeholder when compiling", () => {
    expect(() => compileTemplate("path", "{{ a b }}")).toThrow(
      'path template: invalid placeholder "a b"',
    );
  });

  it("fails to render a missing value", () => {
    const template = compileTemplate("path", "{{properties.missing}}");
    expect(() => template.render(sheet)).toThrow(
      "path template: no value for {{properties.missing}}",
    );
  });

  it("fails to render an object value", () => {
    const template = compileTemplate("path", "{{properties}}");
    expect(() => template.render(sheet)).toThrow(TemplateError);
    expect(() => template.render(sheet)).toThrow(
      "path template: non-scalar value for {{properties}}",
    );
  });
});
