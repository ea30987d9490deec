/**
 * Path templates: "{{ properties.title }}" placeholders resolved against data
 *
 * Placeholders hold a dot path into the data object; a leading "." is
 * accepted ("{{.properties.title}}"). Strings, numbers and booleans are
 * interpolated as-is. Templates are compiled once and rendered per sheet.
 */

import { TemplateError } from "@/errors";

type TemplatePart =
  | { kind: "text"; text: string }
  | { kind: "value"; path: string[]; source: string };

export type CompiledTemplate = {
  name: string;
  source: string;
  render(data: unknown): string;
};

const OPEN = "{{";
const CLOSE = "}}";
const PATH_PATTERN = /^\.?[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*|\.\d+)*$/;

/**
 * Split a template into literal text and placeholder parts
 *
 * @throws TemplateError for unterminated or malformed placeholders
 */
function parse(name: string, source: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let cursor = 0;

  while (cursor < source.length) {
    const open = source.indexOf(OPEN, cursor);
    if (open === -1) {
      parts.push({ kind: "text", text: source.slice(cursor) });
      break;
    }
    if (open > cursor) {
      parts.push({ kind: "text", text: source.slice(cursor, open) });
    }

    const close = source.indexOf(CLOSE, open + OPEN.length);
    if (close === -1) {
      throw new TemplateError(
        `${name} template: unterminated placeholder at offset ${open}`,
      );
    }

    const expression = source.slice(open + OPEN.length, close).trim();
    if (!PATH_PATTERN.test(expression)) {
      throw new TemplateError(
        `${name} template: invalid placeholder ${JSON.stringify(expression)}`,
      );
    }

    parts.push({
      kind: "value",
      path: expression.replace(/^\./, "").split("."),
      source: expression,
    });
    cursor = close + CLOSE.length;
  }

  return parts;
}

function lookup(data: unknown, path: string[]): unknown {
  let current: unknown = data;
  for (const segment of path) {
    if (typeof current !== "object" || current === null) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

/**
 * Compile a template
 *
 * @param name - Template name used in error messages ("path", "filename")
 * @param source - Template text
 * @throws TemplateError when the template cannot be parsed
 */
export function compileTemplate(name: string, source: string): CompiledTemplate {
  const parts = parse(name, source);

  return {
    name,
    source,
    render(data: unknown): string {
      let output = "";
      for (const part of parts) {
        if (part.kind === "text") {
          output += part.text;
          continue;
        }

        const value = lookup(data, part.path);
        if (
          typeof value === "string" ||
          typeof value === "number" ||
          typeof value === "boolean"
        ) {
          output += String(value);
          continue;
        }

        throw new TemplateError(
          `${name} template: ${value === undefined || value === null ? "no value" : "non-scalar value"} for {{${part.source}}}`,
        );
      }
      return output;
    },
  };
}
