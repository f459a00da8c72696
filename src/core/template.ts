import { MalformedTemplateError, MissingVariableError } from "./errors.js";

const PLACEHOLDER_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Placeholder names the shipped prompt templates rely on. */
export const KNOWN_PLACEHOLDERS = [
  "user_id",
  "context",
  "query",
  "time_context",
  "content",
  "timestamp",
  "error_message",
  "system_state",
  "operation",
  "data",
  "criteria",
  "format",
] as const;

export type KnownPlaceholder = (typeof KNOWN_PLACEHOLDERS)[number];

export type TemplateVars = Readonly<Record<string, string>>;

type Segment = { kind: "text"; value: string } | { kind: "var"; name: string; offset: number };

/**
 * Split a template into literal text and `${name}` placeholders.
 * A `$` not followed by `{` is literal.
 */
function parse(template: string): Segment[] {
  const segments: Segment[] = [];
  let cursor = 0;

  while (cursor < template.length) {
    const start = template.indexOf("${", cursor);
    if (start === -1) {
      segments.push({ kind: "text", value: template.slice(cursor) });
      break;
    }
    if (start > cursor) {
      segments.push({ kind: "text", value: template.slice(cursor, start) });
    }

    const end = template.indexOf("}", start + 2);
    if (end === -1) {
      throw new MalformedTemplateError("unterminated placeholder", start);
    }

    const name = template.slice(start + 2, end).trim();
    if (!PLACEHOLDER_NAME.test(name)) {
      throw new MalformedTemplateError(`invalid placeholder name "${name}"`, start);
    }

    segments.push({ kind: "var", name, offset: start });
    cursor = end + 1;
  }

  return segments;
}

/**
 * Substitute every `${name}` in the template. Values are inserted literally
 * and never re-scanned, so rendering output that has no placeholders left is
 * a no-op.
 */
export function renderTemplate(template: string, vars: TemplateVars = {}): string {
  let out = "";
  for (const segment of parse(template)) {
    if (segment.kind === "text") {
      out += segment.value;
      continue;
    }
    const value = Object.hasOwn(vars, segment.name) ? vars[segment.name] : undefined;
    if (value === undefined) {
      throw new MissingVariableError(segment.name);
    }
    out += value;
  }
  return out;
}

/** Placeholder names in order of first appearance. */
export function listPlaceholders(template: string): string[] {
  const seen = new Set<string>();
  for (const segment of parse(template)) {
    if (segment.kind === "var") seen.add(segment.name);
  }
  return [...seen];
}
