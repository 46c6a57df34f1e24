import { MalformedTemplateError } from "../lib/errors";
import type { Context, ContextValue } from "../lib/types";

/**
 * Minimal Mustache-style renderer.
 *
 * Supported tags:
 * - `{{name}}` interpolates a value (absent or null renders as "")
 * - `{{#name}}…{{/name}}` repeats the body per element of a sequence, or shows it
 *   once against the same context when the value is truthy
 * - `{{^name}}…{{/name}}` shows the body when the value is falsy
 *
 * Sections are resolved into a tree before any variable is interpolated, so a
 * variable inside an iteration body only ever sees that element's fields.
 * Interpolated values are emitted as-is and never rescanned for tags.
 */

export type TemplateNode =
  | { kind: "text"; value: string }
  | { kind: "variable"; name: string }
  | { kind: "section"; name: string; inverted: boolean; children: TemplateNode[] };

type Sigil = "#" | "^" | "/" | "";

interface Tag {
  sigil: Sigil;
  name: string;
  raw: string;
  start: number;
  end: number;
}

interface OpenSection {
  name: string;
  inverted: boolean;
  raw: string;
  offset: number;
  children: TemplateNode[];
}

const OPEN = "{{";
const CLOSE = "}}";

export function renderTemplate(template: string, context: Context): string {
  return renderNodes(parseTemplate(template), context);
}

export function parseTemplate(template: string): TemplateNode[] {
  const root: TemplateNode[] = [];
  const stack: OpenSection[] = [];
  const siblings = () => (stack.length > 0 ? stack[stack.length - 1].children : root);
  let cursor = 0;

  for (let tag = nextTag(template, cursor); tag; tag = nextTag(template, cursor)) {
    if (tag.start > cursor) {
      siblings().push({ kind: "text", value: template.slice(cursor, tag.start) });
    }
    cursor = tag.end;

    if (!tag.name) {
      throw new MalformedTemplateError("empty-tag", tag.raw, tag.start, `Tag ${tag.raw} has no name`);
    }

    switch (tag.sigil) {
      case "#":
      case "^":
        stack.push({ name: tag.name, inverted: tag.sigil === "^", raw: tag.raw, offset: tag.start, children: [] });
        break;
      case "/": {
        const open = stack.pop();
        if (!open) {
          throw new MalformedTemplateError(
            "unexpected-close",
            tag.raw,
            tag.start,
            `Closing tag ${tag.raw} has no matching section`
          );
        }
        if (open.name !== tag.name) {
          throw new MalformedTemplateError(
            "mismatched-close",
            tag.raw,
            tag.start,
            `Closing tag ${tag.raw} does not match open section ${open.raw}`
          );
        }
        siblings().push({ kind: "section", name: open.name, inverted: open.inverted, children: open.children });
        break;
      }
      default:
        siblings().push({ kind: "variable", name: tag.name });
    }
  }

  if (cursor < template.length) {
    siblings().push({ kind: "text", value: template.slice(cursor) });
  }

  const unclosed = stack.pop();
  if (unclosed) {
    throw new MalformedTemplateError(
      "unclosed-section",
      unclosed.raw,
      unclosed.offset,
      `Section ${unclosed.raw} is never closed`
    );
  }

  return root;
}

export function renderNodes(nodes: readonly TemplateNode[], context: Context): string {
  let output = "";
  for (const node of nodes) {
    switch (node.kind) {
      case "text":
        output += node.value;
        break;
      case "variable":
        output += toDisplayText(lookup(context, node.name));
        break;
      case "section":
        output += renderSection(node, context);
        break;
    }
  }
  return output;
}

function renderSection(node: Extract<TemplateNode, { kind: "section" }>, context: Context): string {
  const value = lookup(context, node.name);
  if (node.inverted) {
    return isTruthy(value) ? "" : renderNodes(node.children, context);
  }
  if (isSequence(value)) {
    // Each element replaces the outer context entirely.
    return value.map((item) => renderNodes(node.children, item)).join("");
  }
  return isTruthy(value) ? renderNodes(node.children, context) : "";
}

function nextTag(template: string, from: number): Tag | null {
  const start = template.indexOf(OPEN, from);
  if (start === -1) {
    return null;
  }
  const close = template.indexOf(CLOSE, start + OPEN.length);
  if (close === -1) {
    return null;
  }
  const end = close + CLOSE.length;
  const inner = template.slice(start + OPEN.length, close);
  const sigil = readSigil(inner);
  return {
    sigil,
    name: inner.slice(sigil.length).trim(),
    raw: template.slice(start, end),
    start,
    end
  };
}

function readSigil(inner: string): Sigil {
  const first = inner.charAt(0);
  return first === "#" || first === "^" || first === "/" ? first : "";
}

function lookup(context: Context, name: string): ContextValue {
  return Object.hasOwn(context, name) ? context[name] : undefined;
}

function isSequence(value: ContextValue): value is readonly Context[] {
  return Array.isArray(value);
}

export function isTruthy(value: ContextValue): boolean {
  if (isSequence(value)) {
    return value.length > 0;
  }
  if (typeof value === "number") {
    return value !== 0 && !Number.isNaN(value);
  }
  return Boolean(value);
}

function toDisplayText(value: ContextValue): string {
  if (value === null || value === undefined || isSequence(value)) {
    return "";
  }
  return String(value);
}
