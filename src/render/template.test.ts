import { describe, expect, it } from "vitest";
import { MalformedTemplateError } from "../lib/errors";
import type { Context } from "../lib/types";
import { isTruthy, parseTemplate, renderTemplate } from "./template";

describe("renderTemplate", () => {
  describe("variables", () => {
    it("interpolates a string value", () => {
      expect(renderTemplate("{{X}}", { X: "hello" })).toBe("hello");
    });

    it("renders a missing key as an empty string", () => {
      expect(renderTemplate("{{X}}", {})).toBe("");
    });

    it("renders null as an empty string", () => {
      expect(renderTemplate("[{{X}}]", { X: null })).toBe("[]");
    });

    it("coerces numbers and booleans to their natural text", () => {
      expect(renderTemplate("{{a}} {{b}} {{c}} {{d}}", { a: 72, b: 0.5, c: true, d: false })).toBe("72 0.5 true false");
    });

    it("keeps surrounding literal text", () => {
      expect(renderTemplate("<p>Hi {{name}}, it is {{temp}}°F</p>", { name: "Sam", temp: 64 })).toBe(
        "<p>Hi Sam, it is 64°F</p>"
      );
    });

    it("accepts whitespace inside the braces", () => {
      expect(renderTemplate("{{ name }}", { name: "Sam" })).toBe("Sam");
    });

    it("does not reach inherited object properties", () => {
      expect(renderTemplate("[{{constructor}}][{{toString}}]", {})).toBe("[][]");
    });

    it("does not rescan interpolated values for tags", () => {
      expect(renderTemplate("{{a}}", { a: "{{b}}", b: "nope" })).toBe("{{b}}");
    });

    it("leaves a lone opening brace pair as text", () => {
      expect(renderTemplate("a {{ b", {})).toBe("a {{ b");
    });

    it("renders a sequence used as a variable as an empty string", () => {
      expect(renderTemplate("[{{items}}]", { items: [{ a: 1 }] })).toBe("[]");
    });
  });

  describe("conditional sections", () => {
    it("hides the body when the value is false", () => {
      expect(renderTemplate("{{#X}}A{{/X}}", { X: false })).toBe("");
    });

    it("shows the body when the value is true", () => {
      expect(renderTemplate("{{#X}}A{{/X}}", { X: true })).toBe("A");
    });

    it("hides the body when the key is absent", () => {
      expect(renderTemplate("a{{#X}}B{{/X}}c", {})).toBe("ac");
    });

    it("renders the body against the outer context when truthy", () => {
      expect(renderTemplate("{{#show}}{{title}}{{/show}}", { show: "yes", title: "Hello" })).toBe("Hello");
    });

    it.each([0, "", null])("treats %j as falsy", (value) => {
      expect(renderTemplate("{{#X}}A{{/X}}", { X: value })).toBe("");
    });
  });

  describe("inverted sections", () => {
    it("shows the body when the key is absent", () => {
      expect(renderTemplate("{{^X}}A{{/X}}", {})).toBe("A");
    });

    it("hides the body when the value is true", () => {
      expect(renderTemplate("{{^X}}A{{/X}}", { X: true })).toBe("");
    });

    it("shows the body for an empty sequence", () => {
      expect(renderTemplate("{{^items}}none{{/items}}", { items: [] })).toBe("none");
    });

    it("renders the body against the same context", () => {
      expect(renderTemplate("{{^ok}}{{message}}{{/ok}}", { ok: false, message: "down" })).toBe("down");
    });
  });

  describe("iteration", () => {
    it("renders the body once per element in order", () => {
      const context: Context = { ITEMS: [{ NAME: "a" }, { NAME: "b" }] };
      expect(renderTemplate("{{#ITEMS}}[{{NAME}}]{{/ITEMS}}", context)).toBe("[a][b]");
    });

    it("renders nothing for an empty sequence", () => {
      expect(renderTemplate("{{#ITEMS}}[{{NAME}}]{{/ITEMS}}", { ITEMS: [] })).toBe("");
    });

    it("resolves colliding names against the element, not the outer context", () => {
      const context: Context = { title: "outer", items: [{ title: "inner" }] };
      expect(renderTemplate("{{title}}:{{#items}}{{title}}{{/items}}", context)).toBe("outer:inner");
    });

    it("does not expose outer fields inside an element body", () => {
      const context: Context = { date: "Monday", items: [{ title: "a" }] };
      expect(renderTemplate("{{#items}}{{title}}/{{date}};{{/items}}", context)).toBe("a/;");
    });

    it("evaluates nested sections against the element context", () => {
      const context: Context = {
        flag: true,
        items: [
          { name: "a", flag: false },
          { name: "b", flag: true }
        ]
      };
      const template = "{{#items}}{{name}}{{#flag}}+{{/flag}}{{^flag}}-{{/flag}}{{/items}}";
      expect(renderTemplate(template, context)).toBe("a-b+");
    });

    it("iterates nested sequences", () => {
      const context: Context = {
        groups: [
          { label: "x", rows: [{ v: 1 }, { v: 2 }] },
          { label: "y", rows: [] }
        ]
      };
      const template = "{{#groups}}{{label}}({{#rows}}{{v}}{{/rows}}){{/groups}}";
      expect(renderTemplate(template, context)).toBe("x(12)y()");
    });

    it("resolves a re-entrant section name at each depth independently", () => {
      const context: Context = { list: [{ list: [{ v: "in" }] }, { list: [] }] };
      expect(renderTemplate("{{#list}}<{{#list}}{{v}}{{/list}}>{{/list}}", context)).toBe("<in><>");
    });
  });

  describe("determinism", () => {
    it("returns the same output for the same inputs", () => {
      const context: Context = { items: [{ n: 1 }, { n: 2 }], on: true };
      const template = "{{#on}}{{#items}}{{n}},{{/items}}{{/on}}";
      expect(renderTemplate(template, context)).toBe(renderTemplate(template, context));
    });

    it("does not mutate the context", () => {
      const items = [{ n: 1 }];
      const context = { items };
      renderTemplate("{{#items}}{{n}}{{/items}}", context);
      expect(context).toEqual({ items: [{ n: 1 }] });
      expect(context.items).toBe(items);
    });
  });

  describe("malformed templates", () => {
    it("rejects a closing tag without an open section", () => {
      expect(() => renderTemplate("a{{/X}}", {})).toThrow(MalformedTemplateError);
    });

    it("rejects a mismatched closing tag", () => {
      try {
        renderTemplate("{{#a}}{{#b}}{{/a}}{{/b}}", {});
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedTemplateError);
        expect(error).toMatchObject({ reason: "mismatched-close", tag: "{{/a}}", offset: 12 });
      }
    });

    it("rejects an unclosed section", () => {
      expect(() => renderTemplate("{{^X}}body", {})).toThrow(/Section \{\{\^X\}\} is never closed/);
    });

    it("rejects an empty tag", () => {
      expect(() => renderTemplate("{{}}", {})).toThrow(MalformedTemplateError);
    });

    it("reports malformed input even when the section would be hidden", () => {
      expect(() => renderTemplate("{{#hidden}}{{/other}}", { hidden: false })).toThrow(MalformedTemplateError);
    });
  });
});

describe("parseTemplate", () => {
  it("builds a section tree", () => {
    expect(parseTemplate("a{{#s}}{{v}}{{/s}}")).toEqual([
      { kind: "text", value: "a" },
      { kind: "section", name: "s", inverted: false, children: [{ kind: "variable", name: "v" }] }
    ]);
  });
});

describe("isTruthy", () => {
  it("follows the visibility rules", () => {
    expect([undefined, null, false, 0, Number.NaN, "", []].map(isTruthy)).toEqual([
      false,
      false,
      false,
      false,
      false,
      false,
      false
    ]);
    expect([true, 1, -1, "0", "x", [{ a: 1 }]].map(isTruthy)).toEqual([true, true, true, true, true, true]);
  });
});
