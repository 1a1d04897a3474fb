import { describe, it, expect } from "vitest";
import { parseRichText } from "./parse";
import { escapeMarkup, flattenSegments, placeholderNames, toMarkup, toPlainText } from "./segments";

describe("parseRichText", () => {
  describe("plain text", () => {
    it("returns a single unstyled literal", () => {
      expect(parseRichText("hello world")).toEqual({
        segments: [{ kind: "literal", text: "hello world", styles: [] }],
      });
    });

    it("returns no segments for empty input", () => {
      expect(parseRichText("")).toEqual({ segments: [] });
    });

    it("keeps whitespace and newlines untouched", () => {
      const tree = parseRichText("a  b\n\n\tc");
      expect(toPlainText(tree)).toBe("a  b\n\n\tc");
    });
  });

  describe("escapes", () => {
    it("turns doubled braces into a single literal", () => {
      expect(parseRichText("{{literal}}")).toEqual({
        segments: [{ kind: "literal", text: "{literal}", styles: [] }],
      });
    });

    it("unescapes braces inside a style scope", () => {
      const leaves = flattenSegments(parseRichText("{red:a{{b}"));
      expect(leaves).toEqual([{ kind: "literal", text: "a{b", styles: ["red"] }]);
    });

    it("keeps a lone closing brace at top level", () => {
      expect(toPlainText(parseRichText("a}b"))).toBe("a}b");
    });
  });

  describe("style scopes", () => {
    it("applies nested styles in nesting order", () => {
      const leaves = flattenSegments(parseRichText("{bold:a{italic:b}c}"));
      expect(leaves).toEqual([
        { kind: "literal", text: "a", styles: ["bold"] },
        { kind: "literal", text: "b", styles: ["bold", "italic"] },
        { kind: "literal", text: "c", styles: ["bold"] },
      ]);
    });

    it("mirrors nesting in the tree", () => {
      const tree = parseRichText("x{bold:y}");
      expect(tree.segments).toHaveLength(2);
      const scope = tree.segments[1];
      expect(scope?.kind).toBe("scope");
      if (scope?.kind === "scope") {
        expect(scope.names).toEqual(["bold"]);
        expect(scope.children).toEqual([{ kind: "literal", text: "y", styles: ["bold"] }]);
      }
    });

    it("chains comma separated styles", () => {
      const leaves = flattenSegments(parseRichText("{red,bold:x}"));
      expect(leaves).toEqual([{ kind: "literal", text: "x", styles: ["red", "bold"] }]);
    });

    it("treats an empty style name as a no-op", () => {
      const leaves = flattenSegments(parseRichText("{:value}"));
      expect(leaves).toEqual([{ kind: "literal", text: "value", styles: [] }]);
    });

    it("only splits on the first colon", () => {
      const leaves = flattenSegments(parseRichText("{red:a:b:c}"));
      expect(leaves).toEqual([{ kind: "literal", text: "a:b:c", styles: ["red"] }]);
    });

    it("does not trim style names", () => {
      const leaves = flattenSegments(parseRichText("{ red :x}"));
      expect(leaves).toEqual([{ kind: "literal", text: "x", styles: [" red "] }]);
    });

    it("handles very deep nesting", () => {
      const depth = 2000;
      const input = "{s:".repeat(depth) + "x" + "}".repeat(depth);
      const leaves = flattenSegments(parseRichText(input));
      expect(leaves).toHaveLength(1);
      expect(leaves[0]?.styles).toHaveLength(depth);
    });
  });

  describe("placeholders", () => {
    it("parses a placeholder with the enclosing styles", () => {
      const leaves = flattenSegments(parseRichText("Score: {blue:{score}}"));
      expect(leaves).toEqual([
        { kind: "literal", text: "Score: ", styles: [] },
        { kind: "placeholder", name: "score", styles: ["blue"] },
      ]);
    });

    it("accepts an empty placeholder name", () => {
      const leaves = flattenSegments(parseRichText("a{}b"));
      expect(leaves).toEqual([
        { kind: "literal", text: "a", styles: [] },
        { kind: "placeholder", name: "", styles: [] },
        { kind: "literal", text: "b", styles: [] },
      ]);
    });

    it("keeps whitespace in placeholder names", () => {
      const leaves = flattenSegments(parseRichText("{ score }"));
      expect(leaves).toEqual([{ kind: "placeholder", name: " score ", styles: [] }]);
    });
  });

  describe("malformed markup", () => {
    it("turns an unmatched brace into literal text to the end", () => {
      expect(parseRichText("ok {red:never closed")).toEqual({
        segments: [
          { kind: "literal", text: "ok ", styles: [] },
          { kind: "literal", text: "{red:never closed", styles: [] },
        ],
      });
    });

    it("degrades from the outermost unclosed scope", () => {
      const leaves = flattenSegments(parseRichText("a{x:b{y:c}d"));
      expect(leaves).toEqual([
        { kind: "literal", text: "a", styles: [] },
        { kind: "literal", text: "{x:b{y:c}d", styles: [] },
      ]);
    });

    it("degrades an unterminated placeholder", () => {
      expect(toPlainText(parseRichText("value {score"))).toBe("value {score");
    });

    it("abandons a head interrupted by another brace", () => {
      const leaves = flattenSegments(parseRichText("{a{name}"));
      expect(leaves).toEqual([
        { kind: "literal", text: "{a", styles: [] },
        { kind: "placeholder", name: "name", styles: [] },
      ]);
    });
  });
});

describe("toMarkup", () => {
  it("round-trips literal text with escaped braces", () => {
    const inputs = ["plain", "{{x}}", "a {{ b }} c", "}}{{", "", "emoji 🎉 {{ok}}"];
    for (const input of inputs) {
      expect(toMarkup(parseRichText(input))).toBe(input);
    }
  });

  it("serializes scopes and placeholders", () => {
    expect(toMarkup(parseRichText("{red,bold:a{n}}"))).toBe("{red,bold:a{n}}");
  });
});

describe("segment helpers", () => {
  it("lists placeholder names in order", () => {
    expect(placeholderNames(parseRichText("{a} {red:{b}} {a}"))).toEqual(["a", "b", "a"]);
  });

  it("fills placeholders through a lookup", () => {
    const tree = parseRichText("hp {hp}/{max}");
    expect(toPlainText(tree, (name) => (name === "hp" ? "7" : undefined))).toBe("hp 7/");
  });

  it("escapes text so it parses back as one literal", () => {
    const text = "{not:markup}";
    expect(escapeMarkup(text)).toBe("{{not:markup}}");
    expect(toPlainText(parseRichText(escapeMarkup(text)))).toBe(text);
  });
});
