/**
 * Rich text markup parser.
 *
 * Grammar:
 *   {style:text}   apply `style` to `text` (nestable, `{a,b:text}` chains styles)
 *   {name}         placeholder filled at resolution time
 *   {{  }}         literal braces
 *
 * Parsing never fails. Markup that cannot be closed degrades to literal text.
 */

import type { RichText, Segment, StyleId } from "./types";

interface Frame {
  /** Index of the opening brace, -1 for the root */
  start: number;
  names: readonly StyleId[];
  styles: readonly StyleId[];
  children: Segment[];
  text: string;
}

type Head =
  | { kind: "placeholder"; name: string; end: number }
  | { kind: "scope"; names: StyleId[]; end: number }
  | { kind: "abandoned"; end: number }
  | { kind: "unclosed" };

const NO_STYLES: readonly StyleId[] = [];

/**
 * Parse a markup string into a segment tree.
 *
 * The tree mirrors nesting order exactly and every node carries its fully
 * accumulated style list, so consumers never walk back up to a parent.
 */
export function parseRichText(input: string): RichText {
  const root: Frame = {
    start: -1,
    names: NO_STYLES,
    styles: NO_STYLES,
    children: [],
    text: "",
  };
  // Explicit stack keeps arbitrarily deep nesting off the call stack
  const stack: Frame[] = [root];
  let pos = 0;

  while (pos < input.length) {
    const frame = stack[stack.length - 1] ?? root;
    const c = input.charAt(pos);

    if (c === "{") {
      if (input[pos + 1] === "{") {
        frame.text += "{";
        pos += 2;
        continue;
      }

      const head = scanHead(input, pos);
      if (head.kind === "unclosed") {
        degradeToLiteral(root, stack, input, pos);
        return { segments: root.children };
      }
      if (head.kind === "abandoned") {
        frame.text += input.slice(pos, head.end);
        pos = head.end;
        continue;
      }

      flushText(frame);
      if (head.kind === "placeholder") {
        frame.children.push({ kind: "placeholder", name: head.name, styles: frame.styles });
      } else {
        stack.push({
          start: pos,
          names: head.names,
          styles: head.names.length > 0 ? [...frame.styles, ...head.names] : frame.styles,
          children: [],
          text: "",
        });
      }
      pos = head.end;
      continue;
    }

    if (c === "}") {
      if (frame === root) {
        // `}}` escapes at top level; a lone `}` is kept as-is
        frame.text += "}";
        pos += input[pos + 1] === "}" ? 2 : 1;
        continue;
      }
      flushText(frame);
      stack.pop();
      const parent = stack[stack.length - 1] ?? root;
      parent.children.push({
        kind: "scope",
        names: frame.names,
        styles: frame.styles,
        children: frame.children,
      });
      pos += 1;
      continue;
    }

    frame.text += c;
    pos += 1;
  }

  if (stack.length > 1) {
    degradeToLiteral(root, stack, input, input.length);
  } else {
    flushText(root);
  }
  return { segments: root.children };
}

/**
 * Read a `{...` head starting at the brace. Stops at the first `:` (scope),
 * `}` (placeholder) or `{` (the outer brace is abandoned).
 */
function scanHead(input: string, start: number): Head {
  for (let i = start + 1; i < input.length; i++) {
    const c = input.charAt(i);
    if (c === "}") {
      return { kind: "placeholder", name: input.slice(start + 1, i), end: i + 1 };
    }
    if (c === ":") {
      const names = input
        .slice(start + 1, i)
        .split(",")
        .filter((name) => name.length > 0);
      return { kind: "scope", names, end: i + 1 };
    }
    if (c === "{") {
      return { kind: "abandoned", end: i };
    }
  }
  return { kind: "unclosed" };
}

/**
 * Turn everything from the earliest unmatched brace to the end of input into
 * top-level literal text.
 */
function degradeToLiteral(root: Frame, stack: Frame[], input: string, pos: number): void {
  const outermost = stack[1];
  const from = outermost ? outermost.start : pos;
  stack.length = 1;
  root.text += input.slice(from);
  flushText(root);
}

function flushText(frame: Frame): void {
  if (frame.text.length === 0) return;
  frame.children.push({ kind: "literal", text: frame.text, styles: frame.styles });
  frame.text = "";
}
