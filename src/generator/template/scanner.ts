// Splits template text into literal text and <% %> tags.
import { TemplateSyntaxError } from "../errors";

export type Segment =
  | { kind: "text"; value: string; line: number }
  | { kind: "output"; code: string; line: number }
  | { kind: "statement"; code: string; line: number };

const OPEN = "<%";
const CLOSE = "%>";

function countLines(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === "\n") count++;
  }
  return count;
}

/**
 * Recognises `<%= expr %>`, `<% statement %>`, `<%# comment %>` and the `<%%` escape.
 * Line numbers are 1-based and point at the opening delimiter.
 */
export function scanTemplate(source: string, template?: string): Segment[] {
  const segments: Segment[] = [];
  let text = "";
  let textLine = 1;
  let line = 1;
  let i = 0;

  const flushText = () => {
    if (text.length > 0) {
      segments.push({ kind: "text", value: text, line: textLine });
    }
    text = "";
    textLine = line;
  };

  while (i < source.length) {
    const open = source.indexOf(OPEN, i);
    if (open === -1) {
      text += source.slice(i);
      break;
    }

    const before = source.slice(i, open);
    text += before;
    line += countLines(before);

    if (source[open + OPEN.length] === "%") {
      text += OPEN;
      i = open + OPEN.length + 1;
      continue;
    }

    const close = source.indexOf(CLOSE, open + OPEN.length);
    if (close === -1) {
      throw new TemplateSyntaxError("unterminated '<%' tag", { template, line });
    }

    const inner = source.slice(open + OPEN.length, close);
    const tagLine = line;
    flushText();

    if (inner.startsWith("#")) {
      // comment
    } else if (inner.startsWith("=")) {
      segments.push({ kind: "output", code: inner.slice(1).trim(), line: tagLine });
    } else {
      segments.push({ kind: "statement", code: inner.trim(), line: tagLine });
    }

    line += countLines(inner);
    i = close + CLOSE.length;
    textLine = line;
  }

  flushText();
  return segments;
}
