// Builds a node tree from scanned segments, matching block statements with `end`.
import { TemplateSyntaxError } from "../errors";
import { parseExpression, type Expression } from "./expression";
import { scanTemplate } from "./scanner";

export interface ConditionalBranch {
  test: Expression;
  negate: boolean;
  body: TemplateNode[];
}

export interface ConditionalNode {
  kind: "conditional";
  branches: ConditionalBranch[];
  otherwise?: TemplateNode[];
  line: number;
}

/**
 * `for a, b in x`, `x.each do |a, b|` and `x.each_with_index do |a, i|`.
 */
export interface LoopNode {
  kind: "loop";
  iterable: Expression;
  source: string;
  names: [string] | [string, string];
  withIndex: boolean;
  body: TemplateNode[];
  line: number;
}

export type TemplateNode =
  | { kind: "text"; value: string }
  | { kind: "output"; expression: Expression; source: string; line: number }
  | ConditionalNode
  | LoopNode;

type Frame =
  | { kind: "root"; body: TemplateNode[] }
  | { kind: "conditional"; keyword: string; node: ConditionalNode; body: TemplateNode[]; closed: boolean; line: number }
  | { kind: "loop"; keyword: string; node: LoopNode; body: TemplateNode[]; line: number };

const IF = /^(if|unless)\s+(.+)$/s;
const ELSIF = /^elsif\s+(.+)$/s;
const FOR = /^for\s+([A-Za-z_]\w*)(?:\s*,\s*([A-Za-z_]\w*))?\s+in\s+(.+)$/s;
const EACH = /^(.+?)\.(each|each_with_index)\s+do\s*\|\s*([A-Za-z_]\w*)\s*(?:,\s*([A-Za-z_]\w*)\s*)?\|$/s;

function bindingNames(first: string, second: string | undefined): [string] | [string, string] {
  return second ? [first, second] : [first];
}

export function parseTemplate(source: string, template?: string): TemplateNode[] {
  const root: Frame = { kind: "root", body: [] };
  const stack: Frame[] = [root];

  const top = (): Frame => stack[stack.length - 1];

  for (const segment of scanTemplate(source, template)) {
    const location = { template, line: segment.line };

    if (segment.kind === "text") {
      top().body.push({ kind: "text", value: segment.value });
      continue;
    }

    if (segment.kind === "output") {
      top().body.push({
        kind: "output",
        expression: parseExpression(segment.code, location),
        source: segment.code,
        line: segment.line,
      });
      continue;
    }

    const code = segment.code;
    const frame = top();
    let match: RegExpExecArray | null;

    const pushLoop = (
      keyword: string,
      iterableSource: string,
      names: [string] | [string, string],
      withIndex: boolean
    ) => {
      const body: TemplateNode[] = [];
      const node: LoopNode = {
        kind: "loop",
        iterable: parseExpression(iterableSource.trim(), location),
        source: iterableSource.trim(),
        names,
        withIndex,
        body,
        line: segment.line,
      };
      frame.body.push(node);
      stack.push({ kind: "loop", keyword, node, body, line: segment.line });
    };

    if ((match = IF.exec(code))) {
      const body: TemplateNode[] = [];
      const node: ConditionalNode = {
        kind: "conditional",
        branches: [{ test: parseExpression(match[2], location), negate: match[1] === "unless", body }],
        line: segment.line,
      };
      frame.body.push(node);
      stack.push({ kind: "conditional", keyword: match[1], node, body, closed: false, line: segment.line });
    } else if ((match = ELSIF.exec(code))) {
      if (frame.kind !== "conditional" || frame.closed) {
        throw new TemplateSyntaxError("'elsif' without a matching 'if'", location);
      }
      const body: TemplateNode[] = [];
      frame.node.branches.push({ test: parseExpression(match[1], location), negate: false, body });
      frame.body = body;
    } else if (code === "else") {
      if (frame.kind !== "conditional" || frame.closed) {
        throw new TemplateSyntaxError("'else' without a matching 'if'", location);
      }
      const otherwise: TemplateNode[] = [];
      frame.node.otherwise = otherwise;
      frame.body = otherwise;
      frame.closed = true;
    } else if ((match = FOR.exec(code))) {
      pushLoop("for", match[3], bindingNames(match[1], match[2]), false);
    } else if ((match = EACH.exec(code))) {
      pushLoop(match[2], match[1], bindingNames(match[3], match[4]), match[2] === "each_with_index");
    } else if (code === "end") {
      if (frame.kind === "root") {
        throw new TemplateSyntaxError("'end' without an open block", location);
      }
      stack.pop();
    } else if (code.length === 0) {
      throw new TemplateSyntaxError("empty '<% %>' tag", location);
    } else {
      throw new TemplateSyntaxError(`unsupported statement '${code}'`, location);
    }
  }

  const unclosed = top();
  if (unclosed.kind !== "root") {
    throw new TemplateSyntaxError(`missing 'end' for '${unclosed.keyword}'`, {
      template,
      line: unclosed.line,
    });
  }

  return root.body;
}
