// Evaluates a parsed template against a ValueDocument.
import { UndefinedValueError, type TemplateLocation } from "../errors";
import { ExactNumber, isNumeric, numbersEqual } from "../numbers";
import type { PathSegment, Value } from "../types";
import { ValueDocument, formatPath, isSequence, isValueMap, step } from "../valueDocument";
import type { Expression } from "./expression";
import type { ConditionalNode, LoopNode, TemplateNode } from "./parser";

/**
 * Loop variables layered over the document. Inner scopes shadow outer ones and document keys.
 */
class Scope {
  constructor(
    private readonly document: ValueDocument,
    private readonly bindings: ReadonlyMap<string, Value> = new Map(),
    private readonly parent?: Scope
  ) {}

  resolve(name: string): Value | undefined {
    if (this.bindings.has(name)) {
      return this.bindings.get(name);
    }
    return this.parent ? this.parent.resolve(name) : this.document.get([name]);
  }

  child(bindings: ReadonlyMap<string, Value>): Scope {
    return new Scope(this.document, bindings, this);
  }
}

/**
 * Only nil and false are falsy; 0 and "" count as true.
 */
export function isTruthy(value: Value): boolean {
  return value !== null && value !== false;
}

export function valuesEqual(left: Value, right: Value): boolean {
  if (isNumeric(left) && isNumeric(right)) {
    return numbersEqual(left, right);
  }
  if (typeof left === "object" && left !== null && typeof right === "object" && right !== null) {
    return formatValue(left) === formatValue(right);
  }
  return left === right;
}

/**
 * JSON text for a value, numbers as written.
 */
function toJSONText(value: Value): string {
  if (value instanceof ExactNumber) return value.text;
  if (isSequence(value)) return `[${value.map(toJSONText).join(",")}]`;
  if (isValueMap(value)) {
    const members = Object.entries(value).map(([key, child]) => `${JSON.stringify(key)}:${toJSONText(child)}`);
    return `{${members.join(",")}}`;
  }
  return JSON.stringify(value);
}

/**
 * Text for an interpolated value. nil renders empty; collections render as JSON.
 */
export function formatValue(value: Value): string {
  if (value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return toJSONText(value);
}

class Evaluator {
  constructor(private readonly template?: string) {}

  renderNodes(nodes: readonly TemplateNode[], scope: Scope, out: string[]): void {
    for (const node of nodes) {
      switch (node.kind) {
        case "text":
          out.push(node.value);
          break;
        case "output":
          out.push(formatValue(this.evaluate(node.expression, scope, node.line)));
          break;
        case "conditional":
          this.renderConditional(node, scope, out);
          break;
        case "loop":
          this.renderLoop(node, scope, out);
          break;
      }
    }
  }

  private renderConditional(node: ConditionalNode, scope: Scope, out: string[]): void {
    for (const branch of node.branches) {
      const result = isTruthy(this.evaluate(branch.test, scope, node.line));
      if (result !== branch.negate) {
        this.renderNodes(branch.body, scope, out);
        return;
      }
    }
    if (node.otherwise) {
      this.renderNodes(node.otherwise, scope, out);
    }
  }

  private renderLoop(node: LoopNode, scope: Scope, out: string[]): void {
    const iterable = this.evaluate(node.iterable, scope, node.line);
    const [first, second] = node.names;

    const entries: Array<[Value, Value]> = [];
    if (isSequence(iterable)) {
      iterable.forEach((item, index) => entries.push([item, index]));
    } else if (isValueMap(iterable)) {
      Object.entries(iterable).forEach(([key, value], index) =>
        entries.push([key, node.withIndex ? index : value])
      );
    } else {
      throw new UndefinedValueError(`${node.source}.${node.withIndex ? "each_with_index" : "each"}`, {
        template: this.template,
        line: node.line,
      });
    }

    for (const [item, extra] of entries) {
      const bindings = new Map<string, Value>([[first, item]]);
      if (second !== undefined) {
        bindings.set(second, extra);
      }
      this.renderNodes(node.body, scope.child(bindings), out);
    }
  }

  evaluate(expression: Expression, scope: Scope, line: number): Value {
    switch (expression.type) {
      case "literal":
        return expression.value;
      case "path":
        return this.lookup(expression.root, expression.segments, scope, { template: this.template, line });
      case "not":
        return !isTruthy(this.evaluate(expression.operand, scope, line));
      case "binary":
        return this.evaluateBinary(expression, scope, line);
    }
  }

  private evaluateBinary(
    expression: Extract<Expression, { type: "binary" }>,
    scope: Scope,
    line: number
  ): Value {
    const left = this.evaluate(expression.left, scope, line);
    if (expression.operator === "&&") {
      return isTruthy(left) ? this.evaluate(expression.right, scope, line) : left;
    }
    if (expression.operator === "||") {
      return isTruthy(left) ? left : this.evaluate(expression.right, scope, line);
    }
    const equal = valuesEqual(left, this.evaluate(expression.right, scope, line));
    return expression.operator === "==" ? equal : !equal;
  }

  private lookup(root: string, segments: readonly PathSegment[], scope: Scope, location: TemplateLocation): Value {
    let current = scope.resolve(root);
    if (current === undefined) {
      throw new UndefinedValueError(root, location);
    }
    for (let i = 0; i < segments.length; i++) {
      current = step(current, segments[i]);
      if (current === undefined) {
        throw new UndefinedValueError(formatPath([root, ...segments.slice(0, i + 1)]), location);
      }
    }
    return current;
  }
}

/**
 * Renders the whole tree into one string. Throws before returning anything if any
 * expression fails.
 */
export function renderNodes(nodes: readonly TemplateNode[], values: ValueDocument, template?: string): string {
  const out: string[] = [];
  new Evaluator(template).renderNodes(nodes, new Scope(values), out);
  return out.join("");
}
