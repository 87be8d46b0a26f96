// ERB-compatible template engine: <%= %> interpolation plus if/unless/for/each blocks.
import type { TemplateEngine } from "../types";
import type { ValueDocument } from "../valueDocument";
import { parseTemplate, type TemplateNode } from "./parser";
import { renderNodes } from "./renderer";

export { parseExpression, type Expression } from "./expression";
export { parseTemplate, type TemplateNode } from "./parser";
export { formatValue, isTruthy } from "./renderer";

export interface RenderOptions {
  /** Template path, used in error messages. */
  name?: string;
}

export function compileTemplate(source: string, options: RenderOptions = {}): (values: ValueDocument) => string {
  const nodes: TemplateNode[] = parseTemplate(source, options.name);
  return (values) => renderNodes(nodes, values, options.name);
}

export function renderTemplate(source: string, values: ValueDocument, options: RenderOptions = {}): string {
  return compileTemplate(source, options)(values);
}

export const erbEngine: TemplateEngine = {
  render: (source, values, name) => renderTemplate(source, values, { name }),
};
