// Expression language for template tags: paths, literals, comparison and boolean logic.
// Deliberately small; templates cannot call functions or run code.
import { TemplateSyntaxError, type TemplateLocation } from "../errors";
import { numberFromText, type NumericValue } from "../numbers";
import type { PathSegment, Scalar } from "../types";

export type BinaryOperator = "==" | "!=" | "&&" | "||";

export type Expression =
  | { type: "literal"; value: Scalar }
  | { type: "path"; root: string; segments: PathSegment[] }
  | { type: "not"; operand: Expression }
  | { type: "binary"; operator: BinaryOperator; left: Expression; right: Expression };

type Token =
  | { type: "identifier"; value: string; offset: number }
  | { type: "number"; value: NumericValue; offset: number }
  | { type: "string"; value: string; offset: number }
  | { type: "symbol"; value: string; offset: number }
  | { type: "end"; offset: number };

const SYMBOLS = ["==", "!=", "&&", "||", "!", "(", ")", "[", "]", "."];
const ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r", "\\": "\\", '"': '"', "'": "'" };

const KEYWORD_LITERALS: Record<string, Scalar> = {
  true: true,
  false: false,
  nil: null,
  null: null,
};

const WORD_OPERATORS: Record<string, BinaryOperator> = {
  and: "&&",
  or: "||",
};

function isIndex(token: Token): token is { type: "number"; value: number; offset: number } {
  return token.type === "number" && typeof token.value === "number" && Number.isInteger(token.value);
}

function tokenize(source: string, location: TemplateLocation): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const identifier = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(i));
    if (identifier) {
      tokens.push({ type: "identifier", value: identifier[0], offset: i });
      i += identifier[0].length;
      continue;
    }

    // after a '.', digits are an index: list.0.1 is two steps, not the float 0.1
    const previous = tokens[tokens.length - 1];
    const afterDot = previous !== undefined && previous.type === "symbol" && previous.value === ".";
    const number = (afterDot ? /^\d+/ : /^\d+(?:\.\d+)?/).exec(source.slice(i));
    if (number) {
      const value = afterDot ? Number(number[0]) : numberFromText(number[0]);
      tokens.push({ type: "number", value, offset: i });
      i += number[0].length;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const start = i;
      let value = "";
      i++;
      while (i < source.length && source[i] !== ch) {
        if (source[i] === "\\" && i + 1 < source.length) {
          const escaped = source[i + 1];
          value += ESCAPES[escaped] ?? escaped;
          i += 2;
        } else {
          value += source[i];
          i++;
        }
      }
      if (i >= source.length) {
        throw new TemplateSyntaxError(`unterminated string in expression '${source}'`, location);
      }
      i++;
      tokens.push({ type: "string", value, offset: start });
      continue;
    }

    const symbol = SYMBOLS.find((candidate) => source.startsWith(candidate, i));
    if (symbol) {
      tokens.push({ type: "symbol", value: symbol, offset: i });
      i += symbol.length;
      continue;
    }

    throw new TemplateSyntaxError(`unexpected character '${ch}' in expression '${source}'`, location);
  }

  tokens.push({ type: "end", offset: source.length });
  return tokens;
}

/**
 * Recursive-descent parser. Precedence, loosest first: `||`/`or`, `&&`/`and`,
 * `==`/`!=`, unary `!`/`not`, then paths, literals and parentheses.
 */
class ExpressionParser {
  private position = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
    private readonly location: TemplateLocation
  ) {}

  parse(): Expression {
    if (this.peek().type === "end") {
      throw new TemplateSyntaxError("empty expression", this.location);
    }
    const expression = this.parseOr();
    const trailing = this.peek();
    if (trailing.type !== "end") {
      throw this.error(`unexpected '${this.source.slice(trailing.offset)}'`);
    }
    return expression;
  }

  private parseOr(): Expression {
    let left = this.parseAnd();
    while (this.matchOperator("||")) {
      left = { type: "binary", operator: "||", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseEquality();
    while (this.matchOperator("&&")) {
      left = { type: "binary", operator: "&&", left, right: this.parseEquality() };
    }
    return left;
  }

  private parseEquality(): Expression {
    let left = this.parseUnary();
    for (;;) {
      if (this.matchSymbol("==")) {
        left = { type: "binary", operator: "==", left, right: this.parseUnary() };
      } else if (this.matchSymbol("!=")) {
        left = { type: "binary", operator: "!=", left, right: this.parseUnary() };
      } else {
        return left;
      }
    }
  }

  private parseUnary(): Expression {
    if (this.matchSymbol("!") || this.matchKeyword("not")) {
      return { type: "not", operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Expression {
    const token = this.next();

    switch (token.type) {
      case "number":
      case "string":
        return { type: "literal", value: token.value };
      case "identifier":
        if (Object.prototype.hasOwnProperty.call(KEYWORD_LITERALS, token.value)) {
          return { type: "literal", value: KEYWORD_LITERALS[token.value] };
        }
        return this.parsePath(token.value);
      case "symbol":
        if (token.value === "(") {
          const inner = this.parseOr();
          if (!this.matchSymbol(")")) {
            throw this.error("missing ')'");
          }
          return inner;
        }
        throw this.error(`unexpected '${token.value}'`);
      case "end":
        throw this.error("unexpected end of expression");
    }
  }

  private parsePath(root: string): Expression {
    const segments: PathSegment[] = [];

    for (;;) {
      if (this.matchSymbol(".")) {
        const token = this.next();
        if (token.type === "identifier") {
          segments.push(token.value);
        } else if (isIndex(token)) {
          segments.push(token.value);
        } else {
          throw this.error("expected a key after '.'");
        }
      } else if (this.matchSymbol("[")) {
        const token = this.next();
        if (token.type === "string") {
          segments.push(token.value);
        } else if (isIndex(token)) {
          segments.push(token.value);
        } else {
          throw this.error("expected a quoted key or an index inside '[ ]'");
        }
        if (!this.matchSymbol("]")) {
          throw this.error("missing ']'");
        }
      } else {
        return { type: "path", root, segments };
      }
    }
  }

  private peek(): Token {
    return this.tokens[this.position];
  }

  private next(): Token {
    const token = this.tokens[this.position];
    if (token.type !== "end") this.position++;
    return token;
  }

  private matchSymbol(value: string): boolean {
    const token = this.peek();
    if (token.type === "symbol" && token.value === value) {
      this.position++;
      return true;
    }
    return false;
  }

  private matchKeyword(value: string): boolean {
    const token = this.peek();
    if (token.type === "identifier" && token.value === value) {
      this.position++;
      return true;
    }
    return false;
  }

  private matchOperator(operator: BinaryOperator): boolean {
    if (this.matchSymbol(operator)) return true;
    const token = this.peek();
    if (token.type === "identifier" && WORD_OPERATORS[token.value] === operator) {
      this.position++;
      return true;
    }
    return false;
  }

  private error(detail: string): TemplateSyntaxError {
    return new TemplateSyntaxError(`${detail} in expression '${this.source}'`, this.location);
  }
}

export function parseExpression(source: string, location: TemplateLocation = {}): Expression {
  return new ExpressionParser(source, tokenize(source, location), location).parse();
}
