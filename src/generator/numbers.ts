// Numbers that must render exactly as they were written in the value file.

/**
 * A decoded number held as its source text. Used where `String(number)` would
 * rewrite the value: `1.0` becoming `1`, or integers past `Number.MAX_SAFE_INTEGER`
 * losing their low digits.
 */
export class ExactNumber {
  constructor(readonly text: string) {
    Object.freeze(this);
  }

  // js-yaml stringifies object keys whose tag is not [object Object]
  get [Symbol.toStringTag](): string {
    return "ExactNumber";
  }

  valueOf(): number {
    return Number(this.text);
  }

  toString(): string {
    return this.text;
  }

  toJSON(): number {
    return this.valueOf();
  }
}

export type NumericValue = number | ExactNumber;

const INTEGER_TEXT = /^-?\d+$/;

/**
 * `value` when `String(value)` reproduces `text`, otherwise an {@link ExactNumber}.
 * Infinity and NaN stay plain numbers.
 */
export function numberFromText(text: string, value: number = Number(text)): NumericValue {
  if (!Number.isFinite(value) || String(value) === text) {
    return value;
  }
  return new ExactNumber(text);
}

/**
 * Integers beyond the safe range keep every digit, normalised to plain decimal.
 * `text` may carry a sign, underscores and a 0x/0o/0b prefix.
 */
export function integerFromText(text: string, value: number): NumericValue {
  if (Number.isSafeInteger(value)) {
    return value;
  }
  const digits = text.replace(/_/g, "");
  const magnitude = BigInt(digits.replace(/^[-+]/, ""));
  return new ExactNumber((digits.startsWith("-") ? -magnitude : magnitude).toString());
}

export function isNumeric(value: unknown): value is NumericValue {
  return typeof value === "number" || value instanceof ExactNumber;
}

/**
 * Integers compare digit for digit; anything else compares as a double.
 */
export function numbersEqual(left: NumericValue, right: NumericValue): boolean {
  const leftText = String(left);
  const rightText = String(right);
  if (INTEGER_TEXT.test(leftText) && INTEGER_TEXT.test(rightText)) {
    return BigInt(leftText) === BigInt(rightText);
  }
  return left.valueOf() === right.valueOf();
}

const JSON_TOKEN = /"(?:[^"\\]|\\.)*"|-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/g;

/**
 * `JSON.parse`, except number literals a double cannot reproduce come back as
 * {@link ExactNumber}. Invalid input throws JSON.parse's own SyntaxError.
 */
export function parseJsonExact(text: string): unknown {
  const plain: unknown = JSON.parse(text);

  const strings: string[] = [];
  const inexact: RegExpMatchArray[] = [];
  for (const match of text.matchAll(JSON_TOKEN)) {
    const token = match[0];
    if (token.startsWith('"')) {
      const decoded: unknown = JSON.parse(token);
      if (typeof decoded === "string") strings.push(decoded);
    } else if (numberFromText(token) instanceof ExactNumber) {
      inexact.push(match);
    }
  }
  if (inexact.length === 0) {
    return plain;
  }

  // Swap each inexact literal for a string no real value starts with, then map it back.
  let marker = "\u0000";
  while (strings.some((value) => value.startsWith(marker))) {
    marker += "\u0000";
  }

  const placeholders = new Map<string, ExactNumber>();
  let rewritten = "";
  let last = 0;
  inexact.forEach((match, i) => {
    const start = match.index ?? 0;
    const placeholder = `${marker}${i}`;
    placeholders.set(placeholder, new ExactNumber(match[0]));
    rewritten += text.slice(last, start) + JSON.stringify(placeholder);
    last = start + match[0].length;
  });
  rewritten += text.slice(last);

  return JSON.parse(rewritten, (_key, value: unknown) =>
    typeof value === "string" ? placeholders.get(value) ?? value : value
  );
}
