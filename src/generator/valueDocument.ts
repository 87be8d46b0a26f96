// Read-only wrapper over a decoded app_config document with dotted-path access.
import { UndefinedValueError, type TemplateLocation } from "./errors";
import { ExactNumber } from "./numbers";
import type { PathSegment, Value, ValueMap } from "./types";

export function isValueMap(value: Value | undefined): value is ValueMap {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof ExactNumber)
  );
}

export function isSequence(value: Value | undefined): value is readonly Value[] {
  return Array.isArray(value);
}

/**
 * Splits `db.host` into `["db", "host"]`. Purely numeric segments become indexes.
 */
export function parsePath(path: string | readonly PathSegment[]): PathSegment[] {
  if (typeof path !== "string") return [...path];
  return path
    .split(".")
    .filter((part) => part.length > 0)
    .map((part) => (/^\d+$/.test(part) ? Number(part) : part));
}

export function formatPath(segments: readonly PathSegment[]): string {
  return segments
    .map((segment, i) => {
      if (typeof segment === "number") return `[${segment}]`;
      return i === 0 ? segment : `.${segment}`;
    })
    .join("");
}

/**
 * Steps into `value` by one segment. Returns undefined when the step does not exist.
 */
export function step(value: Value | undefined, segment: PathSegment): Value | undefined {
  if (typeof segment === "number") {
    if (!isSequence(value)) {
      return isValueMap(value) && Object.prototype.hasOwnProperty.call(value, String(segment))
        ? value[String(segment)]
        : undefined;
    }
    return segment < value.length ? value[segment] : undefined;
  }
  if (isValueMap(value) && Object.prototype.hasOwnProperty.call(value, segment)) {
    return value[segment];
  }
  return undefined;
}

function deepFreeze(value: Value): void {
  if (isSequence(value)) {
    value.forEach(deepFreeze);
  } else if (isValueMap(value)) {
    Object.values(value).forEach(deepFreeze);
  } else {
    return;
  }
  Object.freeze(value);
}

export class ValueDocument {
  private readonly root: ValueMap;

  /**
   * @param root - decoded mapping; frozen in place
   * @param source - file the values came from, for diagnostics
   */
  constructor(root: ValueMap, readonly source: string = "<memory>") {
    deepFreeze(root);
    this.root = root;
  }

  keys(): string[] {
    return Object.keys(this.root);
  }

  has(path: string | readonly PathSegment[]): boolean {
    return this.get(path) !== undefined;
  }

  /**
   * Looks up a dotted path or segment list. `undefined` means not found; a present
   * key holding `null` returns `null`.
   */
  get(path: string | readonly PathSegment[]): Value | undefined {
    const segments = parsePath(path);
    if (segments.length === 0) return undefined;

    let current: Value | undefined = this.root;
    for (const segment of segments) {
      current = step(current, segment);
      if (current === undefined) return undefined;
    }
    return current;
  }

  /**
   * Like {@link get}, but throws {@link UndefinedValueError} naming the full path.
   */
  fetch(path: string | readonly PathSegment[], location: TemplateLocation = {}): Value {
    const value = this.get(path);
    if (value === undefined) {
      throw new UndefinedValueError(formatPath(parsePath(path)), location);
    }
    return value;
  }

  toJSON(): ValueMap {
    return this.root;
  }
}
