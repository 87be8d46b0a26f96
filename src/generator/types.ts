// Shared types for the config generator.
import type { ExactNumber } from "./numbers";
import type { ValueDocument } from "./valueDocument";

export type Scalar = string | number | ExactNumber | boolean | null;

export interface ValueMap {
  readonly [key: string]: Value;
}

export type Value = Scalar | readonly Value[] | ValueMap;

/**
 * A key (mapping) or index (sequence) step in a lookup path.
 */
export type PathSegment = string | number;

/**
 * Sink for user-facing progress output. Fire-and-forget.
 */
export interface Reporter {
  headline(message: string): void;
  progress(message: string): void;
}

/**
 * Anything able to turn preprocessed template text into output, given the loaded values.
 * `name` is the template path, used in error messages.
 */
export interface TemplateEngine {
  render(source: string, values: ValueDocument, name?: string): string;
}

export type GenerationState =
  | "idle"
  | "values-loaded"
  | "rendered"
  | "done"
  | "failed";
