// Typed errors raised while loading values and rendering templates.

export type ErrorCode =
  | "missing_configuration"
  | "value_decode"
  | "undefined_value"
  | "template_syntax"
  | "invalid_template_path";

/**
 * Structured metadata attached to errors (paths, keys, line numbers).
 */
export type ErrorContext = Readonly<Record<string, unknown>>;

export type GeneratorErrorOptions<C extends ErrorCode> = Readonly<{
  code: C;
  context?: ErrorContext;
  cause?: unknown;
}>;

export class GeneratorError<C extends ErrorCode = ErrorCode> extends Error {
  readonly code: C;
  readonly context: ErrorContext;

  constructor(message: string, options: GeneratorErrorOptions<C>) {
    super(message, { cause: options.cause });

    this.name = this.constructor.name;
    this.code = options.code;
    this.context = Object.freeze({ ...options.context });

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Neither `<base>.yml` nor `<base>.json` exists in the working root.
 */
export class MissingConfigurationError extends GeneratorError<"missing_configuration"> {
  constructor(message: string, context: { baseName: string; rootDir: string; example?: string }) {
    super(message, { code: "missing_configuration", context });
  }
}

/**
 * The value file decoded, but its root is not a mapping.
 * Parser failures are not wrapped; js-yaml and JSON.parse errors reach the caller as thrown.
 */
export class ValueDecodeError extends GeneratorError<"value_decode"> {
  constructor(message: string, context: { file: string; rootType: string }) {
    super(message, { code: "value_decode", context });
  }
}

/**
 * Where in a template something went wrong. Absent when a lookup happens outside rendering.
 */
export interface TemplateLocation {
  template?: string;
  line?: number;
}

function describeLocation(location: TemplateLocation): string {
  if (!location.template) return "";
  return location.line !== undefined
    ? ` in ${location.template}:${location.line}`
    : ` in ${location.template}`;
}

export class UndefinedValueError extends GeneratorError<"undefined_value"> {
  readonly key: string;

  constructor(key: string, location: TemplateLocation = {}) {
    super(`undefined config value '${key}'${describeLocation(location)}`, {
      code: "undefined_value",
      context: { key, ...location },
    });
    this.key = key;
  }
}

export class TemplateSyntaxError extends GeneratorError<"template_syntax"> {
  constructor(detail: string, location: TemplateLocation = {}) {
    super(`${detail}${describeLocation(location)}`, {
      code: "template_syntax",
      context: { detail, ...location },
    });
  }
}

export class InvalidTemplatePathError extends GeneratorError<"invalid_template_path"> {
  constructor(templatePath: string, suffix: string) {
    super(`template path '${templatePath}' does not end in '${suffix}'`, {
      code: "invalid_template_path",
      context: { templatePath, suffix },
    });
  }
}

export function isGeneratorError(value: unknown): value is GeneratorError {
  return value instanceof GeneratorError;
}
