// Locates and decodes app_config.yml / app_config.json into a ValueDocument.
import path from "path";
import yaml from "js-yaml";
import { readTextFile, fileExists } from "../utils/fileOps";
import { MissingConfigurationError, ValueDecodeError } from "./errors";
import { ExactNumber, integerFromText, numberFromText, parseJsonExact } from "./numbers";
import {
  paths,
  valueFileBaseName,
  VALUE_FILE_EXTENSIONS,
  type ValueFileExtension,
} from "./paths";
import { ValueDocument, isValueMap } from "./valueDocument";
import type { Value, ValueMap } from "./types";

// Core schema plus merge keys. Timestamps stay strings; numbers keep their written form.
const VALUE_SCHEMA = yaml.CORE_SCHEMA.extend({
  implicit: [
    yaml.types.merge,
    new yaml.Type("tag:yaml.org,2002:int", {
      kind: "scalar",
      resolve: (data: string) => yaml.types.int.resolve(data),
      construct: (data: string) => {
        const value: unknown = yaml.types.int.construct(data);
        return typeof value === "number" ? integerFromText(data, value) : value;
      },
    }),
    new yaml.Type("tag:yaml.org,2002:float", {
      kind: "scalar",
      resolve: (data: string) => yaml.types.float.resolve(data),
      construct: (data: string) => {
        const value: unknown = yaml.types.float.construct(data);
        return typeof value === "number" ? numberFromText(data, value) : value;
      },
    }),
  ],
});

/**
 * Decodes value file text. Parser errors are thrown as the parser raised them.
 */
export function decodeValues(text: string, extension: ValueFileExtension): unknown {
  if (extension === ".json") {
    return parseJsonExact(text);
  }
  return yaml.load(text, { schema: VALUE_SCHEMA });
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "sequence";
  return typeof value;
}

/**
 * Narrows decoder output to the Value shapes; anything else is reported against `file`.
 */
function toValue(raw: unknown, file: string): Value {
  if (raw === null || typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean") {
    return raw;
  }
  if (raw instanceof ExactNumber) {
    return raw;
  }
  if (Array.isArray(raw)) {
    return raw.map((item: unknown) => toValue(item, file));
  }
  if (typeof raw === "object") {
    const out: Record<string, Value> = {};
    for (const [key, child] of Object.entries(raw)) {
      // defineProperty keeps a "__proto__" key as data instead of a prototype change
      Object.defineProperty(out, key, {
        value: toValue(child, file),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return out;
  }
  throw new ValueDecodeError(`unsupported value of type ${typeof raw} in ${file}`, {
    file,
    rootType: typeof raw,
  });
}

/**
 * Turns a decoded document into its root mapping. An empty file counts as an empty mapping.
 */
export function toValueMap(raw: unknown, file: string): ValueMap {
  if (raw === undefined || raw === null) {
    return {};
  }
  const value = toValue(raw, file);
  if (!isValueMap(value)) {
    throw new ValueDecodeError(
      `expecting ${file} to contain a mapping at the top level, found ${describeType(raw)}`,
      { file, rootType: describeType(raw) }
    );
  }
  return value;
}

export interface ResolvedValueFile {
  file: string;
  extension: ValueFileExtension;
}

/**
 * Loads the value document for one run. The first successful load is cached;
 * later calls return it without touching the filesystem.
 */
export class ValueStore {
  private document?: ValueDocument;

  constructor(readonly rootDir: string = process.cwd()) {}

  get loaded(): boolean {
    return this.document !== undefined;
  }

  /**
   * Finds `<base>.yml` or `<base>.json`, YAML first.
   */
  resolve(environment?: string): ResolvedValueFile {
    const baseName = valueFileBaseName(environment);

    for (const extension of VALUE_FILE_EXTENSIONS) {
      const file = paths.valueFile(this.rootDir, baseName, extension);
      if (fileExists(file)) {
        return { file, extension };
      }
    }

    let message = `expecting ${baseName}.yml to exist in the current directory`;
    const example = VALUE_FILE_EXTENSIONS
      .map((extension) => paths.exampleFile(this.rootDir, baseName, extension))
      .find((candidate) => fileExists(candidate));
    if (example) {
      message += ` (copy ${path.basename(example)} to ${path.basename(example, ".example")} to get started)`;
    }
    throw new MissingConfigurationError(message, {
      baseName,
      rootDir: this.rootDir,
      ...(example ? { example } : {}),
    });
  }

  async load(environment?: string): Promise<ValueDocument> {
    if (this.document) {
      return this.document;
    }

    const { file, extension } = this.resolve(environment);
    const text = await readTextFile(file);
    const relative = path.relative(this.rootDir, file);
    this.document = new ValueDocument(toValueMap(decodeValues(text, extension), relative), relative);
    return this.document;
  }
}
