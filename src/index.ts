// Library entry for cfgforge.
export { Config, type ConfigOptions } from "./generator/config";
export { ValueStore, decodeValues, toValueMap } from "./generator/valueStore";
export { ValueDocument } from "./generator/valueDocument";
export { ExactNumber } from "./generator/numbers";
export { TemplateLocator } from "./generator/templateLocator";
export { preprocessTemplate } from "./generator/preprocessor";
export { compileTemplate, renderTemplate, erbEngine, type RenderOptions } from "./generator/template";
export { OutputWriter } from "./generator/outputWriter";
export { outputPathFor, valueFileBaseName, TEMPLATE_SUFFIX } from "./generator/paths";
export {
  GeneratorError,
  MissingConfigurationError,
  ValueDecodeError,
  UndefinedValueError,
  TemplateSyntaxError,
  InvalidTemplatePathError,
  isGeneratorError,
  type ErrorCode,
} from "./generator/errors";
export { createConsoleReporter, silentReporter } from "./utils/reporter";
export type { Reporter, TemplateEngine, Value, ValueMap, GenerationState } from "./generator/types";
