// Naming conventions for value files, templates and generated output.
import path from "path";
import { InvalidTemplatePathError } from "./errors";

export const TEMPLATE_SUFFIX = ".erb";
export const VALUE_FILE_BASENAME = "app_config";

/** Checked in this order; YAML wins when both exist. */
export const VALUE_FILE_EXTENSIONS = [".yml", ".json"] as const;
export type ValueFileExtension = (typeof VALUE_FILE_EXTENSIONS)[number];

export const ENV_TEMPLATE = `.env${TEMPLATE_SUFFIX}`;
export const CONFIG_TEMPLATE_GLOB = `config/*${TEMPLATE_SUFFIX}`;

/**
 * `app_config` or `app_config.<environment>`.
 */
export function valueFileBaseName(environment?: string): string {
  return environment ? `${VALUE_FILE_BASENAME}.${environment}` : VALUE_FILE_BASENAME;
}

/**
 * Strips exactly one trailing template suffix: `a.yml.erb` -> `a.yml`, `a.erb.erb` -> `a.erb`.
 */
export function outputPathFor(templatePath: string): string {
  if (!templatePath.endsWith(TEMPLATE_SUFFIX) || templatePath.length === TEMPLATE_SUFFIX.length) {
    throw new InvalidTemplatePathError(templatePath, TEMPLATE_SUFFIX);
  }
  return templatePath.slice(0, -TEMPLATE_SUFFIX.length);
}

/**
 * Path builders relative to a working root.
 */
export const paths = {
  valueFile: (rootDir: string, baseName: string, extension: string) =>
    path.join(rootDir, `${baseName}${extension}`),
  exampleFile: (rootDir: string, baseName: string, extension: string) =>
    path.join(rootDir, `${baseName}${extension}.example`),
  resolve: (rootDir: string, relativePath: string) => path.resolve(rootDir, relativePath),
};
