// Rewrites the {{ expr }} shorthand into native <%= expr %> tags.

// A marker may span lines; newlines inside it are kept so later line numbers stay put.
const SUGAR_MARKER = /\{\{[ \t]*([\s\S]*?)[ \t]*\}\}/g;

/**
 * `{{ db.host }}` becomes `<%= db.host %>`. The expression text is kept verbatim and
 * everything outside markers, native tags included, is left alone.
 */
export function preprocessTemplate(text: string): string {
  return text.replace(SUGAR_MARKER, (_match, expression: string) => `<%= ${expression} %>`);
}
