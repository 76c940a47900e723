const PLACEHOLDER = /\{([a-zA-Z0-9_]+)\}/g;

export type TemplateValues = Record<string, string | number>;

/**
 * Fills `{name}` placeholders. Unknown placeholders are left as-is so a
 * missing value shows up in the output instead of silently vanishing.
 */
export function fillTemplate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER, (match, key: string) => {
    const value = values[key];
    return value === undefined ? match : String(value);
  });
}
